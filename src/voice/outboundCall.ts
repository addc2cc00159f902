import { ProviderUnavailable, ValidationError } from '../core/errors.js'
import { createLogger } from '../utils/Logger.js'
import { AGENT_NAME, buildDialMetadata, createRoomName, isInternationalNumber } from './callPlan.js'

const logger = createLogger('outbound-call')

/**
 * The part of LiveKit's AgentDispatchClient used to start a call.
 */
export interface AgentDispatchApi {
  createDispatch(roomName: string, agentName: string, options?: { metadata?: string }): Promise<{ id: string }>
}

export interface OutboundCall {
  dispatchId: string
  roomName: string
}

export async function placeOutboundCall(
  client: AgentDispatchApi,
  phoneNumber: string,
  options: { lastTopic?: string; roomName?: string } = {}
): Promise<OutboundCall> {
  if (!isInternationalNumber(phoneNumber)) {
    throw new ValidationError('Phone number must be in international format (e.g. +14155550100)', { phoneNumber })
  }

  const roomName = options.roomName ?? createRoomName()
  logger.info({ phoneNumber, roomName }, 'Creating coaching call dispatch')

  try {
    const dispatch = await client.createDispatch(roomName, AGENT_NAME, {
      metadata: buildDialMetadata(phoneNumber, options.lastTopic)
    })
    logger.info({ dispatchId: dispatch.id, roomName }, 'Coaching call dispatch created')
    return { dispatchId: dispatch.id, roomName }
  } catch (err) {
    logger.error({ err, roomName }, 'Failed to create dispatch')
    throw new ProviderUnavailable('livekit', err instanceof Error ? err.message : 'Failed to create dispatch', { cause: err })
  }
}

export const USAGE = 'Usage: career-coach-call <phone_number> [--topic "<last topic>"]'

export function parseCallArgs(argv: string[]): { phoneNumber: string; lastTopic?: string } | null {
  const positional: string[] = []
  let lastTopic: string | undefined
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '--topic') {
      lastTopic = argv[++i]
      if (!lastTopic) return null
    } else if (arg !== undefined) {
      positional.push(arg)
    }
  }
  const [phoneNumber] = positional
  if (positional.length !== 1 || !phoneNumber) return null
  return lastTopic ? { phoneNumber, lastTopic } : { phoneNumber }
}

/**
 * CLI body for placing a call. Returns the process exit code.
 */
export async function runCallCommand(
  argv: string[],
  connect: () => { client: AgentDispatchApi; livekitUrl: string },
  write: (line: string) => void = (line) => process.stdout.write(`${line}\n`)
): Promise<number> {
  const args = parseCallArgs(argv)
  if (!args) {
    write(USAGE)
    write('This starts a weekly coaching check-in call.')
    return 1
  }
  if (!isInternationalNumber(args.phoneNumber)) {
    write('Phone number must be in international format (e.g. +14155550100)')
    return 1
  }

  try {
    const { client, livekitUrl } = connect()
    const call = await placeOutboundCall(client, args.phoneNumber, args.lastTopic ? { lastTopic: args.lastTopic } : {})
    write(`Coaching call dispatched to ${args.phoneNumber}`)
    write(`Room: ${call.roomName}`)
    write(`Dispatch ID: ${call.dispatchId}`)
    write(`Monitor at: ${livekitUrl}/rooms/${call.roomName}`)
    return 0
  } catch (err) {
    write(`Failed to initiate coaching call: ${err instanceof Error ? err.message : String(err)}`)
    return 1
  }
}

/**
 * LiveKit voice worker for coaching calls.
 * Dials out through the SIP trunk when the dispatch carries a phone number,
 * otherwise waits for an inbound caller.
 */

import dotenv from 'dotenv'
import { fileURLToPath } from 'node:url'
import { type JobContext, WorkerOptions, cli, defineAgent, voice } from '@livekit/agents'
import * as cartesia from '@livekit/agents-plugin-cartesia'
import * as deepgram from '@livekit/agents-plugin-deepgram'
import * as openai from '@livekit/agents-plugin-openai'
import { EgressClient, EncodedFileOutput, SipClient } from 'livekit-server-sdk'
import { loadVoiceConfig, type VoiceConfig } from '../config/env.js'
import { createLogger } from '../utils/Logger.js'
import {
  AGENT_NAME,
  COACH_INSTRUCTIONS,
  buildGreeting,
  parseDialMetadata,
  recordingFilePath,
  sipParticipantIdentity
} from './callPlan.js'

dotenv.config({ path: process.env.ENV_PATH || '.env' })

const logger = createLogger('voice-agent')

class CareerCoachAgent extends voice.Agent {
  constructor(private readonly greeting: string) {
    super({ instructions: COACH_INSTRUCTIONS })
  }

  async onEnter(): Promise<void> {
    this.session.say(this.greeting, { allowInterruptions: true })
  }
}

async function startRecording(ctx: JobContext, config: VoiceConfig, roomName: string, phoneNumber: string): Promise<void> {
  const egress = new EgressClient(config.livekit.url, config.livekit.apiKey, config.livekit.apiSecret)
  try {
    const info = await egress.startRoomCompositeEgress(
      roomName,
      { file: new EncodedFileOutput({ filepath: recordingFilePath(phoneNumber, new Date()) }) },
      { layout: 'speaker', audioOnly: true }
    )
    logger.info({ egressId: info.egressId }, 'Started recording')
    ctx.addShutdownCallback(async () => {
      try {
        await egress.stopEgress(info.egressId)
        logger.info({ egressId: info.egressId }, 'Stopped recording')
      } catch (err) {
        logger.error({ err, egressId: info.egressId }, 'Failed to stop recording')
      }
    })
  } catch (err) {
    // A call without a recording is still a call
    logger.error({ err }, 'Failed to start recording')
  }
}

export default defineAgent({
  entry: async (ctx: JobContext) => {
    const config = loadVoiceConfig()
    await ctx.connect()

    const plan = parseDialMetadata(ctx.job.metadata)
    const roomName = ctx.room.name ?? ''

    if (plan.kind === 'outbound') {
      if (!config.sipTrunkId) {
        logger.error('LIVEKIT_SIP_TRUNK_ID is not set, cannot dial out')
        ctx.shutdown('missing SIP trunk')
        return
      }
      logger.info({ phoneNumber: plan.phoneNumber, roomName }, 'Outbound coaching call')
      const sip = new SipClient(config.livekit.url, config.livekit.apiKey, config.livekit.apiSecret)
      try {
        await sip.createSipParticipant(config.sipTrunkId, plan.phoneNumber, roomName, {
          participantIdentity: sipParticipantIdentity(plan.phoneNumber),
          participantName: 'Outbound Call',
          waitUntilAnswered: true,
          krispEnabled: true
        })
        logger.info('Outbound call connected')
      } catch (err) {
        logger.error({ err }, 'Error creating SIP participant')
        ctx.shutdown('SIP participant failed')
        return
      }
      if (config.recordCalls) {
        await startRecording(ctx, config, roomName, plan.phoneNumber)
      }
    } else {
      logger.info('No phone number in metadata, waiting for inbound caller')
      await ctx.waitForParticipant()
    }

    const session = new voice.AgentSession({
      stt: new deepgram.STT({ model: 'nova-2-phonecall', language: 'en', interimResults: true }),
      llm: new openai.LLM({ model: 'gpt-4o', temperature: 0.3 }),
      tts: new cartesia.TTS({
        model: 'sonic-2',
        voice: config.cartesiaVoiceId,
        language: 'en',
        sampleRate: 24000
      })
    })

    await session.start({
      agent: new CareerCoachAgent(buildGreeting(plan.kind === 'outbound' ? plan.context : undefined)),
      room: ctx.room
    })
  }
})

cli.runApp(new WorkerOptions({
  agent: fileURLToPath(import.meta.url),
  agentName: AGENT_NAME
}))

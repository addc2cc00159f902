/**
 * Places an outbound coaching call: `career-coach-call +14155550100`
 */

import dotenv from 'dotenv'
import { AgentDispatchClient } from 'livekit-server-sdk'
import { loadVoiceConfig } from '../config/env.js'
import { runCallCommand } from './outboundCall.js'

dotenv.config({ path: process.env.ENV_PATH || '.env' })

const exitCode = await runCallCommand(process.argv.slice(2), () => {
  const config = loadVoiceConfig()
  return {
    client: new AgentDispatchClient(config.livekit.url, config.livekit.apiKey, config.livekit.apiSecret),
    livekitUrl: config.livekit.url
  }
})

process.exit(exitCode)

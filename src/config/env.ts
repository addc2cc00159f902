import { z } from 'zod'
import { ConfigurationError } from '../core/errors.js'

type Env = Record<string, string | undefined>

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined))

const botEnvSchema = z.object({
  PHONE_ID: optionalString,
  ACCESS_TOKEN: optionalString,
  VERIFY_TOKEN: optionalString,
  APP_SECRET: optionalString,
  GRAPH_API_VERSION: z.string().default('v18.0'),
  PORT: z.coerce.number().int().positive().default(8000),
  API_TOKENS: z.string().default(''),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  GENERATIVE_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  UNMATCHED_ACTION: z.enum(['static', 'generative']).default('static'),
  RULES_PATH: optionalString
})

export interface BotConfig {
  whatsapp: {
    phoneId: string
    accessToken: string
    verifyToken: string
    appSecret?: string
    graphApiVersion: string
  }
  port: number
  apiTokens: Set<string>
  openai: {
    apiKey?: string
    model: string
    timeoutMs: number
  }
  /** Resolved default for unmatched text; `generative` needs an OpenAI key */
  unmatchedAction: 'static' | 'generative'
  rulesPath?: string
}

function invalid(error: z.ZodError): ConfigurationError {
  const fields = error.issues.map((issue) => issue.path.join('.'))
  return new ConfigurationError(`Invalid configuration: ${error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`, fields)
}

export function parseApiTokens(raw: string): Set<string> {
  return new Set(
    raw
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
  )
}

export function loadBotConfig(env: Env = process.env): BotConfig {
  const parsed = botEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw invalid(parsed.error)
  }
  const data = parsed.data

  const missing: string[] = []
  if (!data.PHONE_ID) missing.push('PHONE_ID')
  if (!data.ACCESS_TOKEN) missing.push('ACCESS_TOKEN')
  if (!data.VERIFY_TOKEN) missing.push('VERIFY_TOKEN')
  if (!data.PHONE_ID || !data.ACCESS_TOKEN || !data.VERIFY_TOKEN) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`, missing)
  }

  const config: BotConfig = {
    whatsapp: {
      phoneId: data.PHONE_ID,
      accessToken: data.ACCESS_TOKEN,
      verifyToken: data.VERIFY_TOKEN,
      graphApiVersion: data.GRAPH_API_VERSION
    },
    port: data.PORT,
    apiTokens: parseApiTokens(data.API_TOKENS),
    openai: {
      model: data.OPENAI_MODEL,
      timeoutMs: data.GENERATIVE_TIMEOUT_MS
    },
    // Without a key there is nothing to forward to
    unmatchedAction: data.UNMATCHED_ACTION === 'generative' && data.OPENAI_API_KEY ? 'generative' : 'static'
  }
  if (data.APP_SECRET) config.whatsapp.appSecret = data.APP_SECRET
  if (data.OPENAI_API_KEY) config.openai.apiKey = data.OPENAI_API_KEY
  if (data.RULES_PATH) config.rulesPath = data.RULES_PATH
  return config
}

export const DEFAULT_CARTESIA_VOICE_ID = 'f6141af3-5f94-418c-80ed-a45d450e7e2e'

const voiceEnvSchema = z.object({
  LIVEKIT_URL: optionalString,
  LIVEKIT_API_KEY: optionalString,
  LIVEKIT_API_SECRET: optionalString,
  LIVEKIT_SIP_TRUNK_ID: optionalString,
  CARTESIA_VOICE_ID: optionalString,
  CALL_RECORDING: z.enum(['true', 'false']).default('false')
})

export interface VoiceConfig {
  livekit: {
    url: string
    apiKey: string
    apiSecret: string
  }
  sipTrunkId?: string
  cartesiaVoiceId: string
  recordCalls: boolean
}

export function loadVoiceConfig(env: Env = process.env): VoiceConfig {
  const parsed = voiceEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw invalid(parsed.error)
  }
  const data = parsed.data

  if (!data.LIVEKIT_URL || !data.LIVEKIT_API_KEY || !data.LIVEKIT_API_SECRET) {
    const missing = [
      ['LIVEKIT_URL', data.LIVEKIT_URL],
      ['LIVEKIT_API_KEY', data.LIVEKIT_API_KEY],
      ['LIVEKIT_API_SECRET', data.LIVEKIT_API_SECRET]
    ]
      .filter(([, value]) => !value)
      .map(([name]) => String(name))
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`, missing)
  }

  const config: VoiceConfig = {
    livekit: {
      url: data.LIVEKIT_URL,
      apiKey: data.LIVEKIT_API_KEY,
      apiSecret: data.LIVEKIT_API_SECRET
    },
    cartesiaVoiceId: data.CARTESIA_VOICE_ID ?? DEFAULT_CARTESIA_VOICE_ID,
    recordCalls: data.CALL_RECORDING === 'true'
  }
  if (data.LIVEKIT_SIP_TRUNK_ID) config.sipTrunkId = data.LIVEKIT_SIP_TRUNK_ID
  return config
}

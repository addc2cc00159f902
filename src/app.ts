import express, { type ErrorRequestHandler } from 'express'
import type { BotConfig } from './config/env.js'
import type { IWhatsAppAPI } from './core/interfaces.js'
import type { WebhookProcessor } from './services/webhookProcessor.js'
import { apiKeyAuth } from './middleware/auth.js'
import { captureRawBody, verifyWebhookSignature } from './middleware/signature.js'
import { broadcastBodySchema, sendMessageBodySchema } from './dto/messages.js'
import { createLogger } from './utils/Logger.js'

export interface AppDependencies {
  config: BotConfig
  processor: WebhookProcessor
  whatsapp: IWhatsAppAPI
  generativeEnabled: boolean
  ruleNames: string[]
}

export function createApp({ config, processor, whatsapp, generativeEnabled, ruleNames }: AppDependencies): express.Express {
  const app = express()
  const logger = createLogger('http')
  const requireApiKey = apiKeyAuth(config.apiTokens)

  app.use(express.json({ verify: captureRawBody }))

  app.get('/', (_req, res) => {
    res.json({
      message: 'Career Coach WhatsApp Bot is running',
      status: 'healthy',
      webhook_url: '/webhook',
      environment: {
        phone_id: Boolean(config.whatsapp.phoneId),
        access_token: Boolean(config.whatsapp.accessToken),
        app_secret: Boolean(config.whatsapp.appSecret),
        verify_token: Boolean(config.whatsapp.verifyToken)
      }
    })
  })

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      api_version: config.whatsapp.graphApiVersion,
      webhook_path: '/webhook',
      generative: generativeEnabled,
      unmatched_action: config.unmatchedAction,
      rules: ruleNames,
      timestamp: new Date().toISOString()
    })
  })

  // Meta calls this once when the webhook URL is registered
  app.get('/webhook', (req, res) => {
    const mode = req.query['hub.mode']
    const token = req.query['hub.verify_token']
    const challenge = req.query['hub.challenge']

    if (mode === 'subscribe' && token === config.whatsapp.verifyToken && typeof challenge === 'string') {
      logger.info('Webhook verified')
      res.type('text/plain').send(challenge)
      return
    }

    logger.warn({ mode }, 'Webhook verification failed')
    res.status(403).json({ success: false, error: 'Verification failed' })
  })

  app.post('/webhook', verifyWebhookSignature(config.whatsapp.appSecret, logger), async (req, res) => {
    try {
      await processor.handle(req.body)
    } catch (err) {
      logger.error({ err }, 'Error processing webhook')
    }
    // Always acknowledge, otherwise Meta keeps redelivering
    res.json({ status: 'EVENT_RECEIVED' })
  })

  app.get('/test-webhook', (_req, res) => {
    res.json({
      webhook_url: '/webhook',
      verify_token_configured: Boolean(config.whatsapp.verifyToken),
      app_secret_configured: Boolean(config.whatsapp.appSecret),
      phone_id_configured: Boolean(config.whatsapp.phoneId),
      access_token_configured: Boolean(config.whatsapp.accessToken),
      instructions: [
        'Configure the webhook URL in the Meta dashboard: https://your-domain.com/webhook',
        'Use the VERIFY_TOKEN value as the verify token',
        "Subscribe to the 'messages' field",
        'Send a WhatsApp message to your business number'
      ]
    })
  })

  app.post('/send-message', requireApiKey, async (req, res) => {
    const parse = sendMessageBodySchema.safeParse(req.body)
    if (!parse.success) {
      return res.status(400).json({ success: false, error: 'Invalid request parameters. Both to and message are required.' })
    }
    try {
      const { messageId } = await whatsapp.sendText(parse.data.to, parse.data.message)
      return res.json({ success: true, status: 'sent', to: parse.data.to, message_id: messageId })
    } catch (err) {
      logger.error({ err, to: parse.data.to }, 'Failed to send message')
      return res.status(500).json({ success: false, error: 'Failed to send message' })
    }
  })

  app.post('/broadcast', requireApiKey, async (req, res) => {
    const parse = broadcastBodySchema.safeParse(req.body)
    if (!parse.success) {
      return res.status(400).json({ success: false, error: 'Invalid request parameters. message and recipients are required.' })
    }

    const results: Array<{ recipient: string; status: 'sent' | 'failed'; message_id?: string; error?: string }> = []
    for (const recipient of parse.data.recipients) {
      try {
        const { messageId } = await whatsapp.sendText(recipient, parse.data.message)
        results.push({ recipient, status: 'sent', message_id: messageId })
      } catch (err) {
        logger.error({ err, recipient }, 'Failed to send broadcast message')
        results.push({ recipient, status: 'failed', error: err instanceof Error ? err.message : String(err) })
      }
    }
    return res.json({ success: results.every((r) => r.status === 'sent'), results })
  })

  const handleErrors: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    // Unparseable webhook bodies are dropped but still acknowledged
    if (req.path === '/webhook' && req.method === 'POST') {
      logger.warn({ err }, 'Dropping unparseable webhook body')
      res.json({ status: 'EVENT_RECEIVED' })
      return
    }
    logger.error({ err, path: req.path }, 'Request failed')
    res.status(400).json({ success: false, error: 'Invalid request' })
  }
  app.use(handleErrors)

  return app
}

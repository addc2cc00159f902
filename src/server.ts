/**
 * Career coach WhatsApp bot: entry point.
 * Validates configuration, loads the reply rules and starts the webhook listener.
 */

import dotenv from 'dotenv'
import { createApp } from './app.js'
import { loadBotConfig } from './config/env.js'
import { buildDispatchDefaults, loadReplyTable } from './config/replyRules.js'
import { ConfigurationError } from './core/errors.js'
import { MessageDispatcher } from './routing/Dispatcher.js'
import { OpenAIService } from './services/openaiService.js'
import { ReplyExecutor } from './services/replyExecutor.js'
import { WebhookProcessor } from './services/webhookProcessor.js'
import { WhatsAppCloudClient } from './services/whatsapp.js'
import { createLogger } from './utils/Logger.js'

dotenv.config({ path: process.env.ENV_PATH || '.env' })

const logger = createLogger('server')

function main(): void {
  // Refuse to serve traffic without credentials
  const config = loadBotConfig()
  const table = loadReplyTable(config.rulesPath)

  const whatsapp = new WhatsAppCloudClient({
    phoneId: config.whatsapp.phoneId,
    accessToken: config.whatsapp.accessToken,
    graphApiVersion: config.whatsapp.graphApiVersion
  })
  const openai = new OpenAIService({
    apiKey: config.openai.apiKey,
    model: config.openai.model,
    timeoutMs: config.openai.timeoutMs
  })

  const dispatcher = new MessageDispatcher(
    table.rules,
    buildDispatchDefaults(table, config.unmatchedAction),
    table.buttons
  )
  const executor = new ReplyExecutor(whatsapp, openai.isEnabled() ? openai : null, {
    generativeTimeoutMs: config.openai.timeoutMs,
    staticFallback: table.defaults.static
  })
  const processor = new WebhookProcessor(dispatcher, executor, whatsapp)

  const app = createApp({
    config,
    processor,
    whatsapp,
    generativeEnabled: openai.isEnabled(),
    ruleNames: dispatcher.getRuleNames()
  })

  app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        rules: dispatcher.getRuleNames(),
        unmatchedAction: config.unmatchedAction,
        generative: openai.isEnabled(),
        signatureCheck: Boolean(config.whatsapp.appSecret)
      },
      `Career coach bot listening on http://0.0.0.0:${config.port}`
    )
  })
}

try {
  main()
} catch (err) {
  if (err instanceof ConfigurationError) {
    logger.fatal({ missing: err.missing }, err.message)
  } else {
    logger.fatal({ err }, 'Failed to start server')
  }
  process.exit(1)
}

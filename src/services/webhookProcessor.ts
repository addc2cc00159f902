import { EventEmitter } from 'eventemitter3'
import { v4 as uuidv4 } from 'uuid'
import type { IWhatsAppAPI } from '../core/interfaces.js'
import type { InboundMessage } from '../core/types.js'
import { ValidationError } from '../core/errors.js'
import type { MessageDispatcher } from '../routing/Dispatcher.js'
import type { ExecutedReply, ReplyExecutor } from './replyExecutor.js'
import {
  webhookBodySchema,
  type WebhookContact,
  type WebhookMessage,
  type WebhookStatus
} from '../dto/messages.js'
import { createLogger } from '../utils/Logger.js'

export const WHATSAPP_OBJECT = 'whatsapp_business_account'

export interface WebhookEvents {
  'message:replied': (event: { deliveryId: string; message: InboundMessage; reply: ExecutedReply; source: 'button' | 'rules' }) => void
  'message:dropped': (event: { deliveryId: string; reason: string }) => void
  'message:failed': (event: { deliveryId: string; message: InboundMessage; error: unknown }) => void
  'status': (event: { deliveryId: string; status: WebhookStatus }) => void
}

export interface WebhookSummary {
  deliveryId: string
  received: number
  replied: number
  dropped: number
  failed: number
  statuses: number
}

export function normalizeMessage(raw: WebhookMessage, contacts: WebhookContact[] = []): InboundMessage {
  if (!raw.from) {
    throw new ValidationError('Inbound message has no sender id', { id: raw.id })
  }

  const seconds = raw.timestamp ? Number(raw.timestamp) : NaN
  const timestamp = Number.isFinite(seconds) ? new Date(seconds * 1000) : new Date()
  const senderName = contacts.find((contact) => contact.wa_id === raw.from)?.profile?.name
  const base = {
    id: raw.id ?? `${raw.from}:${raw.timestamp ?? timestamp.getTime()}`,
    senderId: raw.from,
    timestamp,
    ...(senderName ? { senderName } : {})
  }

  if (raw.type === 'text') {
    return { ...base, type: 'text', text: raw.text?.body ?? '' }
  }

  // Both reply buttons and list rows come back as interactive replies
  const reply = raw.interactive?.button_reply ?? raw.interactive?.list_reply
  if (raw.type === 'interactive' && reply) {
    return { ...base, type: 'button_reply', text: reply.title, buttonId: reply.id }
  }

  if (raw.type === 'image') {
    return { ...base, type: 'image', text: raw.image?.caption ?? '' }
  }

  return { ...base, type: 'other', text: '' }
}

/**
 * Turns one Cloud API webhook delivery into replies.
 * Never throws: malformed input is logged and dropped so the vendor sees a 200.
 */
export class WebhookProcessor extends EventEmitter<WebhookEvents> {
  private readonly logger = createLogger('webhook')

  constructor(
    private readonly dispatcher: MessageDispatcher,
    private readonly executor: ReplyExecutor,
    private readonly whatsapp: IWhatsAppAPI
  ) {
    super()
  }

  public async handle(body: unknown): Promise<WebhookSummary> {
    const summary: WebhookSummary = {
      deliveryId: uuidv4(),
      received: 0,
      replied: 0,
      dropped: 0,
      failed: 0,
      statuses: 0
    }

    const parsed = webhookBodySchema.safeParse(body)
    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
      this.logger.warn({ deliveryId: summary.deliveryId, reason }, 'Dropping malformed webhook payload')
      summary.dropped++
      this.emit('message:dropped', { deliveryId: summary.deliveryId, reason })
      return summary
    }

    if (parsed.data.object !== WHATSAPP_OBJECT) {
      this.logger.info({ deliveryId: summary.deliveryId, object: parsed.data.object }, 'Ignoring webhook for another object type')
      return summary
    }

    for (const entry of parsed.data.entry) {
      for (const change of entry.changes) {
        const { messages = [], statuses = [], contacts = [] } = change.value

        for (const raw of messages) {
          summary.received++
          await this.handleMessage(summary, raw, contacts)
        }

        for (const status of statuses) {
          summary.statuses++
          this.logStatus(summary.deliveryId, status)
        }
      }
    }

    this.logger.info(summary, 'Webhook delivery processed')
    return summary
  }

  private async handleMessage(summary: WebhookSummary, raw: WebhookMessage, contacts: WebhookContact[]): Promise<void> {
    const { deliveryId } = summary
    let message: InboundMessage
    try {
      message = normalizeMessage(raw, contacts)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      const details = err instanceof ValidationError ? err.details : undefined
      this.logger.warn({ deliveryId, reason, details }, 'Dropping invalid inbound message')
      summary.dropped++
      this.emit('message:dropped', { deliveryId, reason })
      return
    }

    this.logger.info({ deliveryId, messageId: message.id, from: message.senderId, type: message.type }, 'Processing inbound message')

    try {
      await this.whatsapp.markAsRead(message.id)
    } catch (err) {
      this.logger.warn({ err, messageId: message.id }, 'Failed to mark message as read')
    }

    try {
      const { action, source } = this.dispatcher.resolve(message)
      const reply = await this.executor.execute(message, action)
      summary.replied++
      this.logger.info(
        { deliveryId, messageId: message.id, kind: reply.sent.kind, usedFallback: reply.usedFallback },
        'Reply sent'
      )
      this.emit('message:replied', { deliveryId, message, reply, source })
    } catch (err) {
      summary.failed++
      this.logger.error({ err, deliveryId, messageId: message.id }, 'Failed to reply to inbound message')
      this.emit('message:failed', { deliveryId, message, error: err })
    }
  }

  private logStatus(deliveryId: string, status: WebhookStatus): void {
    if (status.status === 'failed') {
      this.logger.error({ deliveryId, status: status.status, recipient: status.recipient_id, errors: status.errors }, 'Message delivery failed')
    } else {
      this.logger.info({ deliveryId, status: status.status, recipient: status.recipient_id }, 'Status update')
    }
    this.emit('status', { deliveryId, status })
  }
}

import type { IWhatsAppAPI } from '../core/interfaces.js'
import type { ButtonOption, StaticAction } from '../core/types.js'
import { WhatsAppApiError } from '../core/errors.js'
import { createLogger } from '../utils/Logger.js'
import { sendResponseSchema, type OutboundPayload, type SendResponse } from '../dto/messages.js'

const GRAPH_API_URL = 'https://graph.facebook.com'

// Cloud API limits
export const MAX_TEXT_LENGTH = 4096
export const MAX_INTERACTIVE_BODY_LENGTH = 1024
export const MAX_BUTTON_TITLE_LENGTH = 20

export interface WhatsAppCloudConfig {
  phoneId: string
  accessToken: string
  graphApiVersion?: string
  fetch?: typeof fetch
}

function truncate(value: string, max: number): string {
  const chars = Array.from(value)
  return chars.length <= max ? value : chars.slice(0, max).join('')
}

export function renderText(to: string, body: string): OutboundPayload {
  return {
    messaging_product: 'whatsapp',
    recipient_type: 'individual',
    to,
    type: 'text',
    text: { body: truncate(body, MAX_TEXT_LENGTH) }
  }
}

export function renderButtons(to: string, body: string, buttons: ButtonOption[]): OutboundPayload {
  return {
    messaging_product: 'whatsapp',
    recipient_type: 'individual',
    to,
    type: 'interactive',
    interactive: {
      type: 'button',
      body: { text: truncate(body, MAX_INTERACTIVE_BODY_LENGTH) },
      action: {
        buttons: buttons.map((button) => ({
          type: 'reply' as const,
          reply: { id: button.id, title: truncate(button.label, MAX_BUTTON_TITLE_LENGTH) }
        }))
      }
    }
  }
}

export function renderAction(to: string, action: StaticAction): OutboundPayload {
  switch (action.kind) {
    case 'send_text':
      return renderText(to, action.body)
    case 'send_buttons':
      return renderButtons(to, action.body, action.buttons)
  }
}

/**
 * Thin client for the WhatsApp Cloud API messages endpoint.
 */
export class WhatsAppCloudClient implements IWhatsAppAPI {
  private readonly logger = createLogger('whatsapp')
  private readonly endpoint: string
  private readonly fetchImpl: typeof fetch

  constructor(private readonly config: WhatsAppCloudConfig) {
    const version = config.graphApiVersion ?? 'v18.0'
    this.endpoint = `${GRAPH_API_URL}/${version}/${config.phoneId}/messages`
    this.fetchImpl = config.fetch ?? fetch
  }

  public getEndpoint(): string {
    return this.endpoint
  }

  public async sendText(to: string, body: string): Promise<{ messageId: string }> {
    return this.post(renderText(to, body))
  }

  public async sendButtons(to: string, body: string, buttons: ButtonOption[]): Promise<{ messageId: string }> {
    return this.post(renderButtons(to, body, buttons))
  }

  public async sendAction(to: string, action: StaticAction): Promise<{ messageId: string }> {
    return this.post(renderAction(to, action))
  }

  public async markAsRead(messageId: string): Promise<void> {
    await this.request({
      messaging_product: 'whatsapp',
      status: 'read',
      message_id: messageId
    })
  }

  private async post(payload: OutboundPayload): Promise<{ messageId: string }> {
    const result = await this.request(payload)
    const messageId = result.messages?.[0]?.id ?? ''
    this.logger.info({ to: payload.to, type: payload.type, messageId }, 'Message sent')
    return { messageId }
  }

  private async request(payload: object): Promise<SendResponse> {
    const response = await this.fetchImpl(this.endpoint, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.config.accessToken}`,
        'Content-Type': 'application/json'
      },
      body: JSON.stringify(payload)
    })

    const text = await response.text()
    if (!response.ok) {
      this.logger.error({ status: response.status, body: text }, 'WhatsApp API request failed')
      throw new WhatsAppApiError(response.status, text)
    }

    if (!text) return {}
    try {
      const parsed = sendResponseSchema.safeParse(JSON.parse(text))
      return parsed.success ? parsed.data : {}
    } catch {
      this.logger.warn({ body: text }, 'WhatsApp API returned a non-JSON body')
      return {}
    }
  }
}

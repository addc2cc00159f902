/**
 * Seams between the pure dispatcher and the vendor SDKs
 */

import type { ButtonOption, ConversationContext } from './types.js'

/**
 * Wraps one call to a language-model API.
 * Implementations throw `ProviderUnavailable` on any failure and stop
 * the request once `signal` aborts.
 */
export interface IGenerativeProvider {
  generate(
    prompt: string,
    context?: { conversation?: ConversationContext; signal?: AbortSignal }
  ): Promise<string>

  getName(): string
}

/**
 * WhatsApp API interface for sending messages
 */
export interface IWhatsAppAPI {
  sendText(to: string, body: string): Promise<{ messageId: string }>

  sendButtons(
    to: string,
    body: string,
    buttons: ButtonOption[]
  ): Promise<{ messageId: string }>

  markAsRead(messageId: string): Promise<void>
}

/**
 * Core types for the career coach bot
 */

export type MessageType = 'text' | 'button_reply' | 'image' | 'other'

/**
 * A WhatsApp message reduced to what dispatching needs.
 * Built once per webhook delivery and never mutated.
 */
export interface InboundMessage {
  readonly id: string
  readonly senderId: string
  readonly senderName?: string
  readonly text: string
  readonly type: MessageType
  /** Set for `button_reply` messages */
  readonly buttonId?: string
  readonly timestamp: Date
}

export interface ButtonOption {
  id: string
  label: string
}

export interface SendTextAction {
  kind: 'send_text'
  body: string
}

export interface SendButtonsAction {
  kind: 'send_buttons'
  body: string
  buttons: ButtonOption[]
}

export interface ForwardToGenerativeAction {
  kind: 'forward_to_generative'
  promptContext: string
  /** Sent instead when the provider cannot answer */
  fallback?: StaticAction
}

export type StaticAction = SendTextAction | SendButtonsAction

export type Action = StaticAction | ForwardToGenerativeAction

export type KeywordMatch = 'contains' | 'equals'

export interface ReplyRule {
  name: string
  keywords: readonly string[]
  match?: KeywordMatch
  action: Action
}

export interface DispatchDefaults {
  /** Returned for empty or non-text messages */
  nonText: StaticAction
  /** Returned when no rule matches; chosen once at configuration time */
  unmatched: Action
}

export interface ButtonReplyTable {
  answers: Readonly<Record<string, StaticAction>>
  unknown: StaticAction
}

/**
 * Carried into a voice call so the agent can pick up where the last call left off.
 */
export interface ConversationContext {
  senderId: string
  lastTopic: string
}

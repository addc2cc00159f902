/**
 * Inbound message dispatcher
 *
 * Maps one inbound message to exactly one reply action. Performs no I/O:
 * the returned action is carried out by the reply executor.
 */

import type {
  Action,
  ButtonReplyTable,
  DispatchDefaults,
  ForwardToGenerativeAction,
  InboundMessage,
  ReplyRule,
  StaticAction
} from '../core/types.js'

export function normalizeText(text: string): string {
  return text.trim().toLowerCase()
}

export function ruleMatches(rule: ReplyRule, normalizedText: string): boolean {
  const mode = rule.match ?? 'contains'
  return rule.keywords.some((keyword) => {
    const needle = normalizeText(keyword)
    if (!needle) return false
    return mode === 'equals' ? normalizedText === needle : normalizedText.includes(needle)
  })
}

const PLACEHOLDER = /{{\s*(\w+)(?::(\d+))?\s*}}/g

function clip(value: string, max: number): string {
  const chars = Array.from(value)
  return chars.length <= max ? value : `${chars.slice(0, max).join('')}...`
}

export function hasPlaceholders(template: string): boolean {
  return new RegExp(PLACEHOLDER.source).test(template)
}

// {{text}} and {{name}} interpolation; {{text:50}} clips to 50 characters
export function applyTemplate(template: string, message: InboundMessage): string {
  const values: Record<string, string> = {
    text: message.text.trim(),
    name: message.senderName ?? ''
  }
  return template.replace(PLACEHOLDER, (_, key: string, max: string | undefined) => {
    const value = Object.hasOwn(values, key) ? values[key] ?? '' : ''
    return max ? clip(value, Number(max)) : value
  })
}

function bindStatic(action: StaticAction, message: InboundMessage): StaticAction {
  if (action.kind !== 'send_text' || !hasPlaceholders(action.body)) return action
  return { kind: 'send_text', body: applyTemplate(action.body, message) }
}

function bindForward(action: ForwardToGenerativeAction, message: InboundMessage): ForwardToGenerativeAction {
  const bound: ForwardToGenerativeAction = {
    kind: 'forward_to_generative',
    promptContext: applyTemplate(action.promptContext, message)
  }
  if (action.fallback) {
    bound.fallback = bindStatic(action.fallback, message)
  }
  return bound
}

function bindAction(action: Action, message: InboundMessage): Action {
  return action.kind === 'forward_to_generative' ? bindForward(action, message) : bindStatic(action, message)
}

/**
 * Classify `message` against `rules` in declaration order.
 *
 * Actions without placeholders are returned as declared. Generative prompts
 * and text bodies with placeholders are bound to the message.
 */
export function dispatch(
  message: InboundMessage,
  rules: readonly ReplyRule[],
  defaults: DispatchDefaults
): Action {
  if (message.type !== 'text') {
    return defaults.nonText
  }

  const normalized = normalizeText(message.text)
  if (!normalized) {
    return defaults.nonText
  }

  for (const rule of rules) {
    if (ruleMatches(rule, normalized)) {
      return bindAction(rule.action, message)
    }
  }

  return bindAction(defaults.unmatched, message)
}

export function answerButton(message: InboundMessage, table: ButtonReplyTable): StaticAction {
  const id = message.buttonId
  // Ids come from the client, so only the table's own keys count
  if (!id || !Object.hasOwn(table.answers, id)) return table.unknown
  return table.answers[id] ?? table.unknown
}

export class MessageDispatcher {
  constructor(
    private readonly rules: readonly ReplyRule[],
    private readonly defaults: DispatchDefaults,
    private readonly buttons: ButtonReplyTable
  ) {}

  public dispatch(message: InboundMessage): Action {
    return dispatch(message, this.rules, this.defaults)
  }

  public answerButton(message: InboundMessage): StaticAction {
    return answerButton(message, this.buttons)
  }

  /** Button presses are answered from the button table; everything else is dispatched */
  public resolve(message: InboundMessage): { action: Action; source: 'button' | 'rules' } {
    if (message.type === 'button_reply') {
      return { action: this.answerButton(message), source: 'button' }
    }
    return { action: this.dispatch(message), source: 'rules' }
  }

  public getRuleNames(): string[] {
    return this.rules.map((rule) => rule.name)
  }

  public getDefaults(): DispatchDefaults {
    return this.defaults
  }
}

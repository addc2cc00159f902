import type { IGenerativeProvider, IWhatsAppAPI } from '../core/interfaces.js'
import type { Action, ForwardToGenerativeAction, InboundMessage, StaticAction } from '../core/types.js'
import { ProviderUnavailable } from '../core/errors.js'
import { createLogger } from '../utils/Logger.js'

export interface ExecutedReply {
  /** What was actually sent to the user */
  sent: StaticAction
  messageId: string
  usedFallback: boolean
}

export interface ReplyExecutorOptions {
  /** Hard limit on the generative call */
  generativeTimeoutMs: number
  /** Sent when a generative action fails and carries no fallback of its own */
  staticFallback: StaticAction
}

/**
 * Runs `task` with a deadline. On expiry the task's signal is aborted and the
 * returned promise rejects with `ProviderUnavailable`.
 */
export function withTimeout<T>(task: (signal: AbortSignal) => Promise<T>, ms: number, provider: string): Promise<T> {
  const controller = new AbortController()
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort()
      reject(new ProviderUnavailable(provider, `Timed out after ${ms}ms`))
    }, ms)
    task(controller.signal).then(
      (value) => {
        clearTimeout(timer)
        resolve(value)
      },
      (err: unknown) => {
        clearTimeout(timer)
        reject(err)
      }
    )
  })
}

/**
 * Carries out a dispatched action: resolves generative actions to text,
 * then sends the result through the WhatsApp API.
 */
export class ReplyExecutor {
  private readonly logger = createLogger('reply-executor')

  constructor(
    private readonly whatsapp: IWhatsAppAPI,
    private readonly provider: IGenerativeProvider | null,
    private readonly options: ReplyExecutorOptions
  ) {}

  public async resolve(message: InboundMessage, action: Action): Promise<{ action: StaticAction; usedFallback: boolean }> {
    if (action.kind !== 'forward_to_generative') {
      return { action, usedFallback: false }
    }
    return this.generate(message, action)
  }

  public async execute(message: InboundMessage, action: Action): Promise<ExecutedReply> {
    const resolved = await this.resolve(message, action)
    const { messageId } = await this.send(message.senderId, resolved.action)
    return { sent: resolved.action, messageId, usedFallback: resolved.usedFallback }
  }

  private async generate(
    message: InboundMessage,
    action: ForwardToGenerativeAction
  ): Promise<{ action: StaticAction; usedFallback: boolean }> {
    const fallback = action.fallback ?? this.options.staticFallback
    const provider = this.provider
    if (!provider) {
      this.logger.warn({ messageId: message.id }, 'No generative provider configured, sending static fallback')
      return { action: fallback, usedFallback: true }
    }

    try {
      const body = await withTimeout(
        (signal) => provider.generate(action.promptContext, { signal }),
        this.options.generativeTimeoutMs,
        provider.getName()
      )
      return { action: { kind: 'send_text', body }, usedFallback: false }
    } catch (err) {
      if (err instanceof ProviderUnavailable) {
        this.logger.warn(
          { messageId: message.id, provider: err.provider, reason: err.message },
          'Generative provider unavailable, sending static fallback'
        )
      } else {
        this.logger.error({ err, messageId: message.id }, 'Generative provider failed unexpectedly, sending static fallback')
      }
      return { action: fallback, usedFallback: true }
    }
  }

  private send(to: string, action: StaticAction): Promise<{ messageId: string }> {
    switch (action.kind) {
      case 'send_text':
        return this.whatsapp.sendText(to, action.body)
      case 'send_buttons':
        return this.whatsapp.sendButtons(to, action.body, action.buttons)
    }
  }
}

import OpenAI from 'openai';
import type { IGenerativeProvider } from '../core/interfaces.js';
import type { ConversationContext } from '../core/types.js';
import { ProviderUnavailable } from '../core/errors.js';
import { createLogger } from '../utils/Logger.js';
import { MAX_TEXT_LENGTH } from './whatsapp.js';

export interface OpenAIConfig {
  apiKey?: string | undefined;
  model?: string | undefined;
  timeoutMs?: number | undefined;
  maxTokens?: number | undefined;
}

type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

/**
 * The slice of the OpenAI SDK this service calls. Lets tests pass a stand-in.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: { model: string; messages: ChatMessage[]; max_tokens?: number; temperature?: number },
        options?: { timeout?: number; maxRetries?: number; signal?: AbortSignal }
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export const CAREER_COACH_PROMPT = [
  'You are Coach Alex, a friendly AI career advisor answering on WhatsApp.',
  'Help with career planning, resumes, interviews, salary negotiation, skill development and job search.',
  'If the user drifts off topic, steer the conversation back to their career.',
  'Keep answers under 150 words. Use WhatsApp formatting (*bold*, bullet lines), no markdown headings.'
].join(' ');

export class OpenAIService implements IGenerativeProvider {
  private readonly logger = createLogger('openai');
  private readonly config: Required<Pick<OpenAIConfig, 'model' | 'timeoutMs' | 'maxTokens'>>;
  private readonly client: ChatCompletionClient | null;

  constructor(config: OpenAIConfig = {}, client?: ChatCompletionClient) {
    this.config = {
      model: config.model ?? 'gpt-4o-mini',
      timeoutMs: config.timeoutMs ?? 8000,
      maxTokens: config.maxTokens ?? 500
    };
    this.client = client ?? this.initializeClient(config.apiKey);
  }

  private initializeClient(apiKey: string | undefined): ChatCompletionClient | null {
    if (!apiKey) {
      return null;
    }
    try {
      const client = new OpenAI({ apiKey, maxRetries: 0, timeout: this.config.timeoutMs });
      this.logger.info({ model: this.config.model }, 'OpenAI client initialized');
      return client;
    } catch (err) {
      this.logger.error({ err }, 'Failed to initialize OpenAI client');
      return null;
    }
  }

  public getName(): string {
    return 'openai';
  }

  public isEnabled(): boolean {
    return this.client !== null;
  }

  public async generate(
    prompt: string,
    context: { conversation?: ConversationContext; signal?: AbortSignal } = {}
  ): Promise<string> {
    if (!this.client) {
      throw new ProviderUnavailable(this.getName(), 'OpenAI client not configured');
    }

    const messages: ChatMessage[] = [{ role: 'system', content: CAREER_COACH_PROMPT }];
    if (context.conversation?.lastTopic) {
      messages.push({
        role: 'system',
        content: `Last topic discussed with this user: ${context.conversation.lastTopic}`
      });
    }
    messages.push({ role: 'user', content: prompt });

    let completion: Awaited<ReturnType<ChatCompletionClient['chat']['completions']['create']>>;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages,
          max_tokens: this.config.maxTokens,
          temperature: 0.7
        },
        { timeout: this.config.timeoutMs, maxRetries: 0, ...(context.signal ? { signal: context.signal } : {}) }
      );
    } catch (err) {
      this.logger.warn({ err, model: this.config.model }, 'OpenAI request failed');
      throw new ProviderUnavailable(
        this.getName(),
        err instanceof Error ? err.message : 'OpenAI request failed',
        { cause: err }
      );
    }

    const content = completion.choices[0]?.message.content?.trim();
    if (!content) {
      throw new ProviderUnavailable(this.getName(), 'OpenAI returned an empty completion');
    }

    this.logger.info({ responseLength: content.length }, 'OpenAI response received');
    return Array.from(content).slice(0, MAX_TEXT_LENGTH).join('');
  }
}

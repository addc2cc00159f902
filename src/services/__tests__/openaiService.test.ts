import { describe, it, expect, jest } from '@jest/globals';
import { CAREER_COACH_PROMPT, OpenAIService, type ChatCompletionClient } from '../openaiService.js';
import { ProviderUnavailable } from '../../core/errors.js';

type Create = ChatCompletionClient['chat']['completions']['create'];

function stubClient(create: jest.Mock<Create>): ChatCompletionClient {
  return { chat: { completions: { create } } };
}

describe('OpenAIService', () => {
  it('is disabled without an API key', async () => {
    const service = new OpenAIService({});

    expect(service.isEnabled()).toBe(false);
    await expect(service.generate('hello')).rejects.toBeInstanceOf(ProviderUnavailable);
  });

  it('sends the coach prompt and returns the trimmed completion', async () => {
    const create = jest.fn<Create>().mockResolvedValue({
      choices: [{ message: { content: '  Ask your manager for a growth plan.  ' } }]
    });
    const service = new OpenAIService({ model: 'gpt-test', timeoutMs: 1000 }, stubClient(create));

    await expect(service.generate('How do I grow?')).resolves.toBe('Ask your manager for a growth plan.');
    expect(create).toHaveBeenCalledWith(
      {
        model: 'gpt-test',
        messages: [
          { role: 'system', content: CAREER_COACH_PROMPT },
          { role: 'user', content: 'How do I grow?' }
        ],
        max_tokens: 500,
        temperature: 0.7
      },
      { timeout: 1000, maxRetries: 0 }
    );
  });

  it('adds the last topic as context', async () => {
    const create = jest.fn<Create>().mockResolvedValue({ choices: [{ message: { content: 'ok' } }] });
    const service = new OpenAIService({}, stubClient(create));

    await service.generate('Any news?', { conversation: { senderId: '1555', lastTopic: 'learning SQL' } });

    expect(create.mock.calls[0]?.[0].messages[1]).toEqual({
      role: 'system',
      content: 'Last topic discussed with this user: learning SQL'
    });
  });

  it('passes the abort signal to the request', async () => {
    const create = jest.fn<Create>().mockResolvedValue({ choices: [{ message: { content: 'ok' } }] });
    const service = new OpenAIService({ timeoutMs: 1000 }, stubClient(create));
    const controller = new AbortController();

    await service.generate('hi', { signal: controller.signal });

    expect(create.mock.calls[0]?.[1]).toEqual({ timeout: 1000, maxRetries: 0, signal: controller.signal });
  });

  it('wraps SDK errors as ProviderUnavailable', async () => {
    const sdkError = new Error('429 Too Many Requests');
    const create = jest.fn<Create>().mockRejectedValue(sdkError);
    const service = new OpenAIService({}, stubClient(create));

    const error = await service.generate('hi').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ProviderUnavailable);
    if (error instanceof ProviderUnavailable) {
      expect(error.provider).toBe('openai');
      expect(error.message).toBe('429 Too Many Requests');
      expect(error.cause).toBe(sdkError);
    }
  });

  it('treats an empty completion as unavailable', async () => {
    const create = jest.fn<Create>().mockResolvedValue({ choices: [{ message: { content: '   ' } }] });
    const service = new OpenAIService({}, stubClient(create));

    await expect(service.generate('hi')).rejects.toThrow('OpenAI returned an empty completion');
  });
});

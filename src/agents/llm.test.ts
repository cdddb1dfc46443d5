import { describe, expect, it, vi } from 'vitest';
import { createOpenAICompletion, type ChatClient } from './llm.js';

function fakeClient(content: string | null): ChatClient {
  return {
    chat: {
      completions: {
        create: vi.fn(async () => ({
          model: 'test-model',
          choices: [{ message: { content } }],
          usage: { prompt_tokens: 10, completion_tokens: 5 },
        })),
      },
    },
  };
}

describe('createOpenAICompletion', () => {
  it('sends the system and user prompts with the sampling settings', async () => {
    const client = fakeClient('Ответ');
    const complete = createOpenAICompletion(client, 'test-model');

    const text = await complete({ systemPrompt: 'Система', userPrompt: 'Запрос', temperature: 0.7, maxTokens: 1500 });

    expect(text).toBe('Ответ');
    expect(client.chat.completions.create).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'Система' },
        { role: 'user', content: 'Запрос' },
      ],
      temperature: 0.7,
      max_tokens: 1500,
    });
  });

  it('returns an empty string when the model sends no content', async () => {
    const complete = createOpenAICompletion(fakeClient(null), 'test-model');

    expect(await complete({ systemPrompt: 's', userPrompt: 'u', temperature: 0.8, maxTokens: 10 })).toBe('');
  });
});

import { describe, expect, it, vi } from 'vitest';
import { CorpusStore } from '../rag/corpus.js';
import { EmbeddingIndex } from '../rag/vectorstore.js';
import { Retriever } from '../rag/retriever.js';
import { GenerationError } from '../utils/errors.js';
import type { EmbeddingFunction } from '../rag/embeddings.js';
import { ContentAgent } from './agent.js';
import type { CompletionFunction, CompletionRequest } from './llm.js';

const TEXTS = [
  'Интересный факт про ароматы',
  'Новый год скоро! Дарите подарки',
  'Заказ готов, цена 1500р',
  'Декор из сухоцветов',
  'Аромат ванили и сандала',
  'Спасибо за отзывы',
  'Процесс изготовления свечи',
];

// Same direction for every text: every post is equally similar
const flatEmbedder: EmbeddingFunction = async (texts) => texts.map(() => [1, 1]);

async function setup(complete: CompletionFunction = async () => 'Готовый текст') {
  const corpus = CorpusStore.fromTexts(TEXTS);
  const embed = vi.fn(flatEmbedder);
  const index = await EmbeddingIndex.build(corpus, embed);
  const retriever = new Retriever(corpus, index);
  const completion = vi.fn(complete);
  return { agent: new ContentAgent({ retriever, complete: completion }), completion, embed };
}

function lastRequest(completion: { mock: { calls: ReadonlyArray<ReadonlyArray<CompletionRequest>> } }): CompletionRequest {
  const call = completion.mock.calls.at(-1);
  const request = call?.[0];
  if (!request) throw new Error('completion was not called');
  return request;
}

describe('ContentAgent', () => {
  it('returns the completion text unmodified', async () => {
    const { agent } = await setup(async () => '  ✨ Пост \n');
    expect(await agent.writePost('зима')).toBe('  ✨ Пост \n');
  });

  it('writes posts with four examples at temperature 0.8', async () => {
    const { agent, completion } = await setup();

    await agent.writePost('зимние ароматы');

    const request = lastRequest(completion);
    expect(request.temperature).toBe(0.8);
    expect(request.maxTokens).toBe(1000);
    expect(request.userPrompt).toContain('Пример 4 (');
    expect(request.userPrompt).not.toContain('Пример 5 (');
    expect(request.userPrompt).toContain('Напиши пост на тему: зимние ароматы');
  });

  it('researches with four examples at temperature 0.7', async () => {
    const { agent, completion } = await setup();

    await agent.researchTopic('история свечей');

    const request = lastRequest(completion);
    expect(request.temperature).toBe(0.7);
    expect(request.maxTokens).toBe(1500);
    expect(request.userPrompt).toContain('Пост 4 (');
    expect(request.userPrompt).toContain('Исследуй тему: история свечей');
  });

  it('spreads idea examples across categories when no theme is given', async () => {
    const { agent, completion } = await setup();

    await agent.generateIdeas();

    const request = lastRequest(completion);
    expect(request.temperature).toBe(0.9);
    expect(request.maxTokens).toBe(1200);
    // One post each in educational, seasonal, fragrance, decor and commercial
    expect(request.userPrompt).toContain('Пост 1 (educational, ');
    expect(request.userPrompt).toContain('Пост 2 (seasonal, ');
    expect(request.userPrompt).toContain('Пост 3 (fragrance, ');
    expect(request.userPrompt).toContain('Пост 4 (decor, ');
    expect(request.userPrompt).toContain('Пост 5 (commercial, ');
    expect(request.userPrompt).not.toContain('Пост 6 (');
    expect(request.userPrompt).not.toContain('process');
  });

  it('ranks idea examples against the theme when one is given', async () => {
    const { agent, completion } = await setup();

    await agent.generateIdeas('зима', '', 3);

    const request = lastRequest(completion);
    expect(request.userPrompt).toContain('Пост 6 (');
    expect(request.userPrompt).toContain("Предложи 3 креативных идей для постов на тему 'зима'");
  });

  it('converses without retrieval, using the context', async () => {
    const { agent, completion, embed } = await setup();
    const context = '\n\n--- КОНТЕКСТ РАЗГОВОРА ---\nПользователь: привет\n';

    await agent.converse('как дела?', context);

    const request = lastRequest(completion);
    expect(request.temperature).toBe(0.9);
    expect(request.maxTokens).toBe(800);
    expect(request.userPrompt.startsWith(context)).toBe(true);
    expect(request.userPrompt).not.toContain('ПРИМЕРЫ');
    // Only the index build embedded anything
    expect(embed).toHaveBeenCalledTimes(1);
  });

  it('dispatches by task kind', async () => {
    const { agent, completion } = await setup();

    await agent.run('refinement', 'сделай короче', 'контекст');

    const request = lastRequest(completion);
    expect(request.temperature).toBe(0.8);
    expect(request.maxTokens).toBe(1200);
    expect(request.userPrompt.startsWith('контекст\n\n--- ЗАПРОС НА ИЗМЕНЕНИЕ ---')).toBe(true);
  });

  it('wraps completion failures in GenerationError', async () => {
    const cause = new Error('429 quota exceeded');
    const { agent } = await setup(async () => Promise.reject(cause));

    const error = await agent.writePost('зима').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    if (error instanceof GenerationError) {
      expect(error.message).toBe('Completion failed for post');
      expect(error.taskKind).toBe('post');
      expect(error.stage).toBe('completion');
      expect(error.cause).toBe(cause);
    }
  });

  it('treats an empty completion as a failure', async () => {
    const { agent } = await setup(async () => '   ');

    await expect(agent.researchTopic('воск')).rejects.toThrow('Completion for research returned no content');
  });

  it('does not retry a failed completion', async () => {
    const { agent, completion } = await setup(async () => Promise.reject(new Error('boom')));

    await expect(agent.converse('привет')).rejects.toBeInstanceOf(GenerationError);
    expect(completion).toHaveBeenCalledTimes(1);
  });
});

import { describe, expect, it, vi } from 'vitest';
import { CorpusStore } from './corpus.js';
import { EmbeddingIndex } from './vectorstore.js';
import { EmbeddingServiceError } from '../utils/errors.js';
import type { EmbeddingFunction } from './embeddings.js';

const corpus = CorpusStore.fromTexts(['первый', 'второй', 'третий']);

// Vector: [position of text in the corpus + 1, text length]
const positional: EmbeddingFunction = async (texts) => texts.map((text) => [corpus.texts().indexOf(text) + 1, text.length]);

describe('EmbeddingIndex.build', () => {
  it('embeds the whole corpus in a single call', async () => {
    const embed = vi.fn(positional);
    const index = await EmbeddingIndex.build(corpus, embed);

    expect(embed).toHaveBeenCalledTimes(1);
    expect(embed).toHaveBeenCalledWith(['первый', 'второй', 'третий']);
    expect(index.size).toBe(3);
    expect(index.dimensions).toBe(2);
    expect(index.vectorFor(1)).toEqual([2, 6]);
    expect(index.all().map(({ id }) => id)).toEqual([0, 1, 2]);
  });

  it('builds an empty index without calling the embedder', async () => {
    const embed = vi.fn(positional);
    const index = await EmbeddingIndex.build(CorpusStore.fromTexts([]), embed);

    expect(index.size).toBe(0);
    expect(embed).not.toHaveBeenCalled();
  });

  it('wraps embedder failures as index-stage errors', async () => {
    const failing: EmbeddingFunction = async () => Promise.reject(new Error('network down'));

    const error = await EmbeddingIndex.build(corpus, failing).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingServiceError);
    if (error instanceof EmbeddingServiceError) {
      expect(error.stage).toBe('index');
      expect(error.cause).toBeInstanceOf(Error);
    }
  });

  it('rejects a wrong number of vectors', async () => {
    const short: EmbeddingFunction = async () => [[1, 2]];

    await expect(EmbeddingIndex.build(corpus, short)).rejects.toThrow(
      'Embedding service returned 1 vectors for 3 texts'
    );
  });

  it('rejects mixed dimensions', async () => {
    const ragged: EmbeddingFunction = async () => [[1, 2], [1, 2, 3], [1, 2]];

    await expect(EmbeddingIndex.build(corpus, ragged)).rejects.toThrow(
      'Embedding 1 has 3 dimensions, expected 2'
    );
  });

  it('rejects empty vectors', async () => {
    const empty: EmbeddingFunction = async () => [[1], [], [1]];

    await expect(EmbeddingIndex.build(corpus, empty)).rejects.toThrow('Embedding 1 is missing or empty');
  });

  it('rejects vectors with non-finite components', async () => {
    const broken: EmbeddingFunction = async () => [[1, 0], [NaN, 1], [0.5, 0.5]];

    const error = await EmbeddingIndex.build(corpus, broken).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingServiceError);
    if (error instanceof EmbeddingServiceError) {
      expect(error.message).toBe('Embedding 1 has a non-finite component');
      expect(error.stage).toBe('index');
    }
  });

  it('freezes stored vectors', async () => {
    const index = await EmbeddingIndex.build(corpus, positional);
    expect(Object.isFrozen(index.vectorFor(0))).toBe(true);
  });
});

describe('EmbeddingIndex lookups', () => {
  it('throws RangeError for unknown ids', async () => {
    const index = await EmbeddingIndex.build(corpus, positional);
    expect(() => index.vectorFor(3)).toThrow(RangeError);
  });

  it('embeds queries with the same function', async () => {
    const index = await EmbeddingIndex.build(corpus, positional);
    expect(await index.embedQuery('третий')).toEqual([3, 6]);
  });

  it('wraps query failures as query-stage errors', async () => {
    let calls = 0;
    const flaky: EmbeddingFunction = async (texts) => {
      calls += 1;
      if (calls > 1) throw new Error('timeout');
      return positional(texts);
    };
    const index = await EmbeddingIndex.build(corpus, flaky);

    const error = await index.embedQuery('запрос').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EmbeddingServiceError);
    if (error instanceof EmbeddingServiceError) {
      expect(error.stage).toBe('query');
    }
  });

  it('rejects a query vector of a different dimension', async () => {
    let calls = 0;
    const drifting: EmbeddingFunction = async (texts) => {
      calls += 1;
      return calls === 1 ? positional(texts) : [[1, 2, 3]];
    };
    const index = await EmbeddingIndex.build(corpus, drifting);

    await expect(index.embedQuery('запрос')).rejects.toThrow('Query embedding has 3 dimensions, index has 2');
  });

  it('rejects a query vector with an infinite component', async () => {
    let calls = 0;
    const overflowing: EmbeddingFunction = async (texts) => {
      calls += 1;
      return calls === 1 ? positional(texts) : [[Infinity, 1]];
    };
    const index = await EmbeddingIndex.build(corpus, overflowing);

    const error = await index.embedQuery('запрос').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EmbeddingServiceError);
    if (error instanceof EmbeddingServiceError) {
      expect(error.message).toBe('Embedding 0 has a non-finite component');
      expect(error.stage).toBe('query');
    }
  });
});

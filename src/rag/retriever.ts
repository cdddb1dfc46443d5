/**
 * Retriever Module
 *
 * Finds the corpus posts most similar to a request. Retrieved posts are
 * shown to the model as style exemplars, so ranking only needs to be
 * deterministic and cheap: a linear cosine scan over the in-memory index.
 *
 * EXAMPLE FLOW:
 * -------------
 * Request: "праздничное поздравление"
 *   ↓
 * Embed query → cosine vs. every post → sort desc (ties: lower id first)
 *   ↓
 * Walk the ranking, skip posts outside the category filter, stop at k
 *   ↓
 * [ { entry: #1 "Новый год скоро! ...", similarity: 0.83 }, ... ]
 *
 * An empty result (k = 0, empty corpus, no post in the category) is a
 * normal answer, never an error.
 */

import { createModuleLogger } from '../utils/logger.js';
import { cosineSimilarity, type EmbeddingVector } from './embeddings.js';
import type { CorpusEntry, CorpusStore } from './corpus.js';
import type { EmbeddingIndex } from './vectorstore.js';
import type { Category } from './rules.js';

const logger = createModuleLogger('retriever');

/**
 * A corpus post selected for a request, with its similarity score.
 */
export interface RetrievedExample {
  entry: CorpusEntry;
  similarity: number;
}

export interface ScoredId {
  id: number;
  similarity: number;
}

/**
 * Score every indexed vector against the query and order the result by
 * similarity descending, breaking ties by ascending id.
 */
export function rankBySimilarity(query: EmbeddingVector, index: EmbeddingIndex): ScoredId[] {
  const scored = index.all().map(({ id, vector }) => ({
    id,
    similarity: cosineSimilarity(query, vector),
  }));
  scored.sort((a, b) => b.similarity - a.similarity || a.id - b.id);
  return scored;
}

export class Retriever {
  constructor(
    private readonly corpus: CorpusStore,
    private readonly index: EmbeddingIndex
  ) {
    if (corpus.size !== index.size) {
      throw new Error(`Index has ${index.size} vectors for ${corpus.size} corpus entries`);
    }
  }

  /**
   * Retrieve up to `k` posts most similar to `query`, optionally only those
   * tagged with `category`.
   *
   * @throws EmbeddingServiceError (stage `query`) if the query cannot be embedded
   *
   * @example
   * const examples = await retriever.retrieve('зимние ароматы', 4);
   * examples[0].similarity // highest first
   */
  async retrieve(query: string, k: number, category?: Category): Promise<RetrievedExample[]> {
    if (k <= 0 || this.corpus.size === 0) {
      return [];
    }

    const startTime = Date.now();
    const ranking = rankBySimilarity(await this.index.embedQuery(query), this.index);
    const results = this.collect(ranking, k, category);

    logger.debug(
      `Retrieved ${results.length}/${k} examples${category ? ` in ${category}` : ''} in ${Date.now() - startTime}ms`,
      { query: query.substring(0, 50) }
    );
    return results;
  }

  /**
   * Retrieve up to `perCategory` posts from each category, in the order the
   * categories are given. The query is embedded once.
   *
   * Used to show the model a spread of post kinds rather than the posts
   * nearest to a single theme.
   */
  async retrieveByCategories(
    query: string,
    perCategory: number,
    categories: readonly Category[]
  ): Promise<RetrievedExample[]> {
    if (perCategory <= 0 || categories.length === 0 || this.corpus.size === 0) {
      return [];
    }

    const ranking = rankBySimilarity(await this.index.embedQuery(query), this.index);
    const results = categories.flatMap((category) => this.collect(ranking, perCategory, category));

    logger.debug(`Retrieved ${results.length} examples across ${categories.length} categories`);
    return results;
  }

  private collect(ranking: readonly ScoredId[], k: number, category?: Category): RetrievedExample[] {
    const results: RetrievedExample[] = [];

    for (const { id, similarity } of ranking) {
      if (results.length >= k) break;

      const entry = this.corpus.get(id);
      if (!entry) continue;
      if (category && entry.metadata.category !== category) continue;

      results.push({ entry, similarity });
    }

    return results;
  }
}

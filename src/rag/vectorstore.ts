/**
 * Vector Store Module
 *
 * Holds one embedding per corpus entry, in memory. The whole corpus fits in
 * memory, so there is no external vector database: search is a linear scan
 * in the retriever.
 *
 * HOW IT WORKS:
 * -------------
 * 1. Build: embed every corpus text with ONE batched call
 * 2. Store: keep vectors in an array indexed by entry id
 * 3. Query: embed query text with the same embedding function
 *
 * An index owns its embedding function. Queries are embedded through the
 * index, so corpus and query vectors always come from the same model.
 */

import { createModuleLogger, errorMessage } from '../utils/logger.js';
import { EmbeddingServiceError } from '../utils/errors.js';
import type { CorpusStore } from './corpus.js';
import type { EmbeddingFunction, EmbeddingVector } from './embeddings.js';

const logger = createModuleLogger('vectorstore');

/**
 * A stored vector and the id of the corpus entry it belongs to.
 */
export interface IndexedVector {
  id: number;
  vector: EmbeddingVector;
}

/**
 * Check that `vectors` has exactly `expected` entries of one shared,
 * non-zero dimension. Returns that dimension.
 */
function validateVectors(
  vectors: unknown,
  expected: number,
  stage: 'index' | 'query'
): number {
  if (!Array.isArray(vectors) || vectors.length !== expected) {
    const got = Array.isArray(vectors) ? vectors.length : typeof vectors;
    throw new EmbeddingServiceError(
      `Embedding service returned ${got} vectors for ${expected} texts`,
      stage
    );
  }

  let dimensions = 0;
  for (let i = 0; i < vectors.length; i++) {
    const vector: unknown = vectors[i];
    if (!Array.isArray(vector) || vector.length === 0) {
      throw new EmbeddingServiceError(`Embedding ${i} is missing or empty`, stage);
    }
    if (!vector.every((component) => typeof component === 'number' && Number.isFinite(component))) {
      throw new EmbeddingServiceError(`Embedding ${i} has a non-finite component`, stage);
    }
    if (dimensions === 0) {
      dimensions = vector.length;
    } else if (vector.length !== dimensions) {
      throw new EmbeddingServiceError(
        `Embedding ${i} has ${vector.length} dimensions, expected ${dimensions}`,
        stage
      );
    }
  }
  return dimensions;
}

/**
 * In-memory embedding index over a corpus.
 */
export class EmbeddingIndex {
  private constructor(
    private readonly vectors: readonly EmbeddingVector[],
    private readonly embed: EmbeddingFunction,
    readonly dimensions: number
  ) {}

  /**
   * Embed the whole corpus with a single call to `embed`.
   *
   * @throws EmbeddingServiceError (stage `index`) if the call fails or
   *   returns malformed vectors; no partial index is ever returned
   */
  static async build(corpus: CorpusStore, embed: EmbeddingFunction): Promise<EmbeddingIndex> {
    if (corpus.size === 0) {
      logger.warn('Corpus is empty, building an empty index');
      return new EmbeddingIndex([], embed, 0);
    }

    logger.info(`Embedding ${corpus.size} posts...`);
    const startTime = Date.now();

    let vectors: number[][];
    try {
      vectors = await embed(corpus.texts());
    } catch (error) {
      logger.error(`Failed to build embedding index: ${errorMessage(error)}`);
      throw new EmbeddingServiceError('Embedding service failed while building the index', 'index', {
        cause: error,
      });
    }

    const dimensions = validateVectors(vectors, corpus.size, 'index');
    const frozen = vectors.map((vector) => Object.freeze([...vector]));

    logger.info(`Index built: ${frozen.length} vectors x ${dimensions} dims in ${Date.now() - startTime}ms`);
    return new EmbeddingIndex(Object.freeze(frozen), embed, dimensions);
  }

  get size(): number {
    return this.vectors.length;
  }

  /**
   * Vector of the entry with the given id.
   *
   * @throws RangeError for ids outside the corpus
   */
  vectorFor(id: number): EmbeddingVector {
    const vector = this.vectors[id];
    if (vector === undefined) {
      throw new RangeError(`No vector for entry ${id}`);
    }
    return vector;
  }

  all(): IndexedVector[] {
    return this.vectors.map((vector, id) => ({ id, vector }));
  }

  /**
   * Embed a query with the function that built this index.
   *
   * @throws EmbeddingServiceError (stage `query`)
   */
  async embedQuery(text: string): Promise<EmbeddingVector> {
    let vectors: number[][];
    try {
      vectors = await this.embed([text]);
    } catch (error) {
      throw new EmbeddingServiceError('Embedding service failed for the query', 'query', {
        cause: error,
      });
    }

    const dimensions = validateVectors(vectors, 1, 'query');
    if (this.dimensions !== 0 && dimensions !== this.dimensions) {
      throw new EmbeddingServiceError(
        `Query embedding has ${dimensions} dimensions, index has ${this.dimensions}`,
        'query'
      );
    }
    return vectors[0];
  }
}

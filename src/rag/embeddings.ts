/**
 * Embeddings Module
 *
 * Converts text into vectors with OpenAI's embedding API and compares them
 * with cosine similarity. Posts about similar things end up with vectors
 * pointing in similar directions, which is what the retriever ranks by.
 *
 * The rest of the system only sees the `EmbeddingFunction` signature, so
 * tests and alternative providers can plug in any deterministic embedder.
 */

import { createModuleLogger } from '../utils/logger.js';

const logger = createModuleLogger('embeddings');

/**
 * Embed an ordered batch of texts. The result has one vector per input, in
 * input order, all of the same length.
 */
export type EmbeddingFunction = (texts: readonly string[]) => Promise<number[][]>;

export type EmbeddingVector = readonly number[];

// OpenAI allows up to 2048 inputs per request, but we stay conservative
const MAX_BATCH_SIZE = 100;
const RATE_LIMIT_DELAY_MS = 100;

/**
 * The slice of the OpenAI client the embedder needs.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

export interface OpenAIEmbedderOptions {
  model: string;
  batchSize?: number;
  delayMs?: number;
}

/**
 * Create an embedding function backed by the OpenAI embeddings endpoint.
 *
 * Large inputs are sent in slices; results are placed back by their
 * `index` so positions always line up with the input.
 *
 * @example
 * const embed = createOpenAIEmbedder(openai, { model: 'text-embedding-3-small' });
 * const [vector] = await embed(['Свечи на кокосовом воске']);
 */
export function createOpenAIEmbedder(
  client: EmbeddingsClient,
  options: OpenAIEmbedderOptions
): EmbeddingFunction {
  const { model, batchSize = MAX_BATCH_SIZE, delayMs = RATE_LIMIT_DELAY_MS } = options;

  return async (texts) => {
    const results: number[][] = [];
    const batches = Math.ceil(texts.length / batchSize);

    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);
      if (batches > 1) {
        logger.info(`Processing embedding batch ${i / batchSize + 1}/${batches}`);
      }

      const response = await client.embeddings.create({ model, input: batch });

      for (const item of response.data) {
        results[i + item.index] = item.embedding;
      }

      // Small delay between batches to avoid rate limits
      if (delayMs > 0 && i + batchSize < texts.length) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
    }

    logger.debug(`Created ${results.length} embeddings with ${model}`);
    return results;
  };
}

/**
 * Cosine similarity between two vectors, in [-1, 1].
 *
 * Returns 0 when either vector has zero magnitude instead of dividing by
 * zero.
 *
 * @throws Error if the vectors differ in length
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);

  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

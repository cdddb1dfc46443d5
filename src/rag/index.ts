/**
 * RAG Module Index
 *
 * QUICK START:
 * ------------
 *
 *    ```typescript
 *    import { CorpusStore, EmbeddingIndex, Retriever, loadCorpus } from './rag/index.js';
 *
 *    const corpus = CorpusStore.fromTexts(await loadCorpus('./data/posts.json'));
 *    const index = await EmbeddingIndex.build(corpus, embed);
 *    const retriever = new Retriever(corpus, index);
 *
 *    const examples = await retriever.retrieve('зимние ароматы', 4);
 *    ```
 */

// Corpus - Prior posts and their tags
export { CorpusStore, loadCorpus, parseCorpus, type CorpusEntry } from './corpus.js';
export { tagPost, type PostMetadata } from './tagger.js';
export { CATEGORIES, SEASONS, TOPICS, type Category, type Season, type Topic } from './rules.js';

// Embeddings - Convert text to vectors
export {
  createOpenAIEmbedder,
  cosineSimilarity,
  type EmbeddingFunction,
  type EmbeddingVector,
  type EmbeddingsClient,
} from './embeddings.js';

// Vector Store - One vector per corpus entry
export { EmbeddingIndex, type IndexedVector } from './vectorstore.js';

// Retriever - Similarity search
export { Retriever, rankBySimilarity, type RetrievedExample, type ScoredId } from './retriever.js';

/**
 * Debug script to test retrieval against the real corpus and embeddings
 * Run with: npx tsx scripts/test-rag.ts ["query"]
 */

import { config } from '../src/config/index.js';
import { createOpenAIServices } from '../src/bootstrap.js';
import { CorpusStore, EmbeddingIndex, Retriever, loadCorpus, type RetrievedExample } from '../src/rag/index.js';

function printResults(results: RetrievedExample[]): void {
  console.log(`Found ${results.length} results:`);
  results.forEach((r, i) => {
    const preview = r.entry.text.substring(0, 100).replace(/\n/g, ' ');
    console.log(`${i + 1}. [${r.entry.metadata.category}] ${preview}... (score: ${r.similarity.toFixed(3)})`);
  });
}

async function main() {
  console.log('Loading corpus...');
  const corpus = CorpusStore.fromTexts(await loadCorpus(config.corpus.path));
  console.log(`Total posts: ${corpus.size}`);
  console.log('By category:', corpus.countByCategory());

  if (corpus.size === 0) {
    console.log('Corpus is empty!');
    return;
  }

  const { embed } = createOpenAIServices(config);
  const index = await EmbeddingIndex.build(corpus, embed);
  const retriever = new Retriever(corpus, index);

  const query = process.argv[2] ?? 'праздничное поздравление';

  console.log(`\n--- Test 1: Search "${query}" without category filter ---`);
  printResults(await retriever.retrieve(query, 5));

  console.log(`\n--- Test 2: Search "${query}" in seasonal ---`);
  printResults(await retriever.retrieve(query, 5, 'seasonal'));

  console.log('\n--- Test 3: Spread across categories for "свечи" ---');
  printResults(
    await retriever.retrieveByCategories('свечи', 2, ['educational', 'seasonal', 'fragrance', 'decor', 'commercial'])
  );
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

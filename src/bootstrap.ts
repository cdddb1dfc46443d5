/**
 * Startup wiring shared by the HTTP server and the terminal session:
 * corpus → embedding index → retriever → content agent.
 *
 * Every step must succeed; a corpus or index failure is fatal to the
 * caller and nothing is served from a partial index.
 */

import { createModuleLogger } from './utils/logger.js';
import { CorpusStore, loadCorpus } from './rag/corpus.js';
import { createOpenAIEmbedder, type EmbeddingFunction } from './rag/embeddings.js';
import { EmbeddingIndex } from './rag/vectorstore.js';
import { Retriever } from './rag/retriever.js';
import { ContentAgent } from './agents/agent.js';
import { createOpenAIClient, createOpenAICompletion, type CompletionFunction } from './agents/llm.js';
import type { Config } from './config/schema.js';

const logger = createModuleLogger('bootstrap');

export interface AssistantOptions {
  corpusPath: string;
  embed: EmbeddingFunction;
  complete: CompletionFunction;
}

export interface Assistant {
  corpus: CorpusStore;
  index: EmbeddingIndex;
  retriever: Retriever;
  agent: ContentAgent;
}

export async function createAssistant(options: AssistantOptions): Promise<Assistant> {
  const texts = await loadCorpus(options.corpusPath);
  const corpus = CorpusStore.fromTexts(texts);

  const counts = Object.entries(corpus.countByCategory())
    .filter(([, count]) => count > 0)
    .map(([category, count]) => `${category}=${count}`)
    .join(', ');
  logger.info(`Corpus tagged: ${counts || 'empty'}`);

  const index = await EmbeddingIndex.build(corpus, options.embed);
  const retriever = new Retriever(corpus, index);
  const agent = new ContentAgent({ retriever, complete: options.complete });

  return { corpus, index, retriever, agent };
}

/**
 * Embedding and completion functions backed by one OpenAI client.
 */
export function createOpenAIServices(config: Config): Pick<AssistantOptions, 'embed' | 'complete'> {
  const client = createOpenAIClient({
    apiKey: config.ai.openaiApiKey,
    baseUrl: config.ai.baseUrl,
    timeoutMs: config.ai.timeoutMs,
  });

  logger.info(`Models: completion=${config.ai.completionModel}, embedding=${config.ai.embeddingModel}`);

  return {
    embed: createOpenAIEmbedder(client, { model: config.ai.embeddingModel }),
    complete: createOpenAICompletion(client, config.ai.completionModel),
  };
}

export function createAssistantFromConfig(config: Config): Promise<Assistant> {
  return createAssistant({ corpusPath: config.corpus.path, ...createOpenAIServices(config) });
}

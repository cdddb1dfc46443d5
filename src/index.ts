/**
 * Content Assistant - HTTP Server Entry Point
 *
 * Loads the corpus, builds the embedding index and serves the JSON API.
 * Startup failures exit with code 1.
 */

import { serve } from '@hono/node-server';
import { config } from './config/index.js';
import { createModuleLogger } from './utils/logger.js';
import { describeError } from './utils/errors.js';
import { createAssistantFromConfig } from './bootstrap.js';
import { createHttpApp } from './channels/http.js';
import { InMemoryConversationStore } from './memory/conversations.js';
import { ConversationSweeper } from './memory/sweeper.js';

const logger = createModuleLogger('main');

let server: ReturnType<typeof serve> | null = null;
let conversations: InMemoryConversationStore | null = null;
let sweeper: ConversationSweeper | null = null;

async function main(): Promise<void> {
  logger.info('='.repeat(50));
  logger.info('Starting content assistant');
  logger.info('='.repeat(50));

  try {
    const { corpus, agent } = await createAssistantFromConfig(config);

    logger.info('Initializing conversation store...');
    conversations = new InMemoryConversationStore({
      ttlMs: config.conversations.ttlMinutes * 60 * 1000,
      maxTurns: config.conversations.maxTurns,
      contextTurns: config.conversations.contextTurns,
    });

    sweeper = new ConversationSweeper(conversations, config.conversations.evictionCron);
    sweeper.start();

    const app = createHttpApp({
      agent,
      conversations,
      corpusSize: corpus.size,
      corsOrigins: config.server.corsOrigins,
    });

    server = serve({ fetch: app.fetch, hostname: config.server.host, port: config.server.port }, (info) => {
      logger.info('='.repeat(50));
      logger.info(`Content assistant listening on http://${info.address}:${info.port}`);
      logger.info(`Corpus: ${corpus.size} posts`);
      logger.info(`Model: ${config.ai.completionModel}`);
      logger.info('='.repeat(50));
    });
  } catch (error) {
    logger.error('Failed to start application', { error: describeError(error) });
    process.exit(1);
  }
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down...`);

  try {
    sweeper?.stop();

    const running = server;
    if (running) {
      await new Promise<void>((resolve, reject) => {
        running.close((error) => (error ? reject(error) : resolve()));
      });
    }

    conversations?.close();
    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: describeError(error) });
    process.exit(1);
  }
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: describeError(reason) });
});

void main();

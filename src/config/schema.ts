import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

// Configuration schema with validation
export const ConfigSchema = z.object({
  // AI Model Configuration
  ai: z.object({
    openaiApiKey: z.string().min(1, 'OPENAI_API_KEY is required'),
    baseUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive().default(60000),
    completionModel: z.string().default('gpt-4o-mini'),
    embeddingModel: z.string().default('text-embedding-3-small'),
  }),

  // Corpus of prior posts
  corpus: z.object({
    path: z.string().default('./data/posts.json'),
  }),

  // HTTP server
  server: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().min(1).max(65535).default(8000),
    corsOrigins: z.array(z.string()).default(['http://localhost:3000', 'http://127.0.0.1:3000']),
  }),

  // Conversation memory
  conversations: z.object({
    ttlMinutes: z.number().int().positive().default(120),
    maxTurns: z.number().int().positive().default(20),
    contextTurns: z.number().int().positive().default(6),
    evictionCron: z.string().default('*/10 * * * *'),
  }),

  // Application Settings
  app: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function parseArray(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Build and validate configuration from an environment map.
 * Unset variables fall back to the schema defaults.
 *
 * @throws ConfigError listing every validation issue
 */
export function parseConfig(env: Env): Config {
  const rawConfig = {
    ai: {
      openaiApiKey: env.OPENAI_API_KEY ?? '',
      baseUrl: env.OPENAI_BASE_URL || undefined,
      timeoutMs: parseNumber(env.OPENAI_TIMEOUT_MS),
      completionModel: env.COMPLETION_MODEL || undefined,
      embeddingModel: env.EMBEDDING_MODEL || undefined,
    },
    corpus: {
      path: env.CORPUS_PATH || undefined,
    },
    server: {
      host: env.HOST || undefined,
      port: parseNumber(env.PORT),
      corsOrigins: parseArray(env.CORS_ORIGINS),
    },
    conversations: {
      ttlMinutes: parseNumber(env.CONVERSATION_TTL_MINUTES),
      maxTurns: parseNumber(env.CONVERSATION_MAX_TURNS),
      contextTurns: parseNumber(env.CONVERSATION_CONTEXT_TURNS),
      evictionCron: env.EVICTION_CRON || undefined,
    },
    app: {
      logLevel: env.LOG_LEVEL || undefined,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new ConfigError('Configuration validation failed', issues);
  }

  return result.data;
}

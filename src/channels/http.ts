/**
 * HTTP Channel
 *
 * JSON API over the content agent. `/chat` routes free-form messages and
 * records the exchange per `chat_id`; the task endpoints run one task kind
 * and only read the conversation.
 */

import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import { createModuleLogger } from '../utils/logger.js';
import { AssistantError, EmbeddingServiceError, GenerationError, describeError } from '../utils/errors.js';
import type { ContentAgent } from '../agents/agent.js';
import type { TaskKind } from '../agents/prompts.js';
import type { ConversationStore } from '../memory/conversations.js';
import { routeMessage } from './router.js';

const logger = createModuleLogger('http');

export interface HttpDependencies {
  agent: Pick<ContentAgent, 'run'>;
  conversations: ConversationStore;
  corpusSize: number;
  corsOrigins?: string[];
}

const ChatRequestSchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty'),
  message_type: z.string().nullish(),
  // An empty chat_id means no conversation
  chat_id: z.string().nullish(),
});

// Ideas may be requested without a theme
const IdeasRequestSchema = ChatRequestSchema.extend({
  message: z.string().trim().default(''),
});

type ChatRequest = z.infer<typeof ChatRequestSchema>;

const ENDPOINTS = [
  '/chat - Main chat interface',
  '/generate-post - Generate Telegram posts',
  '/generate-ideas - Generate post ideas',
  '/research-topic - Research topics for content',
  '/refine - Revise earlier content in a chat',
];

class RequestValidationError extends Error {
  constructor(public readonly details: string[]) {
    super('Invalid request');
    this.name = 'RequestValidationError';
  }
}

async function readBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new RequestValidationError(['body must be valid JSON']);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new RequestValidationError(
      result.error.errors.map((err) => `${err.path.join('.') || 'body'}: ${err.message}`)
    );
  }
  return result.data;
}

function statusFor(error: unknown): 500 | 502 | 503 {
  if (error instanceof GenerationError) return 502;
  if (error instanceof EmbeddingServiceError) return 503;
  return 500;
}

/**
 * Build the Hono app. Serving it is left to the caller.
 */
export function createHttpApp(deps: HttpDependencies): Hono {
  const { agent, conversations, corpusSize, corsOrigins = [] } = deps;
  const app = new Hono();

  app.use(
    '*',
    cors({
      origin: corsOrigins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      credentials: true,
    })
  );

  app.onError((error, c) => {
    if (error instanceof RequestValidationError) {
      return c.json({ error: error.message, details: error.details, status: 'error' }, 400);
    }

    const status = statusFor(error);
    const stage = error instanceof AssistantError ? error.stage : 'internal';
    logger.error(`Request to ${c.req.path} failed: ${describeError(error)}`, { stage });
    return c.json({ error: error.message, stage, status: 'error' }, status);
  });

  const healthReport = () => {
    conversations.evict();
    return {
      message: 'Content assistant API is running',
      status: 'healthy',
      corpus_size: corpusSize,
      active_conversations: conversations.size(),
    };
  };

  app.get('/', (c) => c.json(healthReport()));

  app.get('/health', (c) => c.json({ ...healthReport(), endpoints: ENDPOINTS }));

  app.post('/chat', async (c) => {
    const { message, message_type, chat_id } = await readBody(c, ChatRequestSchema);
    conversations.evict();

    logger.info(`Processing message: ${message.substring(0, 50)}...`, {
      type: message_type ?? 'general',
      chat: chat_id || null,
    });

    if (!chat_id) {
      const routed = routeMessage(message, { explicitType: message_type });
      const response = await agent.run(routed.taskKind, routed.request);
      return c.json({ response, message_type: routed.taskKind, status: 'success' });
    }

    const result = await conversations.withLock(chat_id, async () => {
      conversations.append(chat_id, { role: 'user', content: message });
      const hasHistory = conversations.get(chat_id).length > 1;
      const context = conversations.renderContext(chat_id);

      const routed = routeMessage(message, { explicitType: message_type, hasHistory });
      const response = await agent.run(routed.taskKind, routed.request, context);

      conversations.append(chat_id, { role: 'assistant', content: response });
      return { response, taskKind: routed.taskKind };
    });

    return c.json({ response: result.response, message_type: result.taskKind, status: 'success' });
  });

  const taskEndpoint = (path: string, taskKind: TaskKind, schema: typeof ChatRequestSchema | typeof IdeasRequestSchema) => {
    app.post(path, async (c) => {
      const body: ChatRequest = await readBody(c, schema);
      const context = body.chat_id ? conversations.renderContext(body.chat_id) : '';
      const response = await agent.run(taskKind, body.message, context);
      return c.json({ response, message_type: taskKind, status: 'success' });
    });
  };

  taskEndpoint('/generate-post', 'post', ChatRequestSchema);
  taskEndpoint('/generate-ideas', 'ideas', IdeasRequestSchema);
  taskEndpoint('/research-topic', 'research', ChatRequestSchema);
  taskEndpoint('/refine', 'refinement', ChatRequestSchema);

  return app;
}

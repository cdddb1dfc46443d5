/**
 * Completion client.
 *
 * The agent depends only on `CompletionFunction`; the OpenAI chat
 * completions endpoint is the production implementation.
 */

import OpenAI from 'openai';
import { createModuleLogger } from '../utils/logger.js';

const logger = createModuleLogger('llm');

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Generate text for one system/user prompt pair. Fallible; callers decide
 * whether to retry.
 */
export type CompletionFunction = (request: CompletionRequest) => Promise<string>;

export interface OpenAIClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Create the shared OpenAI client. SDK retries are disabled: a failed call
 * surfaces to the caller as-is.
 */
export function createOpenAIClient(options: OpenAIClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });
}

/**
 * The slice of the OpenAI client the completion function needs.
 */
export interface ChatClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: 'system' | 'user'; content: string }>;
        temperature: number;
        max_tokens: number;
      }): Promise<{
        model?: string;
        choices: Array<{ message?: { content?: string | null } | null }>;
        usage?: { prompt_tokens?: number; completion_tokens?: number } | null;
      }>;
    };
  };
}

export function createOpenAICompletion(client: ChatClient, model: string): CompletionFunction {
  return async ({ systemPrompt, userPrompt, temperature, maxTokens }) => {
    const response = await client.chat.completions.create({
      model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      temperature,
      max_tokens: maxTokens,
    });

    logger.debug('Completion received', {
      model: response.model ?? model,
      promptTokens: response.usage?.prompt_tokens,
      completionTokens: response.usage?.completion_tokens,
    });

    return response.choices[0]?.message?.content ?? '';
  };
}

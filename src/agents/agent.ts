/**
 * Content Agent
 *
 * One operation per task kind. Each operation retrieves example posts,
 * composes the prompts and asks the model once; the completion text is
 * returned unmodified.
 *
 * Failures are not retried. A failed completion becomes a GenerationError;
 * a failed query embedding propagates as the retriever's
 * EmbeddingServiceError.
 */

import { createModuleLogger, errorMessage } from '../utils/logger.js';
import { GenerationError } from '../utils/errors.js';
import type { Retriever, RetrievedExample } from '../rag/retriever.js';
import type { CompletionFunction } from './llm.js';
import { composePrompt, TASK_PROFILES, type TaskKind } from './prompts.js';

const logger = createModuleLogger('agent');

export interface AgentDependencies {
  retriever: Retriever;
  complete: CompletionFunction;
}

export interface RunOptions {
  /** Number of ideas requested from the `ideas` task. */
  ideaCount?: number;
}

export class ContentAgent {
  private readonly retriever: Retriever;
  private readonly complete: CompletionFunction;

  constructor(deps: AgentDependencies) {
    this.retriever = deps.retriever;
    this.complete = deps.complete;
  }

  writePost(request: string, conversationContext = ''): Promise<string> {
    return this.generate('post', request, conversationContext);
  }

  /**
   * Suggest post ideas. Without a theme, examples are spread across several
   * post categories instead of ranked against the theme.
   */
  generateIdeas(theme = '', conversationContext = '', ideaCount?: number): Promise<string> {
    return this.generate('ideas', theme, conversationContext, { ideaCount });
  }

  researchTopic(topic: string, conversationContext = ''): Promise<string> {
    return this.generate('research', topic, conversationContext);
  }

  refineContent(request: string, conversationContext = ''): Promise<string> {
    return this.generate('refinement', request, conversationContext);
  }

  converse(message: string, conversationContext = ''): Promise<string> {
    return this.generate('conversation', message, conversationContext);
  }

  /**
   * Dispatch a request to the operation for `taskKind`.
   */
  run(taskKind: TaskKind, request: string, conversationContext = '', options: RunOptions = {}): Promise<string> {
    switch (taskKind) {
      case 'post':
        return this.writePost(request, conversationContext);
      case 'ideas':
        return this.generateIdeas(request, conversationContext, options.ideaCount);
      case 'research':
        return this.researchTopic(request, conversationContext);
      case 'refinement':
        return this.refineContent(request, conversationContext);
      case 'conversation':
        return this.converse(request, conversationContext);
      default: {
        const unknownKind: never = taskKind;
        throw new Error(`Unknown task kind: ${String(unknownKind)}`);
      }
    }
  }

  private selectExamples(taskKind: TaskKind, request: string): Promise<RetrievedExample[]> {
    const profile = TASK_PROFILES[taskKind];

    if (profile.spread && request.trim() === '') {
      const { query, perCategory, categories } = profile.spread;
      return this.retriever.retrieveByCategories(query, perCategory, categories);
    }

    return this.retriever.retrieve(request, profile.exampleCount);
  }

  private async generate(
    taskKind: TaskKind,
    request: string,
    conversationContext: string,
    options: RunOptions = {}
  ): Promise<string> {
    const profile = TASK_PROFILES[taskKind];
    logger.info(`Generating ${taskKind} for request: "${request.substring(0, 50)}"`);

    const examples = await this.selectExamples(taskKind, request);
    const { systemPrompt, userPrompt } = composePrompt({
      taskKind,
      request,
      examples,
      conversationContext,
      ideaCount: options.ideaCount,
    });

    let text: string;
    try {
      text = await this.complete({
        systemPrompt,
        userPrompt,
        temperature: profile.temperature,
        maxTokens: profile.maxTokens,
      });
    } catch (error) {
      logger.error(`Completion failed for ${taskKind}: ${errorMessage(error)}`);
      throw new GenerationError(`Completion failed for ${taskKind}`, taskKind, { cause: error });
    }

    if (text.trim() === '') {
      throw new GenerationError(`Completion for ${taskKind} returned no content`, taskKind);
    }

    logger.info(`Generated ${taskKind} (${text.length} chars, ${examples.length} examples)`);
    return text;
  }
}

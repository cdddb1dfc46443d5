/**
 * Error taxonomy for the assistant.
 *
 * Every error carries the pipeline stage it came from and, where there is
 * one, the underlying cause, so callers can tell "nothing relevant found"
 * (an empty result, never an error) from "the system is broken".
 */

export type ErrorStage = 'config' | 'corpus' | 'index' | 'query' | 'completion';

/**
 * Base class for all assistant errors.
 */
export abstract class AssistantError extends Error {
  constructor(
    message: string,
    public readonly stage: ErrorStage,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid or missing configuration. Fatal at startup.
 */
export class ConfigError extends AssistantError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'config');
  }
}

/**
 * The corpus source is missing or is not a flat list of post texts.
 * Fatal at startup: the process does not serve without a corpus.
 */
export class CorpusLoadError extends AssistantError {
  constructor(
    message: string,
    public readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'corpus', options);
  }
}

/**
 * The embedding function failed or returned malformed vectors.
 *
 * Stage `index` happens while building the index at startup and is fatal;
 * stage `query` happens while embedding a retrieval query and fails only
 * that request.
 */
export class EmbeddingServiceError extends AssistantError {
  constructor(
    message: string,
    stage: 'index' | 'query',
    options?: { cause?: unknown }
  ) {
    super(message, stage, options);
  }
}

/**
 * The completion call failed. Per request; never retried by the core.
 */
export class GenerationError extends AssistantError {
  constructor(
    message: string,
    public readonly taskKind: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'completion', options);
  }
}

/**
 * Describe an error together with its cause chain, e.g.
 * `Completion failed for post: 429 quota exceeded`.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause;
  if (cause === undefined) {
    return error.message;
  }
  return `${error.message}: ${describeError(cause)}`;
}

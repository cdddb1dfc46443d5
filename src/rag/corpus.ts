/**
 * Corpus Module
 *
 * Loads the fixed collection of prior posts and tags each one. The corpus is
 * built once at startup and is read-only afterwards: entries and their
 * metadata are frozen, and re-ingestion means restarting the process.
 *
 * SOURCE FORMAT:
 * --------------
 * A JSON file holding a flat, ordered array of post strings:
 *
 *   ["Первый пост ...", "Второй пост ...", ...]
 *
 * Array order becomes the entry id: the first post is id 0.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { createModuleLogger, errorMessage } from '../utils/logger.js';
import { CorpusLoadError } from '../utils/errors.js';
import { tagPost, type PostMetadata } from './tagger.js';
import type { Category } from './rules.js';

const logger = createModuleLogger('corpus');

const CorpusFileSchema = z.array(z.string());

/**
 * One post of the corpus.
 */
export interface CorpusEntry {
  readonly id: number;
  readonly text: string;
  readonly metadata: Readonly<PostMetadata>;
}

/**
 * Parse corpus file contents into the ordered list of post texts.
 * Blank posts are dropped; everything else is kept as-is, duplicates included.
 *
 * @param raw - File contents
 * @param source - Path or label used in error messages
 */
export function parseCorpus(raw: string, source: string): string[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new CorpusLoadError(`Corpus ${source} is not valid JSON`, source, { cause: error });
  }

  const result = CorpusFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? ` at [${issue.path.join('.')}]` : '';
    throw new CorpusLoadError(
      `Corpus ${source} must be a flat array of strings${where}`,
      source,
      { cause: result.error }
    );
  }

  const texts = result.data.filter((text) => text.trim().length > 0);
  const skipped = result.data.length - texts.length;
  if (skipped > 0) {
    logger.warn(`Skipped ${skipped} blank posts in ${source}`);
  }
  return texts;
}

/**
 * Read and parse the corpus file.
 *
 * @throws CorpusLoadError if the file is missing, unreadable or malformed
 */
export async function loadCorpus(path: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    logger.error(`Could not read corpus: ${errorMessage(error)}`);
    throw new CorpusLoadError(`Corpus file ${path} could not be read`, path, { cause: error });
  }

  const texts = parseCorpus(raw, path);
  logger.info(`Loaded ${texts.length} posts from ${path}`);
  return texts;
}

/**
 * Immutable, tagged view of the corpus.
 */
export class CorpusStore {
  private readonly items: readonly CorpusEntry[];

  private constructor(items: CorpusEntry[]) {
    this.items = Object.freeze(items);
  }

  /**
   * Build entries from texts, assigning ids by position.
   */
  static fromTexts(
    texts: readonly string[],
    tag: (text: string) => PostMetadata = tagPost
  ): CorpusStore {
    const entries = texts.map((text, id) => {
      const metadata = tag(text);
      Object.freeze(metadata.topics);
      return Object.freeze({ id, text, metadata: Object.freeze(metadata) });
    });
    return new CorpusStore(entries);
  }

  get size(): number {
    return this.items.length;
  }

  get entries(): readonly CorpusEntry[] {
    return this.items;
  }

  get(id: number): CorpusEntry | undefined {
    return this.items[id];
  }

  texts(): string[] {
    return this.items.map((entry) => entry.text);
  }

  countByCategory(): Record<Category, number> {
    const counts: Record<Category, number> = {
      educational: 0,
      seasonal: 0,
      fragrance: 0,
      decor: 0,
      commercial: 0,
      process: 0,
      general: 0,
    };
    for (const entry of this.items) {
      counts[entry.metadata.category] += 1;
    }
    return counts;
  }
}

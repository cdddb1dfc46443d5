/**
 * Conversation Memory
 *
 * Keeps the recent turns of each chat so follow-up requests ("make it
 * shorter") can see what was said before. Conversations expire after a
 * period of inactivity and keep only their newest turns.
 *
 * History lives in process memory and is lost on restart.
 */

import { createModuleLogger } from '../utils/logger.js';

const logger = createModuleLogger('conversations');

export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
  /** Epoch milliseconds. */
  timestamp: number;
}

export interface NewTurn {
  role: TurnRole;
  content: string;
  timestamp?: number;
}

export interface ConversationStore {
  /** Turns of a live conversation, oldest first; `[]` if unknown or expired. */
  get(key: string): ConversationTurn[];
  append(key: string, turn: NewTurn): void;
  /** Drop conversations inactive for longer than the TTL. Returns how many. */
  evict(now?: number): number;
  /** Number of live conversations. */
  size(): number;
  /** Recent turns rendered for a prompt, or `''` when there are none. */
  renderContext(key: string, maxTurns?: number): string;
  /** Run `fn` exclusively for `key`; calls for the same key queue up. */
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
  close(): void;
}

export interface InMemoryConversationStoreOptions {
  ttlMs?: number;
  maxTurns?: number;
  contextTurns?: number;
  clock?: () => number;
}

export const DEFAULT_TTL_MS = 2 * 60 * 60 * 1000;
export const DEFAULT_MAX_TURNS = 20;
export const DEFAULT_CONTEXT_TURNS = 6;

const CONTEXT_HEADER = '\n\n--- КОНТЕКСТ РАЗГОВОРА ---\n';
const ROLE_LABELS: Record<TurnRole, string> = {
  user: 'Пользователь',
  assistant: 'Ты',
};

interface Conversation {
  turns: ConversationTurn[];
  lastActivity: number;
}

export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, Conversation>();
  private readonly ttlMs: number;
  private readonly maxTurns: number;
  private readonly contextTurns: number;
  private readonly clock: () => number;
  private readonly locks = new Map<string, Promise<void>>();

  constructor(options: InMemoryConversationStoreOptions = {}) {
    const {
      ttlMs = DEFAULT_TTL_MS,
      maxTurns = DEFAULT_MAX_TURNS,
      contextTurns = DEFAULT_CONTEXT_TURNS,
      clock = Date.now,
    } = options;

    this.ttlMs = ttlMs;
    this.maxTurns = maxTurns;
    this.contextTurns = contextTurns;
    this.clock = clock;
  }

  private isExpired(conversation: Conversation, now: number): boolean {
    return now - conversation.lastActivity > this.ttlMs;
  }

  get(key: string): ConversationTurn[] {
    const conversation = this.conversations.get(key);
    if (!conversation || this.isExpired(conversation, this.clock())) {
      return [];
    }
    return conversation.turns.map((turn) => ({ ...turn }));
  }

  append(key: string, turn: NewTurn): void {
    const timestamp = turn.timestamp ?? this.clock();
    let conversation = this.conversations.get(key);

    // Expired but not yet swept: start over
    if (!conversation || this.isExpired(conversation, timestamp)) {
      conversation = { turns: [], lastActivity: timestamp };
      this.conversations.set(key, conversation);
    }

    conversation.turns.push({ role: turn.role, content: turn.content, timestamp });
    if (conversation.turns.length > this.maxTurns) {
      conversation.turns.splice(0, conversation.turns.length - this.maxTurns);
    }
    conversation.lastActivity = timestamp;
  }

  evict(now: number = this.clock()): number {
    let evicted = 0;
    for (const [key, conversation] of this.conversations) {
      if (this.isExpired(conversation, now)) {
        this.conversations.delete(key);
        evicted += 1;
      }
    }

    if (evicted > 0) {
      logger.info(`Evicted ${evicted} expired conversations`);
    }
    return evicted;
  }

  size(): number {
    const now = this.clock();
    let live = 0;
    for (const conversation of this.conversations.values()) {
      if (!this.isExpired(conversation, now)) live += 1;
    }
    return live;
  }

  renderContext(key: string, maxTurns: number = this.contextTurns): string {
    const turns = this.get(key).slice(-maxTurns);
    if (turns.length === 0) {
      return '';
    }

    const lines = turns.map((turn) => `${ROLE_LABELS[turn.role]}: ${turn.content}\n`);
    return CONTEXT_HEADER + lines.join('');
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    // The queue only orders callers; each caller still sees its own outcome
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }

  close(): void {
    this.conversations.clear();
  }
}

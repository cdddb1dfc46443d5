/**
 * Conversation Sweeper
 *
 * Periodically evicts expired conversations on a cron schedule so idle
 * chats do not accumulate between requests.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { createModuleLogger, errorMessage } from '../utils/logger.js';
import type { ConversationStore } from './conversations.js';

const logger = createModuleLogger('sweeper');

export class ConversationSweeper {
  private job: ScheduledTask | null = null;

  constructor(
    private readonly store: ConversationStore,
    private readonly cronExpression: string,
    private readonly clock: () => number = Date.now
  ) {
    if (!cron.validate(cronExpression)) {
      throw new Error(`Invalid eviction cron expression: ${cronExpression}`);
    }
  }

  get isRunning(): boolean {
    return this.job !== null;
  }

  start(): void {
    if (this.job) {
      logger.warn('Sweeper already running');
      return;
    }

    this.job = cron.schedule(this.cronExpression, () => {
      this.sweep();
    });
    logger.info(`Conversation sweeper scheduled with expression ${this.cronExpression}`);
  }

  stop(): void {
    if (!this.job) return;

    this.job.stop();
    this.job = null;
    logger.info('Conversation sweeper stopped');
  }

  /**
   * Evict now. Returns the number of conversations removed, or 0 if the
   * store failed (the failure is logged and the next run tries again).
   */
  sweep(): number {
    try {
      return this.store.evict(this.clock());
    } catch (error) {
      logger.error(`Conversation sweep failed: ${errorMessage(error)}`);
      return 0;
    }
  }
}

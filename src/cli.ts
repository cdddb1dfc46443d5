#!/usr/bin/env node
/**
 * Content Assistant - Terminal Entry Point
 */

import { config } from './config/index.js';
import { createModuleLogger } from './utils/logger.js';
import { describeError } from './utils/errors.js';
import { createAssistantFromConfig } from './bootstrap.js';
import { runTerminalSession } from './channels/terminal.js';

const logger = createModuleLogger('cli');

async function main(): Promise<void> {
  try {
    const { agent } = await createAssistantFromConfig(config);
    await runTerminalSession(agent);
  } catch (error) {
    logger.error('Failed to initialize assistant', { error: describeError(error) });
    process.exit(1);
  }
}

void main();

import dotenv from 'dotenv';
import { createModuleLogger, setLogLevel } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { parseConfig, type Config } from './schema.js';

dotenv.config();

const logger = createModuleLogger('config');

export type { Config } from './schema.js';

function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      error.issues.forEach((issue) => {
        logger.error(`  - ${issue}`);
      });
      process.exit(1);
    }
    throw error;
  }
}

export const config = loadConfig();
setLogLevel(config.app.logLevel);

import { afterEach, describe, expect, it } from 'vitest';
import { createModuleLogger, errorMessage, logger, setLogLevel } from './logger.js';

describe('setLogLevel', () => {
  const initial = logger.level;

  afterEach(() => {
    logger.level = initial;
  });

  it('changes the level of the shared logger', () => {
    setLogLevel('error');
    expect(logger.level).toBe('error');
    expect(logger.isLevelEnabled('warn')).toBe(false);
  });

  it('applies to module loggers created before the change', () => {
    const moduleLogger = createModuleLogger('retriever');

    setLogLevel('debug');

    expect(moduleLogger.isLevelEnabled('debug')).toBe(true);
  });
});

describe('errorMessage', () => {
  it('reads the message of an Error', () => {
    expect(errorMessage(new Error('timeout'))).toBe('timeout');
  });

  it('stringifies anything else', () => {
    expect(errorMessage(42)).toBe('42');
  });
});

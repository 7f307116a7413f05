import { afterEach, describe, it, expect } from 'vitest';
import { parseLogLevel, setLogLevel, setupLogger } from '@shared/utils/logger';

describe('parseLogLevel', () => {
  it('should accept known levels in any case', () => {
    expect(parseLogLevel('debug')).toBe('debug');
    expect(parseLogLevel('WARN')).toBe('warn');
    expect(parseLogLevel('Silent')).toBe('silent');
  });

  it('should fall back to info', () => {
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('verbose')).toBe('info');
  });
});

describe('setupLogger', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('should use an explicit level', () => {
    const logger = setupLogger('test:explicit', 'error');

    expect(logger.level).toBe('error');
  });

  it('should return one logger per name', () => {
    expect(setupLogger('test:shared')).toBe(setupLogger('test:shared'));
    expect(setupLogger('test:shared')).not.toBe(setupLogger('test:other'));
  });

  it('should change the level of existing loggers', () => {
    const logger = setupLogger('test:existing', 'info');

    setLogLevel('warn');

    expect(logger.level).toBe('warn');
    expect(process.env.LOG_LEVEL).toBe('warn');
  });

  it('should give new loggers the current level', () => {
    setLogLevel('DEBUG');

    expect(setupLogger('test:fresh').level).toBe('debug');
  });
});

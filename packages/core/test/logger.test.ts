import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from '../src/logger.js';

describe('createLogger', () => {
  it('honours the configured level', () => {
    const logger = createLogger({ level: 'warn', json: true });
    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  it('child loggers keep the level', () => {
    const child = createLogger({ level: 'debug', json: true }).child({ component: 'engine' });
    expect(child.level).toBe('debug');
  });

  it('silentLogger logs nothing', () => {
    expect(silentLogger().isLevelEnabled('error')).toBe(false);
  });
});

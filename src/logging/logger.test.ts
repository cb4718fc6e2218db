import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger, stderrLogger } from './logger.js';

describe('logger', () => {
  it('writes JSON lines with the given name and level', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'warn', name: 'engine', destination: { write: (line: string) => lines.push(line) } });

    logger.info('dropped');
    logger.warn({ tool: 'add' }, 'kept');

    expect(lines.map((line) => JSON.parse(line))).toMatchObject([{ level: 40, name: 'engine', tool: 'add', msg: 'kept' }]);
  });

  it('builds a stderr logger at the requested level', () => {
    expect(stderrLogger({ level: 'error' }).level).toBe('error');
  });

  it('builds a disabled logger', () => {
    expect(silentLogger().isLevelEnabled('error')).toBe(false);
  });
});

import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { createLogger, lazyLog } from '../../../src/utils/logger-helpers.js';

describe('logger-helpers', () => {
  describe('lazyLog', () => {
    it('should skip the context builder when the level is disabled', () => {
      const builder = vi.fn(() => ({ processId: 1 }));

      lazyLog(pino({ level: 'info' }), 'debug', builder, 'Process dispatched');
      lazyLog(undefined, 'debug', builder, 'Process dispatched');

      expect(builder).not.toHaveBeenCalled();
    });

    it('should log the built context when the level is enabled', () => {
      const lines: string[] = [];
      const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });
      const builder = vi.fn(() => ({ processId: 7, tier: 2 }));

      lazyLog(logger, 'debug', builder, 'Process dispatched');

      expect(builder).toHaveBeenCalledTimes(1);
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
        level: 20,
        processId: 7,
        tier: 2,
        msg: 'Process dispatched',
      });
    });
  });

  it('should create a named logger at the requested level', () => {
    const logger = createLogger('warn');

    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.bindings()).toMatchObject({ name: 'mlfq-sim' });
  });
});

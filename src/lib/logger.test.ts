import { describe, expect, it } from 'vitest';
import { createLogger, normalizeLogLevel } from './logger';

describe('logger', () => {
  it('drops entries below the minimum level', () => {
    const log = createLogger({ maxEntries: 10, minLevel: 'info', enableConsole: false });
    log.debug('SOCKET', 'noise');
    log.info('SOCKET', 'kept', { connId: 'c1' });

    const entries = log.getEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'info', category: 'SOCKET', message: 'kept', context: { connId: 'c1' } });
  });

  it('keeps only the most recent entries', () => {
    const log = createLogger({ maxEntries: 2, minLevel: 'debug', enableConsole: false });
    log.info('ROOM', 'one');
    log.info('ROOM', 'two');
    log.warn('ROOM', 'three');

    expect(log.getEntries().map((entry) => entry.message)).toEqual(['two', 'three']);
    expect(log.getEntryCount()).toBe(2);
  });

  it('returns entries added after an id', () => {
    const log = createLogger({ maxEntries: 10, minLevel: 'debug', enableConsole: false });
    log.info('AUTH', 'a');
    const [first] = log.getEntries();
    log.error('AUTH', 'b');

    expect(log.getEntriesSince(first?.id ?? 0).map((entry) => entry.message)).toEqual(['b']);
  });

  it('applies config changes', () => {
    const log = createLogger({ maxEntries: 10, minLevel: 'error', enableConsole: false });
    log.setConfig({ minLevel: 'debug' });
    log.debug('SYNC', 'visible now');

    expect(log.isDebugEnabled).toBe(true);
    expect(log.getEntryCount()).toBe(1);
  });

  it('normalizes unknown levels to the fallback', () => {
    expect(normalizeLogLevel('warn')).toBe('warn');
    expect(normalizeLogLevel('verbose')).toBe('info');
    expect(normalizeLogLevel(undefined, 'error')).toBe('error');
  });
});

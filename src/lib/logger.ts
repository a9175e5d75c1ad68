// --------------------------------------------------------------------------
// Global Logger — structured, category-tagged logging for the realtime server
// --------------------------------------------------------------------------
//
// Usage:
//   import { logger } from './logger';
//   logger.info('SOCKET', `Connection '${connId}' joined board ${code}`, { connId });
//   logger.error('STORAGE', `Card insert failed: ${err.message}`, { boardId });
//
// Each entry is written as one JSON line (stderr for errors, stdout otherwise)
// and kept in an in-memory ring buffer of the most recent entries.
// --------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogCategory =
  | 'AUTH'
  | 'SOCKET'
  | 'PRESENCE'
  | 'SYNC'
  | 'STORAGE'
  | 'ROOM'
  | 'API'
  | 'CONFIG';

export interface LogEntry {
  /** Monotonically increasing counter (never resets during a process). */
  id: number;
  /** ISO 8601 timestamp: "2026-02-19T14:32:01.123Z" */
  timestamp: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  context?: Record<string, unknown>;
}

export interface LoggerConfig {
  /** Ring buffer capacity (default 1000). */
  maxEntries: number;
  /** Entries below this level are dropped. */
  minLevel: LogLevel;
  /** Write each entry as a JSON line to the console. */
  enableConsole: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function normalizeLogLevel(value: unknown, fallback: LogLevel = 'info'): LogLevel {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return fallback;
}

// --------------------------------------------------------------------------
// Ring Buffer — fixed-size circular array with O(1) push, O(n) toArray
// --------------------------------------------------------------------------

class RingBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0;
  private count = 0;
  private capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(1, capacity);
    this.buffer = new Array<T | undefined>(this.capacity);
  }

  push(item: T): void {
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  /** Return entries in chronological order (oldest → newest). */
  toArray(): T[] {
    const result: T[] = [];
    const start = this.count < this.capacity ? 0 : this.head;
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(start + i) % this.capacity];
      if (item !== undefined) result.push(item);
    }
    return result;
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }

  size(): number {
    return this.count;
  }
}

// --------------------------------------------------------------------------
// Logger Factory
// --------------------------------------------------------------------------

export function createLogger(initialConfig: LoggerConfig) {
  const config = { ...initialConfig };
  let buffer = new RingBuffer<LogEntry>(config.maxEntries);
  let idCounter = 0;

  function log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[config.minLevel]) return;

    const entry: LogEntry = {
      id: ++idCounter,
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      ...(context !== undefined ? { context } : {}),
    };

    buffer.push(entry);

    if (config.enableConsole) {
      const line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        category,
        message,
        ...(context || {}),
      });
      if (level === 'error') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }

  return {
    debug(category: LogCategory, message: string, context?: Record<string, unknown>): void {
      log('debug', category, message, context);
    },
    info(category: LogCategory, message: string, context?: Record<string, unknown>): void {
      log('info', category, message, context);
    },
    warn(category: LogCategory, message: string, context?: Record<string, unknown>): void {
      log('warn', category, message, context);
    },
    error(category: LogCategory, message: string, context?: Record<string, unknown>): void {
      log('error', category, message, context);
    },

    /** All buffered entries in chronological order (oldest → newest). */
    getEntries(): readonly LogEntry[] {
      return buffer.toArray();
    },

    /** Entries added after the given id. */
    getEntriesSince(sinceId: number): readonly LogEntry[] {
      return buffer.toArray().filter((entry) => entry.id > sinceId);
    },

    getEntryCount(): number {
      return buffer.size();
    },

    clear(): void {
      buffer.clear();
    },

    setConfig(partial: Partial<LoggerConfig>): void {
      const capacityChanged =
        partial.maxEntries !== undefined && partial.maxEntries !== config.maxEntries;
      Object.assign(config, partial);
      if (capacityChanged) {
        buffer = new RingBuffer<LogEntry>(config.maxEntries);
      }
    },

    getConfig(): Readonly<LoggerConfig> {
      return { ...config };
    },

    get isDebugEnabled(): boolean {
      return config.minLevel === 'debug';
    },
  };
}

// --------------------------------------------------------------------------
// Singleton Export
// --------------------------------------------------------------------------

export const logger = createLogger({
  maxEntries: 1000,
  minLevel: normalizeLogLevel(process.env.LOG_LEVEL),
  enableConsole: process.env.NODE_ENV !== 'test' && process.env.VITEST === undefined,
});

export type Logger = ReturnType<typeof createLogger>;

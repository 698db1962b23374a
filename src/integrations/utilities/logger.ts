/**
 * Structured Logger with Multiple Sinks
 *
 * Leveled, component-aware logging. Every module logs through the
 * global `logger` (or a component child of it); `configureLogger()`
 * swaps level and sinks for the whole tree, including children that
 * were created before startup finished.
 *
 * Sinks:
 * - console: Human-readable lines on stderr (stdout belongs to answers)
 * - memory: Ring buffer for tests and programmatic access
 * - file: JSON lines appended to a log file
 *
 * Usage:
 *   import { logger } from '../integrations/utilities/logger.js';
 *   logger.info('Starting session', { workspace });
 *   const log = createComponentLogger('AgentLoop');
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// ─── Types ───────────────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
}

// ─── Level Priority ──────────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// ─── Sinks ───────────────────────────────────────────────────────────

/** Console sink: one readable line per entry, on stderr */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
    const dataStr =
      entry.data && Object.keys(entry.data).length > 0 ? ' ' + JSON.stringify(entry.data) : '';
    process.stderr.write(`${prefix} ${entry.message}${dataStr}\n`);
  }
}

/** Memory sink: ring buffer for tests and programmatic queries */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; limit?: number }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter(e => LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.limit) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

/** File sink: append JSON lines to a log file */
export class FileSink implements LogSink {
  private filePath: string;
  private initialized = false;
  private disabled = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(entry: LogEntry): void {
    if (this.disabled) return;

    try {
      if (!this.initialized) {
        mkdirSync(dirname(this.filePath), { recursive: true });
        this.initialized = true;
      }
      appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
    } catch (err) {
      // Cannot log about logging failures; say it once and stop trying.
      this.disabled = true;
      const reason = err instanceof Error ? err.message : String(err);
      process.stderr.write(`log file ${this.filePath} disabled: ${reason}\n`);
    }
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

/** Level and sinks shared by a logger and all of its children */
interface LoggerCore {
  level: LogLevel;
  sinks: LogSink[];
}

export class StructuredLogger {
  private core: LoggerCore;
  private defaultContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, defaultContext: Record<string, unknown> = {}) {
    this.core = {
      level: config.level ?? 'info',
      sinks: config.sinks ?? [new ConsoleSink()],
    };
    this.defaultContext = defaultContext;
  }

  /** Create a child logger with additional default context */
  withContext(context: Record<string, unknown>): StructuredLogger {
    const child = new StructuredLogger({}, { ...this.defaultContext, ...context });
    child.core = this.core;
    return child;
  }

  /** Replace level and sinks for this logger and every child */
  configure(config: LoggerConfig): void {
    if (config.level) this.core.level = config.level;
    if (config.sinks) this.core.sinks = config.sinks;
  }

  /** Update the minimum log level at runtime */
  setLevel(level: LogLevel): void {
    this.core.level = level;
  }

  getLevel(): LogLevel {
    return this.core.level;
  }

  /** Add a sink at runtime (e.g., add file sink after config is loaded) */
  addSink(sink: LogSink): void {
    this.core.sinks.push(sink);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (level === 'silent' || LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.core.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(data || Object.keys(this.defaultContext).length > 0
        ? { data: { ...this.defaultContext, ...data } }
        : {}),
    };

    for (const sink of this.core.sinks) {
      sink.write(entry);
    }
  }
}

// ─── Global singleton ────────────────────────────────────────────────

/**
 * Global logger instance. Defaults to console sink at 'warn' level so an
 * unconfigured process stays quiet. Call `configureLogger()` at startup.
 */
export const logger = new StructuredLogger({ level: 'warn' });

/**
 * Reconfigure the global logger (and every component logger derived from it).
 *
 * Example:
 *   configureLogger({
 *     level: 'debug',
 *     sinks: [new ConsoleSink(), new FileSink('/tmp/tidecode.log')],
 *   });
 */
export function configureLogger(config: LoggerConfig): void {
  logger.configure(config);
}

/**
 * Create a logger for a specific component (adds component name to context).
 *
 * Example:
 *   const log = createComponentLogger('ToolRegistry');
 *   log.debug('Dispatching', { tool: 'read' });
 */
export function createComponentLogger(component: string): StructuredLogger {
  return logger.withContext({ component });
}

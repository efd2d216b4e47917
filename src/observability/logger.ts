/**
 * @fileoverview Structured Logger for agent runs.
 *
 * Leveled, structured logging with per-run correlation. Every entry is
 * JSON-serializable; transports decide where it goes.
 *
 * @module agent-loop-engine/observability/logger
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, createUniqueId } from '../types/core.types.js';
import type { ExecutionLogger } from '../types/tools.types.js';

/**
 * A structured log entry.
 */
export interface LogEntry {
  readonly id: UniqueId;
  readonly timestamp: Timestamp;
  readonly level: Severity;
  readonly message: string;

  /** Module that generated the log */
  readonly module: string;

  /** Run the entry belongs to, if any */
  readonly runId: string | null;

  readonly data: Readonly<Record<string, unknown>>;
  readonly error: LogError | null;
  readonly durationMs: number | null;
}

/**
 * Error information in a log entry.
 */
export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly stack: string | undefined;
  readonly code: string | undefined;
}

/**
 * Transport for outputting logs.
 */
export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

/**
 * Configuration for the logger.
 */
export interface LoggerConfig {
  /** Minimum level to log */
  readonly minLevel: Severity;

  /** Module name for this logger instance */
  readonly module: string;

  /** Transports to write to; a console transport is used when empty */
  readonly transports: ReadonlyArray<LogTransport>;

  /** Run ID stamped on every entry */
  readonly runId?: string | undefined;
}

const SEVERITY_ORDER: Record<Severity, number> = {
  [Severity.DEBUG]: 0,
  [Severity.INFO]: 1,
  [Severity.WARN]: 2,
  [Severity.ERROR]: 3,
  [Severity.FATAL]: 4,
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: Severity.INFO,
  module: 'agent',
  transports: [],
};

/**
 * Console transport - outputs to stderr with an ANSI-colored prefix.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  private readonly useColors: boolean;

  constructor(useColors: boolean = process.stderr.isTTY === true) {
    this.useColors = useColors;
  }

  write(entry: LogEntry): void {
    const line = `${this.formatPrefix(entry)} ${entry.message}`;
    const hasData = Object.keys(entry.data).length > 0;

    switch (entry.level) {
      case Severity.DEBUG:
        console.debug(line, ...(hasData ? [entry.data] : []));
        break;
      case Severity.INFO:
        console.info(line, ...(hasData ? [entry.data] : []));
        break;
      case Severity.WARN:
        console.warn(line, ...(hasData ? [entry.data] : []));
        break;
      case Severity.ERROR:
      case Severity.FATAL:
        console.error(line, entry.data, entry.error ?? '');
        break;
    }
  }

  private formatPrefix(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);
    const scope = entry.runId ? `${entry.module}:${entry.runId.slice(0, 8)}` : entry.module;

    if (this.useColors) {
      const color = this.getLevelColor(entry.level);
      return `\x1b[90m${timestamp}\x1b[0m ${color}${level}\x1b[0m \x1b[36m[${scope}]\x1b[0m`;
    }

    return `${timestamp} ${level} [${scope}]`;
  }

  private getLevelColor(level: Severity): string {
    switch (level) {
      case Severity.DEBUG: return '\x1b[90m';
      case Severity.INFO: return '\x1b[32m';
      case Severity.WARN: return '\x1b[33m';
      case Severity.ERROR: return '\x1b[31m';
      case Severity.FATAL: return '\x1b[35m';
    }
  }
}

/**
 * Memory transport - keeps entries in memory for tests and debugging.
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';

  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries: number = 1000) {
    this.maxEntries = maxEntries;
  }

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }

  findByRunId(runId: string): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.runId === runId);
  }

  findByLevel(level: Severity): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.level === level);
  }

  findByMessage(message: string): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.message === message);
  }
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger('engine', { minLevel: Severity.DEBUG });
 * const runLogger = logger.child({ runId });
 * runLogger.info('Run started', { maxSteps: 10 });
 * ```
 */
export class Logger implements ExecutionLogger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    const merged: LoggerConfig = { ...DEFAULT_CONFIG, ...config };
    this.config = merged.transports.length === 0
      ? { ...merged, transports: [new ConsoleTransport()] }
      : merged;
  }

  get level(): Severity {
    return this.config.minLevel;
  }

  /**
   * Creates a child logger sharing this logger's transports.
   */
  child(context: { module?: string; runId?: string }): Logger {
    return new Logger({
      minLevel: this.config.minLevel,
      module: context.module ?? this.config.module,
      transports: this.config.transports,
      runId: context.runId ?? this.config.runId,
    });
  }

  isEnabled(level: Severity): boolean {
    return SEVERITY_ORDER[level] >= SEVERITY_ORDER[this.config.minLevel];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.WARN, message, data);
  }

  error(message: string, data?: Record<string, unknown>, error?: unknown): void {
    this.log(Severity.ERROR, message, data, error);
  }

  fatal(message: string, data?: Record<string, unknown>, error?: unknown): void {
    this.log(Severity.FATAL, message, data, error);
  }

  /**
   * Times an async operation and logs its duration.
   * Failures are logged at ERROR and rethrown.
   */
  async time<T>(
    label: string,
    fn: () => Promise<T>,
    level: Severity = Severity.DEBUG,
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.log(level, `${label} completed`, undefined, undefined, Date.now() - start);
      return result;
    } catch (error) {
      this.log(Severity.ERROR, `${label} failed`, undefined, error, Date.now() - start);
      throw error;
    }
  }

  private log(
    level: Severity,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown,
    durationMs?: number,
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      runId: this.config.runId ?? null,
      data: data ?? {},
      error: error === undefined ? null : formatError(error),
      durationMs: durationMs ?? null,
    };

    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (transportError) {
        console.error(`Logger transport '${transport.name}' failed:`, transportError);
      }
    }
  }
}

function formatError(error: unknown): LogError {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      code,
    };
  }
  return { name: 'NonError', message: String(error), stack: undefined, code: undefined };
}

/**
 * Parses a level name such as `debug` or `WARN`.
 */
export function parseSeverity(value: string): Severity | null {
  const upper = value.trim().toUpperCase();
  return Object.values(Severity).find(level => level === upper) ?? null;
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}

/**
 * A logger that drops everything. Used when the caller supplies none.
 */
export const silentLogger = new Logger({
  minLevel: Severity.FATAL,
  module: 'agent',
  transports: [{ name: 'null', write: () => undefined }],
});

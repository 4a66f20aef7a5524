/**
 * @fileoverview Structured Logger - leveled, JSON-serializable logging.
 *
 * Every component receives a logger instead of reaching for a module-level
 * singleton. Entries carry the module name, the session and correlation
 * IDs of the request that produced them, and optional timing metrics.
 *
 * @module math-reasoning-agent/observability/logger
 * @version 0.1.0
 */

import { createWriteStream, type WriteStream } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, createUniqueId } from '../types/core.types.js';

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

  /** Request the entry belongs to, if any */
  readonly correlationId: UniqueId | null;

  readonly sessionId: UniqueId | null;
  readonly data: Readonly<Record<string, unknown>>;
  readonly error: LogError | null;
  readonly metrics: LogMetrics | null;
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
 * Performance metrics in a log entry.
 */
export interface LogMetrics {
  readonly durationMs?: number;
  readonly custom?: Readonly<Record<string, number>>;
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
  readonly minLevel: Severity;
  readonly module: string;
  readonly transports: LogTransport[];
  readonly defaultCorrelationId?: UniqueId | undefined;
  readonly defaultSessionId?: UniqueId | undefined;
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
  module: 'math-agent',
  transports: [],
};

const LEVEL_COLORS: Record<Severity, string> = {
  [Severity.DEBUG]: '\x1b[90m', // Gray
  [Severity.INFO]: '\x1b[32m', // Green
  [Severity.WARN]: '\x1b[33m', // Yellow
  [Severity.ERROR]: '\x1b[31m', // Red
  [Severity.FATAL]: '\x1b[35m', // Magenta
};

/**
 * Console transport - outputs to the console with optional ANSI colors.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  private readonly useColors: boolean;

  constructor(useColors: boolean = true) {
    this.useColors = useColors;
  }

  write(entry: LogEntry): void {
    const line = `${this.formatPrefix(entry)} ${entry.message}`;

    switch (entry.level) {
      case Severity.DEBUG:
        console.debug(line, entry.data);
        break;
      case Severity.INFO:
        console.info(line, entry.data);
        break;
      case Severity.WARN:
        console.warn(line, entry.data);
        break;
      case Severity.ERROR:
      case Severity.FATAL:
        console.error(line, entry.data, entry.error);
        break;
    }
  }

  private formatPrefix(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);

    if (!this.useColors) {
      return `${timestamp} ${level} [${entry.module}]`;
    }
    return `\x1b[90m${timestamp}\x1b[0m ${LEVEL_COLORS[entry.level]}${level}\x1b[0m \x1b[36m[${entry.module}]\x1b[0m`;
  }
}

/**
 * Memory transport - keeps a bounded list of entries for tests and debugging.
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

  findByCorrelationId(correlationId: UniqueId): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.correlationId === correlationId);
  }

  findByLevel(level: Severity): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.level === level);
  }
}

/**
 * File transport - appends one JSON document per line.
 *
 * The interactive shell logs here so that diagnostics never interleave
 * with what the user is reading.
 */
export class FileTransport implements LogTransport {
  readonly name = 'file';

  private readonly stream: WriteStream;
  private streamError: Error | null = null;

  constructor(readonly filePath: string) {
    this.stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
    this.stream.on('error', error => {
      if (this.streamError === null) {
        this.streamError = error;
        console.error(`Log file '${filePath}' is unavailable: ${error.message}`);
      }
    });
  }

  /**
   * The error that stopped the transport, if any. Entries written after a
   * failure are dropped.
   */
  get failure(): Error | null {
    return this.streamError;
  }

  write(entry: LogEntry): void {
    if (this.streamError !== null || this.stream.writableEnded) {
      return;
    }
    // The return value is ignored: the stream buffers until drained, and
    // one interactive session logs a few entries per request.
    this.stream.write(`${JSON.stringify(entry)}\n`);
  }

  /**
   * Flushes pending writes and closes the file. Resolves once the stream
   * has closed, whether or not it failed; check {@link failure} afterwards.
   */
  close(): Promise<void> {
    if (this.stream.closed) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.stream.once('close', () => resolve());
      this.stream.end();
    });
  }
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * const logger = new Logger({
 *   module: 'agent',
 *   minLevel: Severity.DEBUG,
 *   transports: [new ConsoleTransport()],
 * });
 *
 * logger.info('Request received', { input: 'add 2 and 3' });
 * logger.error('Collaborator failed', { attempt: 1 }, error);
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly correlationId: UniqueId | null;
  private readonly sessionId: UniqueId | null;

  constructor(config: Partial<LoggerConfig> = {}) {
    const merged: LoggerConfig = { ...DEFAULT_CONFIG, ...config };
    this.config = merged.transports.length === 0
      ? { ...merged, transports: [new ConsoleTransport()] }
      : merged;
    this.correlationId = config.defaultCorrelationId ?? null;
    this.sessionId = config.defaultSessionId ?? null;
  }

  /**
   * Creates a child logger sharing this logger's transports and level.
   */
  child(context: {
    module?: string;
    correlationId?: UniqueId;
    sessionId?: UniqueId;
  }): Logger {
    return new Logger({
      minLevel: this.config.minLevel,
      module: context.module ?? this.config.module,
      transports: this.config.transports,
      defaultCorrelationId: context.correlationId ?? this.correlationId ?? undefined,
      defaultSessionId: context.sessionId ?? this.sessionId ?? undefined,
    });
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

  error(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.ERROR, message, data, error);
  }

  /**
   * Times an async operation and logs its duration, rethrowing failures.
   */
  async time<T>(
    label: string,
    fn: () => Promise<T>,
    level: Severity = Severity.DEBUG,
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.log(level, `${label} completed`, undefined, undefined, { durationMs: Date.now() - start });
      return result;
    } catch (error) {
      this.log(
        Severity.WARN,
        `${label} failed`,
        undefined,
        error instanceof Error ? error : undefined,
        { durationMs: Date.now() - start },
      );
      throw error;
    }
  }

  // ============ Private Methods ============

  private log(
    level: Severity,
    message: string,
    data?: Record<string, unknown>,
    error?: Error,
    metrics?: LogMetrics,
  ): void {
    if (SEVERITY_ORDER[level] < SEVERITY_ORDER[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      correlationId: this.correlationId,
      sessionId: this.sessionId,
      data: data ?? {},
      error: error ? formatError(error) : null,
      metrics: metrics ?? null,
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

function formatError(error: Error): LogError {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    code,
  };
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}

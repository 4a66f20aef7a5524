/**
 * @fileoverview Observability module public exports.
 *
 * @module math-reasoning-agent/observability
 * @version 0.1.0
 */

export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  FileTransport,
  createLogger,
  type LogEntry,
  type LogError,
  type LogMetrics,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';

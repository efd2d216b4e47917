/**
 * @fileoverview Observability module public exports.
 *
 * @module agent-loop-engine/observability
 * @version 0.1.0
 */

export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  parseSeverity,
  silentLogger,
  type LogEntry,
  type LogError,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';

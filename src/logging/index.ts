/**
 * Logging Module Index
 */

export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type TextSink,
  type HclLogger,
  isLogLevel,
  shouldLog,
  createDefaultFormatter,
  StreamTransport,
  HclLoggerImpl,
  createHclLogger,
  getHclLogger,
  setHclLogger,
} from "./logger.js";

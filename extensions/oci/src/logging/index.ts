/**
 * OCI Logging Module Index
 */

export {
  type OciLogLevel,
  type OciLogEntry,
  type LogFormatter,
  type LogTransport,
  type OciLogger,
  type LogContext,
  shouldLog,
  isLogLevel,
  createDefaultFormatter,
  StreamTransport,
  MemoryTransport,
  OciLoggerImpl,
  createOciLogger,
} from "./logger.js";

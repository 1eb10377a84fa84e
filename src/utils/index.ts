/**
 * Utility exports
 */

// Formatting utilities
export { formatDate, formatDateTime, formatDuration } from "./format";
// Filesystem helpers
export { isDirectory, isErrnoException, readOptionalFile } from "./fs";
export type { LogLevel, LogSink } from "./logger";
// Logger
export { debug, error, getLogLevel, info, logger, setLogLevel, setLogSink, warn } from "./logger";

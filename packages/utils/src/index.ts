/**
 * packages/utils - logging, interval workers, concurrency limiting
 */

export type { LogRecord, LogSink } from "./logger";
export { LogLevel, logger, isLogLevel, parseLogLevel, formatValue } from "./logger";

export type { WorkerOptions, IntervalWorker } from "./worker";
export { createIntervalWorker } from "./worker";

export type { ConcurrencyLimiter } from "./concurrency-limiter";
export { createConcurrencyLimiter } from "./concurrency-limiter";

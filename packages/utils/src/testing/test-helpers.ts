/**
 * Test helpers shared across apps/packages.
 *
 * Intended for test code only.
 */

import { logger, type LogLevel, type LogRecord } from "../logger";

export interface LogCapture {
  records: LogRecord[];
  messages: (level?: LogLevel) => string[];
  restore: () => void;
}

/**
 * Route the logger into an in-memory buffer until `restore()` is called.
 */
export function captureLogs(): LogCapture {
  const records: LogRecord[] = [];
  logger.setSink({ write: r => records.push(r) });

  return {
    records,
    messages: level => records.filter(r => level === undefined || r.level === level).map(r => r.message),
    restore: () => logger.clearSink(),
  };
}

/**
 * Run `fn` with logs captured, restoring console logging afterwards.
 */
export async function withCapturedLogs<T>(fn: (capture: LogCapture) => Promise<T> | T): Promise<T> {
  const capture = captureLogs();
  try {
    return await fn(capture);
  } finally {
    capture.restore();
  }
}

/**
 * Mutable clock for code that takes `now: () => number`.
 */
export interface ManualClock {
  now: () => number;
  set: (ms: number) => void;
  advance: (ms: number) => void;
}

export function createManualClock(startMs = 0): ManualClock {
  let current = startMs;
  return {
    now: () => current,
    set: ms => {
      current = ms;
    },
    advance: ms => {
      current += ms;
    },
  };
}

/**
 * Logger
 *
 * Level is read from `LOG_LEVEL` on every call (DEBUG, INFO, WARN, ERROR, LOG).
 * Priority: ERROR > WARN > LOG > INFO > DEBUG. Only logs at or above the set level are output.
 *
 * Call shape used across the repo: `logger.info("message", { ...fields })`.
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
  LOG = "LOG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

// lower number = higher priority
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const LEVEL_COLORS: Record<LogLevel, string | null> = {
  [LogLevel.ERROR]: "\x1b[31m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.INFO]: "\x1b[36m",
  [LogLevel.DEBUG]: "\x1b[32m",
  [LogLevel.LOG]: null,
};

const RESET = "\x1b[0m";

const LEVEL_NAMES: readonly string[] = Object.values(LogLevel);

export const isLogLevel = (value: string): value is LogLevel => LEVEL_NAMES.includes(value);

export const parseLogLevel = (value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel => {
  const upper = value?.trim().toUpperCase();
  return upper && isLogLevel(upper) ? upper : fallback;
};

const getCurrentLogLevel = (): LogLevel => parseLogLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel): boolean =>
  LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()];

const formatHeader = (level: LogLevel, tsMs: number): string => {
  const header = `[${new Date(tsMs).toISOString()}] [${level}]`;
  const color = LEVEL_COLORS[level];
  return color === null ? header : `${color}${header}${RESET}`;
};

const isFieldsObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);

export const formatValue = (value: unknown): string => {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (value === undefined) return "undefined";
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
};

function toFields(args: unknown[]): Record<string, string> | undefined {
  const maybeFields = args[1];
  if (!isFieldsObject(maybeFields)) return undefined;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(maybeFields)) {
    out[k] = formatValue(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function toMessage(args: unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;
  const head = formatValue(first);

  // the fields object lives in `fields`, not the message
  const tail = isFieldsObject(rest[0]) ? rest.slice(1) : rest;
  if (tail.length === 0) return head;

  return `${head} ${tail.map(formatValue).join(" ")}`.trim();
}

const formatLine = (record: LogRecord): string => {
  const fields =
    record.fields ?
      " " +
      Object.entries(record.fields)
        .map(([k, v]) => `${k}=${v}`)
        .join(" ")
    : "";
  return `${formatHeader(record.level, record.tsMs)} ${record.message}${fields}`;
};

let sink: LogSink | null = null;

function emit(level: LogLevel, args: unknown[], consoleFn: (line: string) => void): void {
  if (!shouldLog(level)) return;

  const record: LogRecord = {
    tsMs: Date.now(),
    level,
    message: toMessage(args),
    fields: toFields(args),
  };

  if (sink) {
    sink.write(record);
    return;
  }

  consoleFn(formatLine(record));
}

export const logger = {
  log: (...args: unknown[]) => {
    emit(LogLevel.LOG, args, console.log);
  },
  info: (...args: unknown[]) => {
    emit(LogLevel.INFO, args, console.info);
  },
  debug: (...args: unknown[]) => {
    emit(LogLevel.DEBUG, args, console.log);
  },
  warn: (...args: unknown[]) => {
    emit(LogLevel.WARN, args, console.warn);
  },
  error: (...args: unknown[]) => {
    emit(LogLevel.ERROR, args, console.error);
  },
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  getLevels: () => Object.values(LogLevel),
  /**
   * Route logs to a custom sink instead of the console (tests capture through this).
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  clearSink: () => {
    sink = null;
  },
};

import { getConfig, type LogLevel } from "./config";

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

export type Logger = Readonly<Record<LogLevel, (msg: string, ctx?: LogContext) => void>>;

let levelOverride: LogLevel | undefined;

/** Pins the level regardless of LOG_LEVEL; `undefined` goes back to config. */
export function setLogLevel(level: LogLevel | undefined): void {
  levelOverride = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[levelOverride ?? getConfig().logLevel];
}

export function errorFields(error: unknown): LogContext {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name, stack: error.stack };
  }
  return { error: String(error) };
}

/**
 * One JSON object per line, tagged with the subsystem that wrote it
 * (`engine`, `corpus`, `http`, `db`, `startup`). Warnings and errors go to
 * stderr so operators can split them from selection traffic.
 */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, msg: string, ctx?: LogContext) => {
    if (!enabled(level)) return;

    const line = JSON.stringify({ time: new Date().toISOString(), level, scope, msg, ...ctx });
    const stream = LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn ? process.stderr : process.stdout;
    stream.write(`${line}\n`);
  };

  return {
    debug: (msg, ctx) => write("debug", msg, ctx),
    info: (msg, ctx) => write("info", msg, ctx),
    warn: (msg, ctx) => write("warn", msg, ctx),
    error: (msg, ctx) => write("error", msg, ctx),
  };
}

// Speech Feedback Service - Logging
//
// Console-backed loggers with a `[LEVEL] [Component]` prefix. Every service
// takes a Logger so tests can pass silent vi.fn() loggers instead.

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = "info";

/** Process-wide threshold, set once from config at startup. */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

const ts = () => new Date().toISOString();

export function createLogger(component: string): Logger {
  const prefix = (level: string) => `[${level}] [${ts()}] [${component}]`;
  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.debug(`${prefix("DEBUG")} ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.log(`${prefix("INFO")} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`${prefix("WARN")} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`${prefix("ERROR")} ${msg}`, ...args);
    },
  };
}

/** Message text of an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Writes every level to stderr: stdout belongs to command payloads
 * (changelog bytes, resolved tags, JSON).
 */
class ConsoleLogger implements Logger {
  private readonly level: LogLevel | undefined;
  private readonly prefix: string;

  constructor(prefix: string = "", level?: LogLevel) {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const effectiveLevel = this.level ?? resolveDefaultLevel();
    const currentLevelIndex = LOG_LEVELS.indexOf(effectiveLevel);
    const messageLevelIndex = LOG_LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && effectiveLevel !== "silent";
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }
}

let defaultLevel: LogLevel | undefined;

// setDefaultLogLevel > silent under test > info
function resolveDefaultLevel(): LogLevel {
  return defaultLevel ?? (process.env['NODE_ENV'] === "test" ? "silent" : "info");
}

/**
 * Overrides the level of every logger created without an explicit level,
 * including module-level ones (e.g. from --verbose or LOG_LEVEL).
 */
export function setDefaultLogLevel(level: LogLevel | undefined): void {
  defaultLevel = level;
}

// Factory: an explicit level pins the logger, otherwise the default is read on every call
export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  return new ConsoleLogger(prefix, level);
}

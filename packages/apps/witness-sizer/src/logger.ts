/**
 * Leveled console logger for the witness-sizer CLI.
 *
 * Lines look like `HH:MM:SS message`, prefixed with a right-aligned job id
 * (`   7 | `) when several runs share a terminal.
 */

/**
 * Log levels in order of severity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Log level numeric values for comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Whether messages at this level are written */
  isLevelEnabled(level: LogLevel): boolean;
}

export interface ConsoleLoggerOptions {
  /** Minimum level to output */
  level: LogLevel;
  /** Job id shown before every line */
  jobId?: number;
  /** Clock used for timestamps */
  now?: () => Date;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createConsoleLogger(options: ConsoleLoggerOptions): Logger {
  const threshold = LOG_LEVEL_VALUES[options.level];
  const now = options.now ?? (() => new Date());
  const prefix =
    options.jobId === undefined ? "" : `${String(options.jobId).padStart(4)} | `;

  const write = (
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
  ): void => {
    if (LOG_LEVEL_VALUES[level] < threshold) {
      return;
    }
    const line = `${prefix}${formatTime(now())} ${message}`;
    const args: unknown[] = context === undefined ? [line] : [line, context];
    switch (level) {
      case "debug":
        console.debug(...args);
        break;
      case "info":
        console.info(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "error":
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    isLevelEnabled: (level) => LOG_LEVEL_VALUES[level] >= threshold,
  };
}

function formatTime(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => String(part).padStart(2, "0"))
    .join(":");
}

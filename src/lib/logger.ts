import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

/**
 * Level-filtered logger with colored output.
 *
 * Everything goes to stderr so that `--output json` on stdout stays parseable.
 * Child loggers share their parent's level: `configure()` on the root logger
 * after children were created still applies to them.
 */
export class Logger {
  private state: { level: LogLevel };
  private prefix: string;

  constructor(config: Partial<LoggerConfig> = {}, state?: { level: LogLevel }) {
    this.state = state ?? { level: config.level ?? initialLevel() };
    this.prefix = config.prefix ?? "";
  }

  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.state.level = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
  }

  get level(): LogLevel {
    return this.state.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.state.level];
  }

  private format(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.error(chalk.gray(this.format(message)), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.error(this.format(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.error(chalk.yellow(this.format(message)), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(chalk.red(this.format(message)), ...args);
    }
  }

  /**
   * Success message (green), shown at info level
   */
  success(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.error(chalk.green(this.format(message)), ...args);
    }
  }

  child(prefix: string): Logger {
    return new Logger({ prefix: this.prefix ? `${this.prefix} ${prefix}` : prefix }, this.state);
  }
}

function initialLevel(): LogLevel {
  const fromEnv = process.env["TESTSMITH_LOG_LEVEL"];
  return fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : "info";
}

/**
 * Global logger instance
 */
export const logger = new Logger();

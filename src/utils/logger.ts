import chalk from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ILogger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  isEnabled(level: LogLevel): boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Console logger with a level threshold. Messages are prefixed with the
 * component name so runtime output can be told apart from function output.
 */
export class Logger implements ILogger {
  private readonly threshold: number;

  constructor(
    private readonly component: string,
    level: LogLevel = "info",
  ) {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  isEnabled(level: LogLevel): boolean {
    return level !== "silent" && LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  debug(message: string, ...details: unknown[]): void {
    if (this.isEnabled("debug")) {
      console.debug(chalk.gray(`[${this.component}] ${message}`), ...details);
    }
  }

  info(message: string, ...details: unknown[]): void {
    if (this.isEnabled("info")) {
      console.log(`${chalk.cyan(`[${this.component}]`)} ${message}`, ...details);
    }
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.isEnabled("warn")) {
      console.warn(chalk.yellow(`[${this.component}] ${message}`), ...details);
    }
  }

  error(message: string, ...details: unknown[]): void {
    if (this.isEnabled("error")) {
      console.error(chalk.red(`[${this.component}] ${message}`), ...details);
    }
  }
}

export const silentLogger: ILogger = new Logger("silent", "silent");

import chalk from "chalk";
import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface FileLoggerOptions {
  logDir: string;
  debug?: boolean;
  now?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local calendar date as YYYYMMDD.
 */
export function formatLogDate(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/**
 * Local time as YYYY-MM-DD HH:MM:SS,mmm, matching the date in the file name.
 */
export function formatLogTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time},${String(date.getMilliseconds()).padStart(3, "0")}`;
}

export function getLogFilePath(logDir: string, date: Date): string {
  return join(logDir, `llm_calls_${formatLogDate(date)}.log`);
}

export function createFileLogger(options: FileLoggerOptions): Logger {
  const debugEnabled = options.debug ?? false;
  const now = options.now ?? (() => new Date());
  let reportedFailure = false;

  function writeToFile(level: string, message: string): void {
    const date = now();
    try {
      if (!existsSync(options.logDir)) {
        mkdirSync(options.logDir, { recursive: true });
      }
      appendFileSync(getLogFilePath(options.logDir, date), `${formatLogTimestamp(date)} - ${level} - ${message}\n`);
    } catch (error: unknown) {
      // Logging never fails a completion; report once and carry on.
      if (!reportedFailure) {
        reportedFailure = true;
        const reason = error instanceof Error ? error.message : String(error);
        console.error(chalk.red(`[logger] cannot write to ${options.logDir}: ${reason}`));
      }
    }
  }

  return {
    info(message: string): void {
      writeToFile("INFO", message);
    },

    warn(message: string): void {
      if (debugEnabled) {
        console.error(chalk.yellow(`[WARN] ${message}`));
      }
      writeToFile("WARNING", message);
    },

    error(message: string): void {
      if (debugEnabled) {
        console.error(chalk.red(`[ERROR] ${message}`));
      }
      writeToFile("ERROR", message);
    },

    debug(message: string): void {
      if (!debugEnabled) return;
      console.error(chalk.gray(`[DEBUG] ${message}`));
      writeToFile("DEBUG", message);
    },
  };
}

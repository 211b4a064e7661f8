import fs from "fs";
import path from "path";
import { LogLevel } from "../config/settings";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  success: 25,
  warn: 30,
  error: 40
};

const LOG_FILE_PATTERN = /^scraper_(\d{4}-\d{2}-\d{2})\.log$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export type LogDetails = Record<string, unknown>;

export interface Logger {
  debug(message: string, details?: LogDetails): void;
  info(message: string, details?: LogDetails): void;
  success(message: string, details?: LogDetails): void;
  warn(message: string, details?: LogDetails): void;
  error(message: string, details?: LogDetails): void;
}

export interface LoggerOptions {
  level: LogLevel;
  /** Directory for daily log files; omit to log to the console only. */
  fileDir?: string;
  retentionDays?: number;
  now?: () => Date;
}

function dayStamp(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function logFilePath(dir: string, date: Date): string {
  return path.join(dir, `scraper_${dayStamp(date)}.log`);
}

/** Deletes daily log files older than the retention window. Returns the removed paths. */
export function pruneLogFiles(dir: string, retentionDays: number, now: Date): string[] {
  if (!fs.existsSync(dir)) return [];
  const cutoff = Date.parse(dayStamp(now)) - retentionDays * DAY_MS;
  const removed: string[] = [];

  for (const name of fs.readdirSync(dir)) {
    const match = LOG_FILE_PATTERN.exec(name);
    if (!match) continue;
    const fileDay = Date.parse(match[1]);
    if (Number.isNaN(fileDay) || fileDay >= cutoff) continue;
    const filePath = path.join(dir, name);
    fs.rmSync(filePath, { force: true });
    removed.push(filePath);
  }
  return removed;
}

class ConsoleFileLogger implements Logger {
  private readonly threshold: number;
  private readonly fileDir: string | null;
  private readonly now: () => Date;

  constructor(options: LoggerOptions) {
    this.threshold = LEVEL_ORDER[options.level];
    this.fileDir = options.fileDir ?? null;
    this.now = options.now ?? (() => new Date());

    if (this.fileDir) {
      fs.mkdirSync(this.fileDir, { recursive: true });
      pruneLogFiles(this.fileDir, options.retentionDays ?? 7, this.now());
    }
  }

  debug(message: string, details?: LogDetails): void {
    this.write("debug", message, details);
  }

  info(message: string, details?: LogDetails): void {
    this.write("info", message, details);
  }

  success(message: string, details?: LogDetails): void {
    this.write("success", message, details);
  }

  warn(message: string, details?: LogDetails): void {
    this.write("warn", message, details);
  }

  error(message: string, details?: LogDetails): void {
    this.write("error", message, details);
  }

  private write(level: LogLevel, message: string, details?: LogDetails): void {
    if (LEVEL_ORDER[level] < this.threshold) return;

    const timestamp = this.now();
    const payload = details ? ` ${JSON.stringify(details)}` : "";
    const line = `${timestamp.toISOString()} ${level.toUpperCase().padEnd(7)} [gst-scraper] ${message}${payload}`;

    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }

    if (this.fileDir) {
      fs.appendFileSync(logFilePath(this.fileDir, timestamp), line + "\n", "utf8");
    }
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new ConsoleFileLogger(options);
}

/** Logger that drops everything; used where output would only be noise. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

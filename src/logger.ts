// src/logger.ts - Leveled logger writing to a file or stderr
import { appendFileSync, existsSync, mkdirSync } from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

const rank: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  level?: LogThreshold;
  file?: string;
}

export class Logger {
  private level: LogThreshold = 'error';
  private logFile: string | undefined;

  constructor(options: LoggerOptions = {}) {
    this.configure(options);
  }

  configure(options: LoggerOptions): void {
    if (options.level) this.level = options.level;
    if (options.file !== undefined) {
      this.logFile = options.file || undefined;
      this.ensureLogDirectory();
    }
  }

  get threshold(): LogThreshold {
    return this.level;
  }

  ensureLogDirectory(): void {
    if (!this.logFile) return;
    const dir = path.dirname(this.logFile);
    try {
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    } catch (error) {
      // Can't create the directory: log to stderr instead
      console.error('Failed to initialize logger:', error);
      this.logFile = undefined;
    }
  }

  private log(message: string, level: LogLevel): void {
    if (rank[level] < rank[this.level]) return;
    const timestamp = new Date().toISOString();
    const logEntry = `[${timestamp}] [${level.toUpperCase()}] ${message}\n`;
    if (!this.logFile) {
      process.stderr.write(logEntry);
      return;
    }
    try {
      appendFileSync(this.logFile, logEntry);
    } catch (error) {
      console.error('Failed to write to log file:', error);
      console.log(message);
    }
  }

  debug(message: string): void {
    this.log(message, 'debug');
  }

  info(message: string): void {
    this.log(message, 'info');
  }

  warn(message: string): void {
    this.log(message, 'warn');
  }

  error(message: string): void {
    this.log(message, 'error');
  }
}

// Create a singleton instance
export const logger = new Logger();

import * as fs from 'fs/promises';
import chalk from 'chalk';

export interface ReplayLogEntry {
  timestamp: string;
  method: string;
  url: string;            // display URL (original virtual host)
  target: string;         // URL the request was actually sent to
  status: 'success' | 'error';
  statusCode?: number;
  error?: string;
  durationMs: number;
}

export interface ReplayLoggerOptions {
  verbose?: boolean;
  color?: boolean;
  jsonLogPath?: string;
}

/**
 * Writes replay results to stdout and system messages to stderr.
 * Each result is a single console.log call, so lines from concurrent
 * requests never interleave.
 */
export class ReplayLogger {
  private verbose: boolean;
  private jsonLogPath?: string;
  private chalk: chalk.Chalk;

  constructor(options: ReplayLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.jsonLogPath = options.jsonLogPath;
    this.chalk = new chalk.Instance({ level: options.color === false ? 0 : chalk.level });
  }

  /**
   * Log the outcome of one replayed request
   */
  async logResult(entry: ReplayLogEntry): Promise<void> {
    console.log(this.formatResult(entry));

    if (this.jsonLogPath) {
      try {
        await fs.appendFile(this.jsonLogPath, JSON.stringify(entry) + '\n', 'utf-8');
      } catch (error) {
        console.error(this.chalk.red(`[replay] Failed to write to ${this.jsonLogPath}: ${error instanceof Error ? error.message : String(error)}`));
      }
    }
  }

  /**
   * "<timestamp> [12ms] [200] GET http://www.dogs.com/comments/"
   */
  formatResult(entry: ReplayLogEntry): string {
    const { timestamp, method, url, durationMs } = entry;
    return `${this.chalk.dim(timestamp)} [${durationMs}ms] [${this.formatOutcome(entry)}] ${method} ${url}`;
  }

  warn(message: string): void {
    console.error(this.chalk.yellow(`⚠️  ${message}`));
  }

  /**
   * Diagnostics shown only with --verbose
   */
  debug(message: string): void {
    if (this.verbose) {
      console.error(this.chalk.dim(message));
    }
  }

  private formatOutcome(entry: ReplayLogEntry): string {
    if (entry.status === 'error' || entry.statusCode === undefined) {
      return this.chalk.red(entry.error ?? 'unknown error');
    }

    const code = entry.statusCode;
    const text = String(code);
    if (code >= 500) return this.chalk.red(text);
    if (code >= 400) return this.chalk.yellow(text);
    if (code >= 300) return this.chalk.cyan(text);
    return this.chalk.green(text);
  }
}

/**
 * Utility class for tracking request timing
 */
export class RequestTimer {
  private startTime: number;

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Elapsed whole milliseconds, never below 1. Wall-clock readings can go
   * backwards or stand still on some virtual machines.
   */
  elapsed(): number {
    return clampElapsed(Date.now() - this.startTime);
  }

  /**
   * Get current ISO timestamp
   */
  static now(): string {
    return new Date().toISOString();
  }
}

export function clampElapsed(ms: number): number {
  return Math.max(1, Math.floor(ms));
}

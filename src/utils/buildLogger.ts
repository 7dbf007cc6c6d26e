/** Structured build logging: JSONL for machine consumption, .log for humans, console for devs. */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type LogData = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  data?: LogData;
}

export interface BuildLoggerOptions {
  /** Minimum level echoed to the console. Files always receive every entry. */
  consoleLevel?: LogLevel;
  /** Set false to skip the JSONL and text sinks. */
  writeFiles?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class BuildLogger {
  private logDir: string;
  private jsonlPath: string;
  private textPath: string;
  private buildStart: number;
  private consoleLevel: LogLevel;
  private writeFiles: boolean;

  constructor(cacheDir: string, options: BuildLoggerOptions = {}) {
    this.logDir = path.join(cacheDir, 'logs');
    this.jsonlPath = path.join(this.logDir, 'build.jsonl');
    this.textPath = path.join(this.logDir, 'build.log');
    this.consoleLevel = options.consoleLevel ?? 'info';
    this.writeFiles = options.writeFiles ?? true;
    if (this.writeFiles) fs.mkdirSync(this.logDir, { recursive: true });
    this.buildStart = Date.now();
  }

  get jsonlFile(): string {
    return this.jsonlPath;
  }

  get textFile(): string {
    return this.textPath;
  }

  /** Write a structured log entry. */
  log(level: LogLevel, event: string, data?: LogData): void {
    const timestamp = new Date().toISOString();
    const entry: LogEntry = { timestamp, level, event, ...(data !== undefined ? { data } : {}) };
    const dataStr = data ? ' ' + this.formatData(data) : '';

    if (this.writeFiles) {
      try {
        fs.appendFileSync(this.jsonlPath, JSON.stringify(entry) + '\n');
        fs.appendFileSync(this.textPath, `[${timestamp}] [${level.toUpperCase()}] ${event}${dataStr}\n`);
      } catch (err) {
        // Log files are best-effort; the build carries on without them.
        this.writeFiles = false;
        console.warn(`[recipe-forge] Log file write failed, continuing without file logs: ${String(err)}`);
      }
    }

    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.consoleLevel)) return;
    const consoleMsg = `[recipe-forge] ${event}${dataStr}`;
    if (level === 'error') {
      console.error(consoleMsg);
    } else if (level === 'warn') {
      console.warn(consoleMsg);
    } else {
      console.log(consoleMsg);
    }
  }

  debug(event: string, data?: LogData): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: LogData): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: LogData): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: LogData): void {
    this.log('error', event, data);
  }

  /** Log a pipeline phase transition for one recipe. */
  phase(recipe: string, phase: string): void {
    this.info(`Phase: ${phase}`, { recipe });
  }

  /** Log recipe start. Returns a function to call on completion that logs elapsed time. */
  recipeStart(recipe: string): () => void {
    const start = Date.now();
    this.info(`Recipe started: ${recipe}`);
    return () => {
      this.info(`Recipe completed: ${recipe}`, { elapsedMs: Date.now() - start });
    };
  }

  recipeFailed(recipe: string, error: string, phase: string | null): void {
    this.error(`Recipe failed: ${recipe}`, { phase, error });
  }

  /** Log an oracle request; failures are warnings. */
  oracleCall(recipe: string, operation: string, elapsedMs: number, ok: boolean): void {
    this.log(ok ? 'debug' : 'warn', `Oracle ${operation} ${ok ? 'returned' : 'failed'}`, { recipe, elapsedMs });
  }

  gateResult(recipe: string, gate: string, passed: boolean, output?: string): void {
    this.log(passed ? 'info' : 'warn', `Gate ${gate}: ${passed ? 'passed' : 'failed'}`, {
      recipe,
      ...(output ? { content: output } : {}),
    });
  }

  /** Log test results. */
  testResults(recipe: string, passed: number, failed: number, total: number, coveragePct?: number | null): void {
    this.info('Test results', { recipe, passed, failed, total, ...(coveragePct != null ? { coveragePct } : {}) });
  }

  /** Log build summary with total elapsed time. */
  buildSummary(succeeded: number, failed: number, skipped: number, total: number): void {
    const elapsed = Date.now() - this.buildStart;
    this.info('Build complete', {
      succeeded,
      failed,
      skipped,
      total,
      totalElapsedMs: elapsed,
      totalElapsedStr: formatElapsed(elapsed),
    });
  }

  /** Format data object for human-readable log line. */
  private formatData(data: LogData): string {
    const parts: string[] = [];
    for (const [key, value] of Object.entries(data)) {
      if (typeof value === 'string' && value.length > 200) {
        parts.push(`${key}=[${value.length} chars]`);
      } else if (typeof value === 'object' && value !== null) {
        parts.push(`${key}=${JSON.stringify(value)}`);
      } else {
        parts.push(`${key}=${String(value)}`);
      }
    }
    return parts.join(', ');
  }
}

/** Format elapsed ms to human-readable string. */
export function formatElapsed(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remaining = seconds % 60;
  if (minutes === 0) return `${remaining}s`;
  return `${minutes}m ${remaining}s`;
}

/**
 * Structured JSON Logger
 *
 * Provides consistent logging with run_id and stage for debugging.
 * All logs are JSON for easy parsing and aggregation.
 */

import type { Logger, Route } from '../core/types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  run_id?: string;
  dataset?: string;
  stage?: string;
  route?: Route;
  duration_ms?: number;
  error?: {
    code: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  runId?: string;
  dataset?: string;
  pretty?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class StructuredLogger implements Logger {
  private readonly levelName: LogLevel;
  private context: Partial<LogEntry>;
  private readonly pretty: boolean;

  constructor(options: LoggerOptions = {}) {
    this.levelName = options.level ?? 'info';
    this.pretty = options.pretty ?? process.env.NODE_ENV === 'development';
    this.context = {
      run_id: options.runId,
      dataset: options.dataset,
    };
  }

  child(additionalContext: Partial<LogEntry>): StructuredLogger {
    const logger = new StructuredLogger({
      level: this.levelName,
      pretty: this.pretty,
    });
    logger.context = { ...this.context, ...additionalContext };
    return logger;
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.levelName]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...meta,
    };

    // Clean undefined values
    for (const key of Object.keys(entry)) {
      if (entry[key] === undefined) {
        delete entry[key];
      }
    }

    const output = this.pretty
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    if (level === 'error') {
      console.error(output);
    } else if (level === 'warn') {
      console.warn(output);
    } else {
      console.log(output);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  // Convenience methods for pipeline events
  runStarted(runId: string, datasetName: string, rowCount: number): void {
    this.info('run_started', {
      run_id: runId,
      dataset: datasetName,
      row_count: rowCount,
    });
  }

  runCompleted(runId: string, route: Route, durationMs: number, insightSource: string): void {
    this.info('run_completed', {
      run_id: runId,
      route,
      duration_ms: durationMs,
      insight_source: insightSource,
    });
  }

  runFailed(runId: string, error: Error & { code?: string }, durationMs: number): void {
    this.error('run_failed', {
      run_id: runId,
      duration_ms: durationMs,
      error: {
        code: error.code ?? 'UNKNOWN',
        message: error.message,
        stack: process.env.NODE_ENV === 'development' ? error.stack : undefined,
      },
    });
  }

  stageCompleted(stage: string, durationMs: number, meta?: Record<string, unknown>): void {
    this.debug('stage_completed', {
      stage,
      duration_ms: durationMs,
      ...meta,
    });
  }

  strategyFallback(from: Route, to: Route, reason: string): void {
    this.warn('strategy_fallback', {
      from_route: from,
      to_route: to,
      reason,
    });
  }

  insightFallback(provider: string, reason: string): void {
    this.warn('insight_fallback', {
      provider,
      reason,
    });
  }
}

// Global logger instance
let globalLogger: StructuredLogger | null = null;

export function getLogger(): StructuredLogger {
  if (!globalLogger) {
    const level = process.env.LOG_LEVEL;
    globalLogger = new StructuredLogger({
      level: isLogLevel(level) ? level : 'info',
      pretty: process.env.NODE_ENV === 'development',
    });
  }
  return globalLogger;
}

export function createLogger(options: LoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}

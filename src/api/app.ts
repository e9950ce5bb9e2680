/**
 * Express application
 *
 * JSON body parsing, request logging, health check, the analyze route and
 * error mapping. Built from a pipeline so tests can inject their own.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { DatasetAnalyzerError } from '../core/errors.js';
import { getLogger, type StructuredLogger } from '../logging/logger.js';
import type { AnalysisPipeline } from '../execution/pipeline.js';
import { createAnalyzeRouter } from './routes/analyze.js';

export interface AppOptions {
  pipeline: AnalysisPipeline;
  logger?: StructuredLogger;
  bodyLimit?: string;
}

const STATUS_CODES: Record<string, number> = {
  INVALID_INPUT: 400,
  EMPTY_DATASET: 422,
  MALFORMED_ROW: 422,
  ANALYSIS_CANCELLED: 499,
  GENERATION_TIMEOUT: 504,
};

const CLIENT_ERROR_CODES: Record<number, string> = {
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
};

export function getStatusCode(code: string): number {
  return STATUS_CODES[code] ?? 500;
}

/** 4xx status carried by body-parser and other http-errors style errors. */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(options: AppOptions): Express {
  const app = express();
  const logger = options.logger ?? getLogger();

  app.use(express.json({ limit: options.bodyLimit ?? '50mb' }));

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const requestId = randomUUID();
    res.setHeader('X-Request-Id', requestId);

    res.on('finish', () => {
      logger.info('http_request', {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - start,
      });
    });

    next();
  });

  const health = (_req: Request, res: Response) => {
    res.json({
      status: 'online',
      timestamp: new Date().toISOString(),
    });
  };
  app.get('/', health);
  app.get('/health', health);

  app.use('/api/analyze', createAnalyzeRouter(options.pipeline));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: { code: 'NOT_FOUND', message: 'Route not found' },
    });
  });

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({
        error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' },
      });
      return;
    }

    if (err instanceof DatasetAnalyzerError) {
      res.status(getStatusCode(err.code)).json({
        error: {
          code: err.code,
          message: err.message,
          retryable: err.retryable,
          details: err.details,
        },
      });
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== undefined) {
      res.status(clientStatus).json({
        error: {
          code: CLIENT_ERROR_CODES[clientStatus] ?? 'BAD_REQUEST',
          message: err instanceof Error ? err.message : 'Bad request',
        },
      });
      return;
    }

    logger.error('unhandled_error', {
      error: err instanceof Error ? { message: err.message, stack: err.stack } : String(err),
    });

    res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message: process.env.NODE_ENV === 'production' || !(err instanceof Error)
          ? 'An internal error occurred'
          : err.message,
      },
    });
  });

  return app;
}

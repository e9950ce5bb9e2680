/**
 * Analyze API Route
 *
 * POST /api/analyze - Run one dataset analysis
 */

import { Router, Request, Response, NextFunction } from 'express';
import { AnalyzeRequestSchema } from '../../core/types.js';
import { InvalidInputError } from '../../core/errors.js';
import { toAnalyzeResponse } from '../../core/serialize.js';
import type { AnalysisPipeline } from '../../execution/pipeline.js';

export function createAnalyzeRouter(pipeline: AnalysisPipeline): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    // Abandon the run at the next stage boundary if the client goes away
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) controller.abort();
    };
    res.on('close', onClose);

    try {
      const parseResult = AnalyzeRequestSchema.safeParse(req.body);
      if (!parseResult.success) {
        throw new InvalidInputError('Invalid request body', parseResult.error.errors);
      }

      const run = await pipeline.analyze(parseResult.data, { signal: controller.signal });

      res.setHeader('X-Run-Id', run.id);
      res.json(toAnalyzeResponse(run));
    } catch (error) {
      next(error);
    } finally {
      res.off('close', onClose);
    }
  });

  return router;
}

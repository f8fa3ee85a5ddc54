/**
 * Run API routes.
 *
 * POST /runs: Start a batch run over a time window
 * GET /runs: List recent runs
 * GET /runs/:runId: Get run status and, once complete, its summary
 * POST /runs/:runId/cancel: Cancel a queued or in-flight run
 */

import { Router } from 'express';
import { z } from 'zod';
import { normalizeTimestamp } from '../classification/classifier';
import { parseSourceKind, SourceKind } from '../domain/deny-event';
import { apiError, notFoundError } from '../domain/errors';
import { BatchRunService } from '../engine/run-service';
import { RunStore } from '../storage/store';
import { logger } from '../logger';
import { parseBody } from './middleware';

const instant = z.string().transform((value, ctx) => {
  const iso = normalizeTimestamp(value);
  if (!iso) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a valid date or timestamp: "${value}"` });
    return z.NEVER;
  }
  return new Date(iso);
});

const sourceKind = z.string().transform((value, ctx): SourceKind => {
  const kind = parseSourceKind(value);
  if (!kind) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown source: "${value}"` });
    return z.NEVER;
  }
  return kind;
});

export const StartRunBodySchema = z.object({
  start: instant,
  end: instant,
  sources: z.array(sourceKind).min(1).optional(),
  maxRecords: z.number().int().positive().optional(),
});

const CancelRunBodySchema = z.object({
  reason: z.string().max(500).optional(),
});

export function createRunRoutes(store: RunStore, service: BatchRunService): Router {
  const router = Router();

  /**
   * POST /runs
   * Validates and queues the run, then executes it in the background.
   */
  router.post('/runs', async (req, res, next) => {
    const body = parseBody(StartRunBodySchema, req, res);
    if (!body) return;

    try {
      const run = await service.createRun({
        window: { start: body.start, end: body.end },
        sources: body.sources,
        maxRecords: body.maxRecords,
      });

      // Execute asynchronously (non-blocking); failures are recorded on the run
      service.executeRun(run.id).catch((err: unknown) => {
        logger.error('Background run execution failed', {
          runId: run.id,
          error: err instanceof Error ? err.message : String(err),
        });
      });

      res.status(202).json({ run });
    } catch (err) {
      next(err);
    }
  });

  router.get('/runs', async (req, res, next) => {
    try {
      const limit = typeof req.query.limit === 'string' ? Number.parseInt(req.query.limit, 10) : undefined;
      const runs = await store.list({ limit: limit !== undefined && limit > 0 ? limit : 20 });
      res.json({ runs });
    } catch (err) {
      next(err);
    }
  });

  router.get('/runs/:runId', async (req, res, next) => {
    try {
      const run = await store.getById(req.params.runId);
      if (!run) {
        res.status(404).json(apiError(notFoundError('Run', req.params.runId)));
        return;
      }
      res.json({ run });
    } catch (err) {
      next(err);
    }
  });

  router.post('/runs/:runId/cancel', async (req, res, next) => {
    const body = parseBody(CancelRunBodySchema, req, res);
    if (!body) return;

    try {
      const run = await service.cancelRun(req.params.runId, body.reason);
      res.status(202).json({ run });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

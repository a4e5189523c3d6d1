/**
 * Categorization Controller
 *
 * Bulk categorization runs and accuracy analytics.
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import * as db from '../database/database';
import { parseBody, parseQuery } from '../middleware';
import { getServices } from '../services';

const CompanyBodySchema = z.object({
  companyId: z.string().min(1),
  limit: z.number().int().min(1).max(10_000).optional()
});

const AccuracyQuerySchema = z.object({
  companyId: z.string().min(1),
  periodDays: z.coerce.number().int().min(1).max(3650).default(30)
});

/**
 * POST /categorization/uncategorized
 */
export async function categorizeUncategorized(req: Request, res: Response): Promise<void> {
  const { companyId, limit } = parseBody(CompanyBodySchema, req.body);
  const result = await getServices().pipeline.categorizeUncategorized(companyId, limit);
  res.json(result);
}

/**
 * POST /categorization/reprocess-defaults
 * Re-runs transactions that ended on the default category, e.g. after new rules.
 */
export async function reprocessDefaults(req: Request, res: Response): Promise<void> {
  const { companyId, limit } = parseBody(CompanyBodySchema, req.body);
  const result = await getServices().pipeline.reprocessDefaults(companyId, limit);
  res.json(result);
}

/**
 * POST /categorization/recompute
 */
export async function recompute(req: Request, res: Response): Promise<void> {
  const { companyId } = parseBody(CompanyBodySchema, req.body);
  const result = getServices().learner.recomputeAccuracy(companyId);
  res.json({ ...result, categoryStats: db.getCategoryStats(companyId) });
}

/**
 * GET /categorization/accuracy?companyId&periodDays
 */
export async function accuracy(req: Request, res: Response): Promise<void> {
  const { companyId, periodDays } = parseQuery(AccuracyQuerySchema, req.query);
  res.json(getServices().learner.accuracyMetrics(companyId, periodDays));
}

/**
 * GET /categorization/status
 */
export async function status(_req: Request, res: Response): Promise<void> {
  const { worker, classifier, pipeline, scheduler } = getServices();
  res.json({
    classifier: classifier.name,
    confidenceThreshold: pipeline.confidenceThreshold,
    worker: worker.getStats(),
    scheduler: scheduler.getStatus()
  });
}

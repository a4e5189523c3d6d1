/**
 * Transactions Controller
 *
 * Handles HTTP requests for synchronized transactions, their categorization
 * history and user corrections.
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import * as db from '../database/database';
import { AppError, parseBody, parseQuery, requireParam } from '../middleware';
import { getServices } from '../services';

const ListQuerySchema = z.object({
  companyId: z.string().min(1).optional(),
  connectionId: z.string().min(1).optional(),
  uncategorized: z.enum(['true', 'false']).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0)
}).refine(q => q.companyId !== undefined || q.connectionId !== undefined, {
  message: 'companyId or connectionId is required'
});

const CorrectionSchema = z.object({
  categoryId: z.string().min(1),
  reviewedBy: z.string().min(1).optional(),
  createRule: z.boolean().optional()
});

function requireTransactionId(req: Request): string {
  const id = requireParam(req.params['id'], 'id');
  if (!db.getTransactionById(id)) {
    throw AppError.notFound(`Transaction ${id} not found`);
  }
  return id;
}

/**
 * GET /transactions?companyId|connectionId&uncategorized
 */
export async function list(req: Request, res: Response): Promise<void> {
  const query = parseQuery(ListQuerySchema, req.query);
  const transactions = db.getTransactions({
    companyId: query.companyId,
    connectionId: query.connectionId,
    uncategorizedOnly: query.uncategorized === 'true',
    limit: query.limit,
    offset: query.offset
  });
  res.json({ transactions, pagination: { limit: query.limit, offset: query.offset } });
}

/**
 * GET /transactions/:id
 * Transaction with its categorization decisions, newest first.
 */
export async function getById(req: Request, res: Response): Promise<void> {
  const id = requireTransactionId(req);
  res.json({
    transaction: db.getTransactionById(id),
    decisions: db.getDecisionsByTransaction(id),
    trainingExamples: db.getTrainingExamplesByTransaction(id)
  });
}

/**
 * POST /transactions/:id/categorize
 * Re-runs the pipeline even when a category is already set.
 */
export async function categorize(req: Request, res: Response): Promise<void> {
  const id = requireTransactionId(req);
  const outcome = await getServices().pipeline.categorize(id, { force: true });
  if (!outcome) {
    throw AppError.conflict(`Transaction ${id} was manually reviewed`);
  }
  res.json(outcome);
}

/**
 * POST /transactions/:id/correction
 */
export async function correct(req: Request, res: Response): Promise<void> {
  const id = requireTransactionId(req);
  const { categoryId, reviewedBy, createRule } = parseBody(CorrectionSchema, req.body);
  const result = getServices().learner.recordCorrection(id, categoryId, reviewedBy, { createRule });
  res.status(201).json(result);
}

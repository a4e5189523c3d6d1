/**
 * Rules Controller
 *
 * Handles HTTP requests for categorization rules management.
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import type { RuleDefinition } from '../../shared/types';
import * as db from '../database/database';
import { AppError, parseBody, parseQuery, requireParam } from '../middleware';
import { RuleDefinitionSchema } from '../ai/rule-definition';
import { getServices } from '../services';

const RuleMetaSchema = z.object({
  companyId: z.string().min(1),
  categoryId: z.string().min(1),
  name: z.string().trim().min(1).max(100),
  priority: z.number().int().min(0).max(1000).optional(),
  isActive: z.boolean().optional(),
  confidenceThreshold: z.number().min(0).max(1).optional(),
  createdBy: z.string().optional()
});

const RuleChangesSchema = z.object({
  categoryId: z.string().min(1).optional(),
  name: z.string().trim().min(1).max(100).optional(),
  priority: z.number().int().min(0).max(1000).optional(),
  isActive: z.boolean().optional(),
  confidenceThreshold: z.number().min(0).max(1).optional(),
  ruleType: z.string().optional()
});

const ListQuerySchema = z.object({
  companyId: z.string().min(1)
});

const ApplyBodySchema = z.object({
  limit: z.number().int().min(1).max(10_000).optional()
}).default({});

/**
 * Rejects pattern rules whose regex does not compile.
 */
function checkDefinition(definition: RuleDefinition): void {
  if (definition.ruleType !== 'pattern') return;
  try {
    new RegExp(definition.conditions.pattern, 'i');
  } catch {
    throw AppError.badRequest(`Invalid pattern: ${definition.conditions.pattern}`);
  }
}

function requireCategoryFor(companyId: string, categoryId: string): void {
  const category = db.getCategoryById(categoryId);
  if (!category || (category.companyId !== undefined && category.companyId !== companyId)) {
    throw AppError.badRequest(`Category ${categoryId} not found`);
  }
}

/**
 * GET /rules?companyId
 */
export async function getAll(req: Request, res: Response): Promise<void> {
  const { companyId } = parseQuery(ListQuerySchema, req.query);
  const rules = db.getRulesByCompany(companyId);
  res.json({
    rules,
    stats: {
      total: rules.length,
      active: rules.filter(r => r.isActive).length,
      totalMatches: rules.reduce((sum, r) => sum + r.matchCount, 0)
    }
  });
}

/**
 * POST /rules
 */
export async function create(req: Request, res: Response): Promise<void> {
  const meta = parseBody(RuleMetaSchema, req.body);
  const definition = parseBody(RuleDefinitionSchema, req.body);
  checkDefinition(definition);
  requireCategoryFor(meta.companyId, meta.categoryId);

  const rule = db.insertRule({ ...meta, ...definition });
  console.log(`[Rules] Created ${rule.ruleType} rule ${rule.id} for company ${rule.companyId}`);
  res.status(201).json(rule);
}

/**
 * PUT /rules/:id
 * Partial update. Conditions are replaced only when ruleType is sent.
 */
export async function update(req: Request, res: Response): Promise<void> {
  const id = requireParam(req.params['id'], 'id');
  const current = db.getRuleById(id);
  if (!current) {
    throw AppError.notFound('Rule not found');
  }

  const changes = parseBody(RuleChangesSchema, req.body);
  let definition: RuleDefinition | undefined;
  if (changes.ruleType !== undefined) {
    definition = parseBody(RuleDefinitionSchema, req.body);
    checkDefinition(definition);
  }
  if (changes.categoryId) {
    requireCategoryFor(current.companyId, changes.categoryId);
  }

  const rule = db.updateRule(id, {
    name: changes.name,
    categoryId: changes.categoryId,
    priority: changes.priority,
    isActive: changes.isActive,
    confidenceThreshold: changes.confidenceThreshold,
    definition
  });
  res.json(rule);
}

/**
 * DELETE /rules/:id
 */
export async function remove(req: Request, res: Response): Promise<void> {
  const id = requireParam(req.params['id'], 'id');
  if (!db.deleteRule(id)) {
    throw AppError.notFound('Rule not found');
  }
  res.json({ success: true });
}

/**
 * POST /rules/:id/apply
 * Categorizes existing uncategorized transactions that match the rule.
 */
export async function apply(req: Request, res: Response): Promise<void> {
  const id = requireParam(req.params['id'], 'id');
  const { limit } = parseBody(ApplyBodySchema, req.body ?? {});
  const result = getServices().pipeline.applyRuleToExisting(id, limit);
  res.json(result);
}

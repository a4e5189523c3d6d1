/**
 * Categories Controller
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import * as db from '../database/database';
import { AppError, parseBody, parseQuery } from '../middleware';
import { slugify } from '../../shared/constants/categories';

const ListQuerySchema = z.object({
  companyId: z.string().min(1)
});

const CreateCategorySchema = z.object({
  companyId: z.string().min(1),
  name: z.string().trim().min(1).max(100),
  categoryType: z.enum(['income', 'expense', 'transfer']),
  keywords: z.array(z.string().trim().min(1)).default([])
});

/**
 * GET /categories?companyId
 * The company's own categories plus the system ones.
 */
export async function getAll(req: Request, res: Response): Promise<void> {
  const { companyId } = parseQuery(ListQuerySchema, req.query);
  res.json({ categories: db.getCategoriesForCompany(companyId) });
}

/**
 * POST /categories
 */
export async function create(req: Request, res: Response): Promise<void> {
  const input = parseBody(CreateCategorySchema, req.body);
  const slug = slugify(input.name);
  const clash = db.getCategoriesForCompany(input.companyId).find(c => c.slug === slug);
  if (clash) {
    throw AppError.conflict(`Category "${clash.name}" already exists`);
  }
  const category = db.insertCategory(input);
  res.status(201).json(category);
}

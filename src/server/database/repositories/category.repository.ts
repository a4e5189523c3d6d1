/**
 * Category Repository
 *
 * Database operations for categories.
 */

import { randomUUID } from 'crypto';
import { db } from '../connection';
import type { Category, CategoryType } from '../../../shared/types';
import { slugify } from '../../../shared/constants/categories';

interface CategoryRow {
  id: string;
  company_id: string | null;
  name: string;
  slug: string;
  category_type: CategoryType;
  keywords: string;
  is_system: number;
  is_active: number;
}

function mapCategory(row: CategoryRow): Category {
  const keywords: string[] = JSON.parse(row.keywords);
  return {
    id: row.id,
    companyId: row.company_id ?? undefined,
    name: row.name,
    slug: row.slug,
    categoryType: row.category_type,
    keywords,
    isSystem: row.is_system === 1,
    isActive: row.is_active === 1
  };
}

export function systemCategoryId(slug: string): string {
  return `system-${slug}`;
}

export function getCategoryById(id: string): Category | null {
  const row = db.prepare<[string], CategoryRow>(`SELECT * FROM categories WHERE id = ?`).get(id);
  return row ? mapCategory(row) : null;
}

export function getSystemCategoryBySlug(slug: string): Category | null {
  return getCategoryById(systemCategoryId(slug));
}

/**
 * Active categories visible to a company: its own plus the system ones.
 */
export function getCategoriesForCompany(companyId: string): Category[] {
  return db.prepare<[string], CategoryRow>(`
    SELECT * FROM categories
    WHERE is_active = 1 AND (company_id IS NULL OR company_id = ?)
    ORDER BY is_system DESC, name
  `).all(companyId).map(mapCategory);
}

export function upsertSystemCategory(name: string, slug: string, categoryType: CategoryType, keywords: string[]): void {
  db.prepare(`
    INSERT INTO categories (id, company_id, name, slug, category_type, keywords, is_system, is_active)
    VALUES (?, NULL, ?, ?, ?, ?, 1, 1)
    ON CONFLICT(id) DO UPDATE SET
      name = excluded.name,
      category_type = excluded.category_type,
      keywords = excluded.keywords
  `).run(systemCategoryId(slug), name, slug, categoryType, JSON.stringify(keywords));
}

export interface NewCategory {
  companyId: string;
  name: string;
  categoryType: CategoryType;
  keywords: string[];
}

export function insertCategory(input: NewCategory): Category {
  const id = randomUUID();
  db.prepare(`
    INSERT INTO categories (id, company_id, name, slug, category_type, keywords, is_system, is_active)
    VALUES (?, ?, ?, ?, ?, ?, 0, 1)
  `).run(id, input.companyId, input.name, slugify(input.name), input.categoryType, JSON.stringify(input.keywords));
  const created = getCategoryById(id);
  if (!created) {
    throw new Error(`Category ${id} was not stored`);
  }
  return created;
}

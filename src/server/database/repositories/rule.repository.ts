/**
 * Rule Repository
 *
 * Database operations for categorization rules.
 */

import { randomUUID } from 'crypto';
import { db } from '../connection';
import type { CategoryRule, RuleDefinition } from '../../../shared/types';
import { parseStoredDefinition } from '../../ai/rule-definition';

interface RuleRow {
  id: string;
  company_id: string;
  category_id: string;
  name: string;
  rule_type: string;
  conditions: string;
  priority: number;
  is_active: number;
  confidence_threshold: number;
  match_count: number;
  accuracy_rate: number | null;
  created_by: string | null;
  created_at: string;
  updated_at: string;
}

function mapRule(row: RuleRow): CategoryRule {
  return {
    ...parseStoredDefinition(row.rule_type, row.conditions),
    id: row.id,
    companyId: row.company_id,
    categoryId: row.category_id,
    name: row.name,
    priority: row.priority,
    isActive: row.is_active === 1,
    confidenceThreshold: row.confidence_threshold,
    matchCount: row.match_count,
    accuracyRate: row.accuracy_rate ?? undefined,
    createdBy: row.created_by ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

/**
 * Active rules in evaluation order: priority descending, then name, then id.
 */
export function getActiveRules(companyId: string): CategoryRule[] {
  return db.prepare<[string], RuleRow>(`
    SELECT * FROM category_rules
    WHERE company_id = ? AND is_active = 1
    ORDER BY priority DESC, name ASC, id ASC
  `).all(companyId).map(mapRule);
}

export function getRulesByCompany(companyId: string): CategoryRule[] {
  return db.prepare<[string], RuleRow>(`
    SELECT * FROM category_rules WHERE company_id = ? ORDER BY priority DESC, name ASC, id ASC
  `).all(companyId).map(mapRule);
}

export function getRuleById(id: string): CategoryRule | null {
  const row = db.prepare<[string], RuleRow>(`SELECT * FROM category_rules WHERE id = ?`).get(id);
  return row ? mapRule(row) : null;
}

export type NewRule = RuleDefinition & {
  companyId: string;
  categoryId: string;
  name: string;
  priority?: number;
  isActive?: boolean;
  confidenceThreshold?: number;
  createdBy?: string;
};

export function insertRule(input: NewRule): CategoryRule {
  const id = randomUUID();
  const now = new Date().toISOString();
  db.prepare(`
    INSERT INTO category_rules (
      id, company_id, category_id, name, rule_type, conditions, priority, is_active,
      confidence_threshold, match_count, created_by, created_at, updated_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 0, ?, ?, ?)
  `).run(
    id,
    input.companyId,
    input.categoryId,
    input.name,
    input.ruleType,
    JSON.stringify(input.conditions),
    input.priority ?? 0,
    input.isActive === false ? 0 : 1,
    input.confidenceThreshold ?? 0.8,
    input.createdBy ?? null,
    now,
    now
  );
  const created = getRuleById(id);
  if (!created) {
    throw new Error(`Rule ${id} was not stored`);
  }
  return created;
}

export interface RuleChanges {
  name?: string;
  categoryId?: string;
  definition?: RuleDefinition;
  priority?: number;
  isActive?: boolean;
  confidenceThreshold?: number;
}

export function updateRule(id: string, changes: RuleChanges): CategoryRule | null {
  const current = getRuleById(id);
  if (!current) return null;

  const definition = changes.definition ?? { ruleType: current.ruleType, conditions: current.conditions };
  db.prepare(`
    UPDATE category_rules SET
      name = ?, category_id = ?, rule_type = ?, conditions = ?, priority = ?,
      is_active = ?, confidence_threshold = ?, updated_at = ?
    WHERE id = ?
  `).run(
    changes.name ?? current.name,
    changes.categoryId ?? current.categoryId,
    definition.ruleType,
    JSON.stringify(definition.conditions),
    changes.priority ?? current.priority,
    (changes.isActive ?? current.isActive) ? 1 : 0,
    changes.confidenceThreshold ?? current.confidenceThreshold,
    new Date().toISOString(),
    id
  );
  return getRuleById(id);
}

export function deleteRule(id: string): boolean {
  const result = db.prepare(`DELETE FROM category_rules WHERE id = ?`).run(id);
  return result.changes > 0;
}

export function incrementRuleMatchCount(id: string, by = 1): void {
  db.prepare(`UPDATE category_rules SET match_count = match_count + ? WHERE id = ?`).run(by, id);
}

export function setRuleAccuracy(id: string, accuracyRate: number | null): void {
  db.prepare(`UPDATE category_rules SET accuracy_rate = ? WHERE id = ?`).run(accuracyRate, id);
}

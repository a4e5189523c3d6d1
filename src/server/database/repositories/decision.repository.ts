/**
 * Decision Repository
 *
 * Append-only log of categorization attempts. Only the review columns
 * (was_accepted, final_category_id) change after insertion.
 */

import { randomUUID } from 'crypto';
import { db } from '../connection';
import type { CategorizationDecision, CategorizationMethod } from '../../../shared/types';

interface DecisionRow {
  id: string;
  seq: number;
  transaction_id: string;
  method: CategorizationMethod;
  suggested_category_id: string | null;
  confidence: number;
  processing_time_ms: number;
  rule_id: string | null;
  classifier_name: string | null;
  reason: string | null;
  was_accepted: number | null;
  final_category_id: string | null;
  created_at: string;
}

function mapDecision(row: DecisionRow): CategorizationDecision {
  return {
    id: row.id,
    transactionId: row.transaction_id,
    method: row.method,
    suggestedCategoryId: row.suggested_category_id ?? undefined,
    confidence: row.confidence,
    processingTimeMs: row.processing_time_ms,
    ruleId: row.rule_id ?? undefined,
    classifierName: row.classifier_name ?? undefined,
    reason: row.reason ?? undefined,
    wasAccepted: row.was_accepted === null ? undefined : row.was_accepted === 1,
    finalCategoryId: row.final_category_id ?? undefined,
    createdAt: row.created_at
  };
}

export type NewDecision = Omit<CategorizationDecision, 'id' | 'createdAt' | 'wasAccepted' | 'finalCategoryId'>;

export function insertDecision(input: NewDecision): CategorizationDecision {
  const id = randomUUID();
  db.prepare(`
    INSERT INTO categorization_decisions (
      id, seq, transaction_id, method, suggested_category_id, confidence, processing_time_ms,
      rule_id, classifier_name, reason, created_at
    )
    VALUES (?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM categorization_decisions), ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    input.transactionId,
    input.method,
    input.suggestedCategoryId ?? null,
    input.confidence,
    input.processingTimeMs,
    input.ruleId ?? null,
    input.classifierName ?? null,
    input.reason ?? null,
    new Date().toISOString()
  );
  const row = db.prepare<[string], DecisionRow>(`SELECT * FROM categorization_decisions WHERE id = ?`).get(id);
  if (!row) {
    throw new Error(`Decision ${id} was not stored`);
  }
  return mapDecision(row);
}

export function getDecisionsByTransaction(transactionId: string): CategorizationDecision[] {
  return db.prepare<[string], DecisionRow>(`
    SELECT * FROM categorization_decisions WHERE transaction_id = ? ORDER BY seq DESC
  `).all(transactionId).map(mapDecision);
}

export function getLatestDecision(transactionId: string): CategorizationDecision | null {
  const row = db.prepare<[string], DecisionRow>(`
    SELECT * FROM categorization_decisions WHERE transaction_id = ? ORDER BY seq DESC LIMIT 1
  `).get(transactionId);
  return row ? mapDecision(row) : null;
}

export function markDecisionReviewed(id: string, wasAccepted: boolean, finalCategoryId: string): CategorizationDecision | null {
  db.prepare(`
    UPDATE categorization_decisions SET was_accepted = ?, final_category_id = ? WHERE id = ?
  `).run(wasAccepted ? 1 : 0, finalCategoryId, id);
  const row = db.prepare<[string], DecisionRow>(`SELECT * FROM categorization_decisions WHERE id = ?`).get(id);
  return row ? mapDecision(row) : null;
}

/**
 * Decisions for a company's transactions since a point in time.
 */
export function getDecisionsForCompany(companyId: string, since?: string): CategorizationDecision[] {
  return db.prepare<[string, string], DecisionRow>(`
    SELECT d.* FROM categorization_decisions d
    JOIN transactions t ON t.id = d.transaction_id
    WHERE t.company_id = ? AND d.created_at >= ?
    ORDER BY d.seq
  `).all(companyId, since ?? '').map(mapDecision);
}

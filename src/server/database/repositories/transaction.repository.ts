/**
 * Transaction Repository
 *
 * Database operations for canonical transactions.
 * Ingestion and categorization write disjoint column sets.
 */

import { randomUUID } from 'crypto';
import { db } from '../connection';
import type {
  CanonicalTransaction,
  CategorizationMethod,
  TransactionStatus,
  TransactionType
} from '../../../shared/types';

interface TransactionRow {
  id: string;
  connection_id: string;
  company_id: string;
  external_id: string;
  amount_minor: number;
  currency: string;
  transaction_type: TransactionType;
  description: string;
  occurred_at: string;
  counterpart_name: string | null;
  counterpart_document: string | null;
  reference_number: string | null;
  balance_after_minor: number | null;
  status: TransactionStatus;
  category_id: string | null;
  category_confidence: number | null;
  categorization_method: CategorizationMethod | null;
  categorized_at: string | null;
  is_ai_categorized: number;
  is_manually_reviewed: number;
  reviewed_by: string | null;
  created_at: string;
  updated_at: string;
}

function mapTransaction(row: TransactionRow): CanonicalTransaction {
  return {
    id: row.id,
    connectionId: row.connection_id,
    companyId: row.company_id,
    externalId: row.external_id,
    amountMinor: row.amount_minor,
    currency: row.currency,
    transactionType: row.transaction_type,
    description: row.description,
    occurredAt: row.occurred_at,
    counterpartName: row.counterpart_name ?? undefined,
    counterpartDocument: row.counterpart_document ?? undefined,
    referenceNumber: row.reference_number ?? undefined,
    balanceAfterMinor: row.balance_after_minor ?? undefined,
    status: row.status,
    categoryId: row.category_id ?? undefined,
    categoryConfidence: row.category_confidence ?? undefined,
    categorizationMethod: row.categorization_method ?? undefined,
    categorizedAt: row.categorized_at ?? undefined,
    isAiCategorized: row.is_ai_categorized === 1,
    isManuallyReviewed: row.is_manually_reviewed === 1,
    reviewedBy: row.reviewed_by ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

/**
 * Fields supplied by a bank for one transaction
 */
export interface TransactionInput {
  externalId: string;
  amountMinor: number;
  currency: string;
  transactionType: TransactionType;
  description: string;
  occurredAt: string;
  counterpartName?: string;
  counterpartDocument?: string;
  referenceNumber?: string;
  balanceAfterMinor?: number;
  status: TransactionStatus;
}

export interface UpsertedTransaction {
  id: string;
  externalId: string;
  isNew: boolean;
}

export function getTransactionById(id: string): CanonicalTransaction | null {
  const row = db.prepare<[string], TransactionRow>(`SELECT * FROM transactions WHERE id = ?`).get(id);
  return row ? mapTransaction(row) : null;
}

export function getTransactionByExternalId(connectionId: string, externalId: string): CanonicalTransaction | null {
  const row = db.prepare<[string, string], TransactionRow>(`
    SELECT * FROM transactions WHERE connection_id = ? AND external_id = ?
  `).get(connectionId, externalId);
  return row ? mapTransaction(row) : null;
}

export interface TransactionFilter {
  companyId?: string;
  connectionId?: string;
  uncategorizedOnly?: boolean;
  limit?: number;
  offset?: number;
}

export function getTransactions(filter: TransactionFilter): CanonicalTransaction[] {
  const clauses: string[] = [];
  const params: (string | number)[] = [];

  if (filter.companyId) {
    clauses.push('company_id = ?');
    params.push(filter.companyId);
  }
  if (filter.connectionId) {
    clauses.push('connection_id = ?');
    params.push(filter.connectionId);
  }
  if (filter.uncategorizedOnly) {
    clauses.push('category_id IS NULL');
  }

  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
  params.push(filter.limit ?? 100, filter.offset ?? 0);

  return db.prepare<(string | number)[], TransactionRow>(`
    SELECT * FROM transactions ${where}
    ORDER BY occurred_at DESC, id
    LIMIT ? OFFSET ?
  `).all(...params).map(mapTransaction);
}

export function countTransactionsByConnection(connectionId: string): number {
  const row = db.prepare<[string], { count: number }>(`
    SELECT COUNT(*) AS count FROM transactions WHERE connection_id = ?
  `).get(connectionId);
  return row?.count ?? 0;
}

/**
 * Inserts new transactions and overwrites the mutable fields of known ones,
 * all inside one SQLite transaction. Category fields are left untouched.
 */
export function upsertTransactionBatch(
  connectionId: string,
  companyId: string,
  items: TransactionInput[]
): UpsertedTransaction[] {
  const findExisting = db.prepare<[string, string], { id: string }>(`
    SELECT id FROM transactions WHERE connection_id = ? AND external_id = ?
  `);

  const insert = db.prepare(`
    INSERT INTO transactions (
      id, connection_id, company_id, external_id, amount_minor, currency, transaction_type,
      description, occurred_at, counterpart_name, counterpart_document, reference_number,
      balance_after_minor, status, created_at, updated_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const update = db.prepare(`
    UPDATE transactions SET
      amount_minor = ?,
      currency = ?,
      transaction_type = ?,
      description = ?,
      occurred_at = ?,
      counterpart_name = ?,
      counterpart_document = ?,
      reference_number = ?,
      balance_after_minor = ?,
      status = ?,
      updated_at = ?
    WHERE id = ?
  `);

  const run = db.transaction((batch: TransactionInput[]): UpsertedTransaction[] => {
    const now = new Date().toISOString();
    const results: UpsertedTransaction[] = [];

    for (const item of batch) {
      const existing = findExisting.get(connectionId, item.externalId);
      if (existing) {
        update.run(
          item.amountMinor,
          item.currency,
          item.transactionType,
          item.description,
          item.occurredAt,
          item.counterpartName ?? null,
          item.counterpartDocument ?? null,
          item.referenceNumber ?? null,
          item.balanceAfterMinor ?? null,
          item.status,
          now,
          existing.id
        );
        results.push({ id: existing.id, externalId: item.externalId, isNew: false });
      } else {
        const id = randomUUID();
        insert.run(
          id,
          connectionId,
          companyId,
          item.externalId,
          item.amountMinor,
          item.currency,
          item.transactionType,
          item.description,
          item.occurredAt,
          item.counterpartName ?? null,
          item.counterpartDocument ?? null,
          item.referenceNumber ?? null,
          item.balanceAfterMinor ?? null,
          item.status,
          now,
          now
        );
        results.push({ id, externalId: item.externalId, isNew: true });
      }
    }

    return results;
  });

  return run(items);
}

export interface CategoryAssignment {
  categoryId: string;
  confidence: number;
  method: CategorizationMethod;
}

/**
 * Writes an automatic categorization. Manually reviewed rows are never overwritten.
 */
export function setAutomaticCategory(id: string, assignment: CategoryAssignment): boolean {
  const now = new Date().toISOString();
  const result = db.prepare(`
    UPDATE transactions SET
      category_id = ?,
      category_confidence = ?,
      categorization_method = ?,
      categorized_at = ?,
      is_ai_categorized = 1,
      updated_at = ?
    WHERE id = ? AND is_manually_reviewed = 0
  `).run(assignment.categoryId, assignment.confidence, assignment.method, now, now, id);
  return result.changes > 0;
}

export function setManualCategory(id: string, categoryId: string, reviewedBy?: string): boolean {
  const now = new Date().toISOString();
  const result = db.prepare(`
    UPDATE transactions SET
      category_id = ?,
      category_confidence = 1,
      categorization_method = 'manual',
      categorized_at = ?,
      is_ai_categorized = 0,
      is_manually_reviewed = 1,
      reviewed_by = ?,
      updated_at = ?
    WHERE id = ?
  `).run(categoryId, now, reviewedBy ?? null, now, id);
  return result.changes > 0;
}

export function getUncategorizedTransactions(companyId: string, limit: number): CanonicalTransaction[] {
  return db.prepare<[string, number], TransactionRow>(`
    SELECT * FROM transactions
    WHERE company_id = ? AND category_id IS NULL AND is_manually_reviewed = 0
    ORDER BY occurred_at DESC, id
    LIMIT ?
  `).all(companyId, limit).map(mapTransaction);
}

export function getTransactionsByMethod(
  companyId: string,
  method: CategorizationMethod,
  limit: number
): CanonicalTransaction[] {
  return db.prepare<[string, string, number], TransactionRow>(`
    SELECT * FROM transactions
    WHERE company_id = ? AND categorization_method = ? AND is_manually_reviewed = 0
    ORDER BY occurred_at DESC, id
    LIMIT ?
  `).all(companyId, method, limit).map(mapTransaction);
}

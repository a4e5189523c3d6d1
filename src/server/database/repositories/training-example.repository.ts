/**
 * Training Example Repository
 *
 * Verified (description, category) pairs from user corrections. Append-only.
 */

import { randomUUID } from 'crypto';
import { db } from '../connection';
import type { TrainingExample, TrainingFeatures, TransactionType } from '../../../shared/types';

interface TrainingExampleRow {
  id: string;
  company_id: string;
  transaction_id: string | null;
  description: string;
  amount_minor: number;
  transaction_type: TransactionType;
  counterpart_name: string | null;
  category_id: string;
  verification_source: 'user_feedback';
  verified_by: string | null;
  features: string;
  created_at: string;
}

function mapTrainingExample(row: TrainingExampleRow): TrainingExample {
  const features: TrainingFeatures = JSON.parse(row.features);
  return {
    id: row.id,
    companyId: row.company_id,
    transactionId: row.transaction_id ?? undefined,
    description: row.description,
    amountMinor: row.amount_minor,
    transactionType: row.transaction_type,
    counterpartName: row.counterpart_name ?? undefined,
    categoryId: row.category_id,
    verificationSource: row.verification_source,
    verifiedBy: row.verified_by ?? undefined,
    features,
    createdAt: row.created_at
  };
}

export type NewTrainingExample = Omit<TrainingExample, 'id' | 'createdAt'>;

export function insertTrainingExample(input: NewTrainingExample): TrainingExample {
  const id = randomUUID();
  db.prepare(`
    INSERT INTO training_examples (
      id, company_id, transaction_id, description, amount_minor, transaction_type,
      counterpart_name, category_id, verification_source, verified_by, features, created_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    input.companyId,
    input.transactionId ?? null,
    input.description,
    input.amountMinor,
    input.transactionType,
    input.counterpartName ?? null,
    input.categoryId,
    input.verificationSource,
    input.verifiedBy ?? null,
    JSON.stringify(input.features),
    new Date().toISOString()
  );
  const row = db.prepare<[string], TrainingExampleRow>(`SELECT * FROM training_examples WHERE id = ?`).get(id);
  if (!row) {
    throw new Error(`Training example ${id} was not stored`);
  }
  return mapTrainingExample(row);
}

export function getTrainingExamples(companyId: string, limit = 500): TrainingExample[] {
  return db.prepare<[string, number], TrainingExampleRow>(`
    SELECT * FROM training_examples WHERE company_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?
  `).all(companyId, limit).map(mapTrainingExample);
}

export function getTrainingExamplesByTransaction(transactionId: string): TrainingExample[] {
  return db.prepare<[string], TrainingExampleRow>(`
    SELECT * FROM training_examples WHERE transaction_id = ? ORDER BY rowid
  `).all(transactionId).map(mapTrainingExample);
}

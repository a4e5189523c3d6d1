/**
 * Shared Categorization Types
 */

import type { CategorizationMethod, TransactionType } from './transaction.types';

export type CategoryType = 'income' | 'expense' | 'transfer';

export interface Category {
  id: string;
  companyId?: string;
  name: string;
  slug: string;
  categoryType: CategoryType;
  keywords: string[];
  isSystem: boolean;
  isActive: boolean;
}

export type RuleType = 'keyword' | 'amount_range' | 'counterpart' | 'pattern';

/**
 * Rule conditions, discriminated by rule type.
 * Amount bounds are in major units and compared against the absolute amount.
 */
export type RuleDefinition =
  | { ruleType: 'keyword'; conditions: { keywords: string[] } }
  | { ruleType: 'amount_range'; conditions: { minAmount?: number; maxAmount?: number } }
  | { ruleType: 'counterpart'; conditions: { counterparts: string[] } }
  | { ruleType: 'pattern'; conditions: { pattern: string } };

export type CategoryRule = RuleDefinition & {
  id: string;
  companyId: string;
  categoryId: string;
  name: string;
  priority: number;
  isActive: boolean;
  confidenceThreshold: number;
  matchCount: number;
  accuracyRate?: number;
  createdBy?: string;
  createdAt: string;
  updatedAt: string;
};

export interface CategorizationDecision {
  id: string;
  transactionId: string;
  method: CategorizationMethod;
  suggestedCategoryId?: string;
  confidence: number;
  processingTimeMs: number;
  ruleId?: string;
  classifierName?: string;
  reason?: string;
  wasAccepted?: boolean;
  finalCategoryId?: string;
  createdAt: string;
}

/**
 * Result contract handed to downstream consumers
 */
export interface CategorizationOutcome {
  transactionId: string;
  categoryId: string;
  confidence: number;
  method: CategorizationMethod;
  reason?: string;
  ruleId?: string;
}

export type AmountRange = 'very_low' | 'low' | 'medium' | 'high' | 'very_high';

export interface TrainingFeatures {
  descriptionLength: number;
  amountRange: AmountRange;
  day: number;
  weekday: number;
  hasCounterpart: boolean;
  descriptionWords: number;
  amountLog: number;
}

export interface TrainingExample {
  id: string;
  companyId: string;
  transactionId?: string;
  description: string;
  amountMinor: number;
  transactionType: TransactionType;
  counterpartName?: string;
  categoryId: string;
  verificationSource: 'user_feedback';
  verifiedBy?: string;
  features: TrainingFeatures;
  createdAt: string;
}

export interface CategoryStats {
  companyId: string;
  categoryId: string;
  totalDecisions: number;
  reviewedDecisions: number;
  acceptedDecisions: number;
  accuracyRate?: number;
  computedAt: string;
}

export interface MethodAccuracy {
  total: number;
  reviewed: number;
  accepted: number;
  accuracy?: number;
}

export interface AccuracyMetrics {
  companyId: string;
  periodDays: number;
  totalDecisions: number;
  reviewedDecisions: number;
  acceptedDecisions: number;
  overallAccuracy?: number;
  byMethod: Record<CategorizationMethod, MethodAccuracy>;
}

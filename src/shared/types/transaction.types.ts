/**
 * Shared Transaction Types
 *
 * Canonical transaction record produced by synchronization.
 */

export type TransactionType =
  | 'debit'
  | 'credit'
  | 'transfer_in'
  | 'transfer_out'
  | 'pix_in'
  | 'pix_out'
  | 'fee'
  | 'interest'
  | 'adjustment';

export type TransactionStatus = 'pending' | 'completed';

export type CategorizationMethod = 'rule' | 'classifier' | 'default' | 'manual';

/**
 * Amounts are signed integer minor units: credits positive, debits negative.
 */
export interface CanonicalTransaction {
  id: string;
  connectionId: string;
  companyId: string;
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

  // Categorization
  categoryId?: string;
  categoryConfidence?: number;
  categorizationMethod?: CategorizationMethod;
  categorizedAt?: string;
  isAiCategorized: boolean;
  isManuallyReviewed: boolean;
  reviewedBy?: string;

  createdAt: string;
  updatedAt: string;
}

/**
 * Categorization Pipeline
 *
 * rules → classifier → default. Every attempt ends with a category and
 * exactly one decision row, whatever stage produced it.
 */

import { performance } from 'perf_hooks';
import type {
  CanonicalTransaction,
  Category,
  CategorizationMethod,
  CategorizationOutcome
} from '../../shared/types';
import { FALLBACK_EXPENSE_SLUG, FALLBACK_INCOME_SLUG } from '../../shared/constants/categories';
import * as db from '../database/database';
import { AppError } from '../middleware/error-handler';
import { CategorizationFallback, errorMessage } from '../utils/errors';
import type { CandidateCategory, Classifier, ClassifierSuggestion } from './classifier';
import { RulesEngine, ruleMatches } from './rules-engine';

export const DEFAULT_CONFIDENCE = 0.1;

export interface PipelineOptions {
  classifier: Classifier;
  confidenceThreshold: number;
}

export interface CategorizeOptions {
  /** Re-run even when the transaction already has a category. */
  force?: boolean;
}

export interface BulkResult {
  processed: number;
  byMethod: Record<CategorizationMethod, number>;
  failed: number;
}

interface Verdict {
  categoryId: string;
  confidence: number;
  method: CategorizationMethod;
  reason: string;
  ruleId?: string;
  classifierName?: string;
}

function emptyCounts(): Record<CategorizationMethod, number> {
  return { rule: 0, classifier: 0, default: 0, manual: 0 };
}

/**
 * Categories a transaction of this sign can belong to.
 */
export function candidatesFor(transaction: CanonicalTransaction, categories: Category[]): CandidateCategory[] {
  const direction = transaction.amountMinor > 0 ? 'income' : 'expense';
  return categories
    .filter(c => c.categoryType === direction || c.categoryType === 'transfer')
    .map(c => ({ id: c.id, name: c.name, categoryType: c.categoryType, keywords: c.keywords }));
}

/**
 * Maps a suggested name to a candidate: exact (name or slug, case-insensitive)
 * first, then containment in either direction.
 */
export function resolveCategoryName(name: string, candidates: CandidateCategory[]): CandidateCategory | null {
  const wanted = name.trim().toLowerCase();
  if (!wanted) return null;

  const sorted = [...candidates].sort((a, b) => a.name.localeCompare(b.name));
  const exact = sorted.find(c => c.name.toLowerCase() === wanted || c.id.toLowerCase() === wanted);
  if (exact) return exact;

  return sorted.find(c => {
    const candidate = c.name.toLowerCase();
    return candidate.includes(wanted) || wanted.includes(candidate);
  }) ?? null;
}

export class CategorizationPipeline {
  constructor(private readonly options: PipelineOptions) {}

  get confidenceThreshold(): number {
    return this.options.confidenceThreshold;
  }

  /**
   * Categorizes one transaction. Returns null when it was skipped: manually
   * reviewed, or already categorized and not forced.
   */
  async categorize(transactionId: string, options: CategorizeOptions = {}): Promise<CategorizationOutcome | null> {
    const transaction = db.getTransactionById(transactionId);
    if (!transaction) {
      throw AppError.notFound(`Transaction ${transactionId} not found`);
    }
    if (transaction.isManuallyReviewed) {
      return null;
    }
    if (transaction.categoryId && !options.force) {
      return null;
    }

    const started = performance.now();
    const verdict = await this.decide(transaction);
    const processingTimeMs = Math.round(performance.now() - started);

    db.insertDecision({
      transactionId,
      method: verdict.method,
      suggestedCategoryId: verdict.categoryId,
      confidence: verdict.confidence,
      processingTimeMs,
      ruleId: verdict.ruleId,
      classifierName: verdict.classifierName,
      reason: verdict.reason
    });
    db.setAutomaticCategory(transactionId, {
      categoryId: verdict.categoryId,
      confidence: verdict.confidence,
      method: verdict.method
    });

    return {
      transactionId,
      categoryId: verdict.categoryId,
      confidence: verdict.confidence,
      method: verdict.method,
      reason: verdict.reason,
      ruleId: verdict.ruleId
    };
  }

  private async decide(transaction: CanonicalTransaction): Promise<Verdict> {
    const threshold = this.options.confidenceThreshold;

    try {
      return this.rulePass(transaction, threshold);
    } catch (error) {
      if (!(error instanceof CategorizationFallback)) throw error;
    }

    try {
      return await this.classifierPass(transaction, threshold);
    } catch (error) {
      if (!(error instanceof CategorizationFallback)) throw error;
      // A failing classifier is logged; a weak or empty suggestion is not
      if (error.cause !== undefined) {
        console.error(`[Categorization] ${error.message}`);
      }
    }

    return this.defaultPass(transaction);
  }

  private rulePass(transaction: CanonicalTransaction, threshold: number): Verdict {
    const engine = new RulesEngine(db.getActiveRules(transaction.companyId));
    const match = engine.findMatch(transaction);
    if (!match) {
      throw new CategorizationFallback('rule', 'no rule matched');
    }

    db.incrementRuleMatchCount(match.rule.id);
    const category = db.getCategoryById(match.rule.categoryId);
    if (!category || !category.isActive) {
      throw new CategorizationFallback('rule', `rule ${match.rule.id} points to an inactive category`);
    }
    if (match.confidence < threshold) {
      throw new CategorizationFallback('rule', `rule ${match.rule.id} confidence ${match.confidence} below ${threshold}`);
    }

    return {
      categoryId: category.id,
      confidence: match.confidence,
      method: 'rule',
      reason: `Matched rule "${match.rule.name}"`,
      ruleId: match.rule.id
    };
  }

  private async classifierPass(transaction: CanonicalTransaction, threshold: number): Promise<Verdict> {
    const { classifier } = this.options;
    const candidates = candidatesFor(transaction, db.getCategoriesForCompany(transaction.companyId));

    let suggestion: ClassifierSuggestion | null;
    try {
      suggestion = await classifier.classify({
        companyId: transaction.companyId,
        description: transaction.description,
        amountMinor: transaction.amountMinor,
        transactionType: transaction.transactionType,
        counterpartName: transaction.counterpartName,
        occurredAt: transaction.occurredAt
      }, candidates);
    } catch (error) {
      throw new CategorizationFallback(
        'classifier',
        `error from ${classifier.name}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (!suggestion) {
      throw new CategorizationFallback('classifier', 'no suggestion');
    }
    const { confidence } = suggestion;
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      throw new CategorizationFallback('classifier', `confidence out of range: ${confidence}`);
    }
    const category = resolveCategoryName(suggestion.categoryName, candidates);
    if (!category) {
      throw new CategorizationFallback('classifier', `unknown category "${suggestion.categoryName}"`);
    }
    if (confidence < threshold) {
      throw new CategorizationFallback('classifier', `confidence ${confidence} below ${threshold}`);
    }

    return {
      categoryId: category.id,
      confidence,
      method: 'classifier',
      reason: suggestion.reason ?? `Suggested by ${classifier.name}`,
      classifierName: classifier.name
    };
  }

  private defaultPass(transaction: CanonicalTransaction): Verdict {
    const slug = transaction.amountMinor > 0 ? FALLBACK_INCOME_SLUG : FALLBACK_EXPENSE_SLUG;
    const category = db.getSystemCategoryBySlug(slug);
    if (!category) {
      throw AppError.internal(`System category ${slug} is missing`);
    }
    return {
      categoryId: category.id,
      confidence: DEFAULT_CONFIDENCE,
      method: 'default',
      reason: 'No rule or classifier suggestion met the confidence threshold'
    };
  }

  // ==================== BULK OPERATIONS ====================

  async categorizeUncategorized(companyId: string, limit = 100): Promise<BulkResult> {
    return this.runBulk(db.getUncategorizedTransactions(companyId, limit), false);
  }

  /**
   * Re-runs the pipeline for transactions that fell through to the default
   * category, e.g. after new rules were added. Manual reviews are untouched.
   */
  async reprocessDefaults(companyId: string, limit = 500): Promise<BulkResult> {
    return this.runBulk(db.getTransactionsByMethod(companyId, 'default', limit), true);
  }

  /**
   * Applies one rule to the company's uncategorized transactions that match it.
   */
  applyRuleToExisting(ruleId: string, limit = 1000): { matched: number; categorized: number } {
    const rule = db.getRuleById(ruleId);
    if (!rule) {
      throw AppError.notFound(`Rule ${ruleId} not found`);
    }
    if (!db.getCategoryById(rule.categoryId)) {
      throw AppError.badRequest(`Rule ${ruleId} points to a missing category`);
    }

    let matched = 0;
    let categorized = 0;
    for (const transaction of db.getUncategorizedTransactions(rule.companyId, limit)) {
      const started = performance.now();
      if (!ruleMatches(rule, transaction)) continue;
      matched++;

      db.insertDecision({
        transactionId: transaction.id,
        method: 'rule',
        suggestedCategoryId: rule.categoryId,
        confidence: rule.confidenceThreshold,
        processingTimeMs: Math.round(performance.now() - started),
        ruleId: rule.id,
        reason: `Applied rule "${rule.name}" to existing transactions`
      });
      if (db.setAutomaticCategory(transaction.id, {
        categoryId: rule.categoryId,
        confidence: rule.confidenceThreshold,
        method: 'rule'
      })) {
        categorized++;
      }
    }

    if (matched > 0) {
      db.incrementRuleMatchCount(rule.id, matched);
    }
    console.log(`[Categorization] Rule ${rule.id} applied to ${categorized} existing transactions`);
    return { matched, categorized };
  }

  private async runBulk(transactions: CanonicalTransaction[], force: boolean): Promise<BulkResult> {
    const result: BulkResult = { processed: 0, byMethod: emptyCounts(), failed: 0 };

    for (const transaction of transactions) {
      try {
        const outcome = await this.categorize(transaction.id, { force });
        if (outcome) {
          result.processed++;
          result.byMethod[outcome.method]++;
        }
      } catch (error) {
        result.failed++;
        console.error(`[Categorization] Failed to categorize ${transaction.id}:`, errorMessage(error));
      }
    }

    console.log(`[Categorization] Bulk run: ${result.processed} categorized, ${result.failed} failed`);
    return result;
  }
}

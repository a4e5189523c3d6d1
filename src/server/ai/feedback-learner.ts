/**
 * Feedback Learner
 *
 * Turns user corrections into training examples and review marks on the
 * decision log, and derives rule and category accuracy from those marks.
 */

import type {
  AccuracyMetrics,
  AmountRange,
  CanonicalTransaction,
  CategorizationDecision,
  CategorizationMethod,
  CategoryRule,
  CategoryStats,
  MethodAccuracy,
  TrainingExample,
  TrainingFeatures
} from '../../shared/types';
import { db } from '../database/connection';
import * as repo from '../database/database';
import { AppError } from '../middleware/error-handler';
import { toMajorUnits } from '../utils/money';
import { extractKeywords } from './text';

const DAY_MS = 86_400_000;
const METHODS: readonly CategorizationMethod[] = ['rule', 'classifier', 'default', 'manual'];

export interface CorrectionOptions {
  /** Also create a keyword rule from the description's significant words. */
  createRule?: boolean;
}

export interface CorrectionResult {
  trainingExample: TrainingExample;
  /** The reviewed decision, or null when the transaction was never categorized automatically. */
  decision: CategorizationDecision | null;
  rule?: CategoryRule;
}

export interface RecomputeResult {
  rulesUpdated: number;
  categoriesUpdated: number;
}

export function amountRange(amountMinor: number): AmountRange {
  const amount = toMajorUnits(Math.abs(amountMinor));
  if (amount < 50) return 'very_low';
  if (amount < 200) return 'low';
  if (amount < 500) return 'medium';
  if (amount < 1000) return 'high';
  return 'very_high';
}

export function extractFeatures(transaction: CanonicalTransaction): TrainingFeatures {
  const occurred = new Date(transaction.occurredAt);
  const description = transaction.description.trim();
  return {
    descriptionLength: description.length,
    amountRange: amountRange(transaction.amountMinor),
    day: occurred.getUTCDate(),
    weekday: occurred.getUTCDay(),
    hasCounterpart: Boolean(transaction.counterpartName),
    descriptionWords: description === '' ? 0 : description.split(/\s+/).length,
    amountLog: Math.log1p(toMajorUnits(Math.abs(transaction.amountMinor)))
  };
}

function emptyAccuracy(): MethodAccuracy {
  return { total: 0, reviewed: 0, accepted: 0 };
}

function rate(accepted: number, reviewed: number): number | undefined {
  return reviewed > 0 ? accepted / reviewed : undefined;
}

export class FeedbackLearner {
  /**
   * Records the correct category for a transaction. All writes happen in one
   * SQLite transaction.
   */
  recordCorrection(
    transactionId: string,
    correctCategoryId: string,
    reviewer?: string,
    options: CorrectionOptions = {}
  ): CorrectionResult {
    const transaction = repo.getTransactionById(transactionId);
    if (!transaction) {
      throw AppError.notFound(`Transaction ${transactionId} not found`);
    }
    const category = repo.getCategoryById(correctCategoryId);
    if (!category || !category.isActive) {
      throw AppError.badRequest(`Category ${correctCategoryId} not found`);
    }
    if (category.companyId && category.companyId !== transaction.companyId) {
      throw AppError.badRequest(`Category ${correctCategoryId} belongs to another company`);
    }

    const apply = db.transaction((): CorrectionResult => {
      const trainingExample = repo.insertTrainingExample({
        companyId: transaction.companyId,
        transactionId: transaction.id,
        description: transaction.description,
        amountMinor: transaction.amountMinor,
        transactionType: transaction.transactionType,
        counterpartName: transaction.counterpartName,
        categoryId: category.id,
        verificationSource: 'user_feedback',
        verifiedBy: reviewer,
        features: extractFeatures(transaction)
      });

      repo.setManualCategory(transaction.id, category.id, reviewer);

      const latest = repo.getLatestDecision(transaction.id);
      const decision = latest
        ? repo.markDecisionReviewed(latest.id, latest.suggestedCategoryId === category.id, category.id)
        : null;

      let rule: CategoryRule | undefined;
      if (options.createRule) {
        const keywords = extractKeywords(transaction.description);
        if (keywords.length > 0) {
          rule = repo.insertRule({
            companyId: transaction.companyId,
            categoryId: category.id,
            name: `Learned: ${keywords.join(' ')}`,
            ruleType: 'keyword',
            conditions: { keywords },
            createdBy: reviewer ?? 'feedback'
          });
        }
      }

      return rule ? { trainingExample, decision, rule } : { trainingExample, decision };
    });

    const result = apply();
    console.log(
      `[FeedbackLearner] Transaction ${transactionId} corrected to ${category.slug}` +
      (result.decision ? ` (suggestion ${result.decision.wasAccepted ? 'accepted' : 'rejected'})` : '')
    );
    return result;
  }

  /**
   * Derives rule accuracy and per-category stats from every reviewed decision.
   * Running it twice gives the same state.
   */
  recomputeAccuracy(companyId: string, now = new Date()): RecomputeResult {
    const decisions = repo.getDecisionsForCompany(companyId);

    const byRule = new Map<string, { reviewed: number; accepted: number }>();
    const byCategory = new Map<string, CategoryStats>();
    const computedAt = now.toISOString();

    for (const decision of decisions) {
      const reviewed = decision.wasAccepted !== undefined;
      const accepted = decision.wasAccepted === true;

      if (decision.ruleId && reviewed) {
        const entry = byRule.get(decision.ruleId) ?? { reviewed: 0, accepted: 0 };
        entry.reviewed++;
        if (accepted) entry.accepted++;
        byRule.set(decision.ruleId, entry);
      }

      if (decision.suggestedCategoryId) {
        const stats = byCategory.get(decision.suggestedCategoryId) ?? {
          companyId,
          categoryId: decision.suggestedCategoryId,
          totalDecisions: 0,
          reviewedDecisions: 0,
          acceptedDecisions: 0,
          computedAt
        };
        stats.totalDecisions++;
        if (reviewed) stats.reviewedDecisions++;
        if (accepted) stats.acceptedDecisions++;
        byCategory.set(decision.suggestedCategoryId, stats);
      }
    }

    const rules = repo.getRulesByCompany(companyId);
    const categoryStats = [...byCategory.values()].map(stats => ({
      ...stats,
      accuracyRate: rate(stats.acceptedDecisions, stats.reviewedDecisions)
    }));

    db.transaction(() => {
      for (const rule of rules) {
        const entry = byRule.get(rule.id);
        repo.setRuleAccuracy(rule.id, entry ? rate(entry.accepted, entry.reviewed) ?? null : null);
      }
      repo.replaceCategoryStats(companyId, categoryStats);
    })();

    console.log(`[FeedbackLearner] Accuracy recomputed for ${companyId}: ${rules.length} rules, ${categoryStats.length} categories`);
    return { rulesUpdated: rules.length, categoriesUpdated: categoryStats.length };
  }

  accuracyMetrics(companyId: string, periodDays = 30, now = new Date()): AccuracyMetrics {
    const since = new Date(now.getTime() - periodDays * DAY_MS).toISOString();
    const decisions = repo.getDecisionsForCompany(companyId, since);

    const byMethod: Record<CategorizationMethod, MethodAccuracy> = {
      rule: emptyAccuracy(),
      classifier: emptyAccuracy(),
      default: emptyAccuracy(),
      manual: emptyAccuracy()
    };

    let reviewedDecisions = 0;
    let acceptedDecisions = 0;
    for (const decision of decisions) {
      const bucket = byMethod[decision.method];
      bucket.total++;
      if (decision.wasAccepted !== undefined) {
        bucket.reviewed++;
        reviewedDecisions++;
      }
      if (decision.wasAccepted === true) {
        bucket.accepted++;
        acceptedDecisions++;
      }
    }
    for (const method of METHODS) {
      byMethod[method].accuracy = rate(byMethod[method].accepted, byMethod[method].reviewed);
    }

    return {
      companyId,
      periodDays,
      totalDecisions: decisions.length,
      reviewedDecisions,
      acceptedDecisions,
      overallAccuracy: rate(acceptedDecisions, reviewedDecisions),
      byMethod
    };
  }
}

/**
 * Rules Engine
 *
 * Evaluates a company's categorization rules against a transaction.
 * Rules are tried in a fixed total order (priority descending, then name,
 * then id) and the first match wins, so results never depend on storage order.
 */

import type { CategoryRule } from '../../shared/types';
import { toMajorUnits } from '../utils/money';

export interface RuleSubject {
  description: string;
  amountMinor: number;
  counterpartName?: string;
}

export interface RuleMatch {
  rule: CategoryRule;
  confidence: number;
}

function containsAny(haystack: string | undefined, needles: string[]): boolean {
  if (!haystack) return false;
  const text = haystack.toLowerCase();
  return needles.some(needle => needle.trim() !== '' && text.includes(needle.trim().toLowerCase()));
}

export function compareRules(a: CategoryRule, b: CategoryRule): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export class RulesEngine {
  private readonly rules: CategoryRule[];
  private readonly patterns = new Map<string, RegExp | null>();

  constructor(rules: CategoryRule[]) {
    this.rules = rules.filter(rule => rule.isActive).sort(compareRules);
  }

  getRules(): CategoryRule[] {
    return [...this.rules];
  }

  /**
   * First rule in evaluation order that matches, with its confidence.
   */
  findMatch(subject: RuleSubject): RuleMatch | null {
    for (const rule of this.rules) {
      if (this.matches(rule, subject)) {
        return { rule, confidence: rule.confidenceThreshold };
      }
    }
    return null;
  }

  matches(rule: CategoryRule, subject: RuleSubject): boolean {
    switch (rule.ruleType) {
      case 'keyword':
        return containsAny(subject.description, rule.conditions.keywords);

      case 'amount_range': {
        const amount = toMajorUnits(Math.abs(subject.amountMinor));
        const { minAmount, maxAmount } = rule.conditions;
        if (minAmount !== undefined && amount < minAmount) return false;
        if (maxAmount !== undefined && amount > maxAmount) return false;
        return minAmount !== undefined || maxAmount !== undefined;
      }

      case 'counterpart':
        return containsAny(subject.counterpartName, rule.conditions.counterparts);

      case 'pattern': {
        const regex = this.compile(rule.id, rule.conditions.pattern);
        return regex !== null && regex.test(subject.description);
      }
    }
  }

  /**
   * Compiled case-insensitive pattern, or null when it is not a valid regex.
   */
  private compile(ruleId: string, pattern: string): RegExp | null {
    const cached = this.patterns.get(ruleId);
    if (cached !== undefined) return cached;

    let regex: RegExp | null;
    try {
      regex = new RegExp(pattern, 'i');
    } catch {
      console.error(`[RulesEngine] Rule ${ruleId} has an invalid pattern and will never match:`, pattern);
      regex = null;
    }
    this.patterns.set(ruleId, regex);
    return regex;
  }
}

/**
 * Whether one rule matches, outside the ordered evaluation.
 */
export function ruleMatches(rule: CategoryRule, subject: RuleSubject): boolean {
  return new RulesEngine([]).matches(rule, subject);
}

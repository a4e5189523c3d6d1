/**
 * Rule Definition Schema
 *
 * Validates the rule type and its conditions, both when rules are created
 * through the API and when they are read back from storage.
 */

import { z } from 'zod';
import type { RuleDefinition } from '../../shared/types';

const keywordList = z.array(z.string().trim().min(1)).min(1);

export const RuleDefinitionSchema = z.discriminatedUnion('ruleType', [
  z.object({
    ruleType: z.literal('keyword'),
    conditions: z.object({ keywords: keywordList })
  }),
  z.object({
    ruleType: z.literal('amount_range'),
    conditions: z.object({
      minAmount: z.number().nonnegative().optional(),
      maxAmount: z.number().nonnegative().optional()
    }).refine(
      c => c.minAmount !== undefined || c.maxAmount !== undefined,
      { message: 'amount_range needs minAmount or maxAmount' }
    ).refine(
      c => c.minAmount === undefined || c.maxAmount === undefined || c.minAmount <= c.maxAmount,
      { message: 'minAmount must not exceed maxAmount' }
    )
  }),
  z.object({
    ruleType: z.literal('counterpart'),
    conditions: z.object({ counterparts: keywordList })
  }),
  z.object({
    ruleType: z.literal('pattern'),
    conditions: z.object({ pattern: z.string().min(1) })
  })
]);

/**
 * Rebuilds a rule definition from its stored columns.
 */
export function parseStoredDefinition(ruleType: string, conditionsJson: string): RuleDefinition {
  const parsed = RuleDefinitionSchema.safeParse({ ruleType, conditions: JSON.parse(conditionsJson) });
  if (!parsed.success) {
    throw new Error(`Stored rule has invalid conditions: ${parsed.error.issues.map(i => i.message).join(', ')}`);
  }
  return parsed.data;
}

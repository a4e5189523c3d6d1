import { describe, it, expect } from 'vitest';
import type { CategoryRule, RuleDefinition } from '../../shared/types';
import { RulesEngine, compareRules, ruleMatches } from './rules-engine';

let seq = 0;

function rule(definition: RuleDefinition, overrides: Partial<Omit<CategoryRule, 'ruleType' | 'conditions'>> = {}): CategoryRule {
  seq++;
  return {
    ...definition,
    id: `rule-${seq}`,
    companyId: 'company-1',
    categoryId: 'system-vendas',
    name: `Rule ${seq}`,
    priority: 0,
    isActive: true,
    confidenceThreshold: 0.8,
    matchCount: 0,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...overrides
  };
}

describe('RulesEngine', () => {
  describe('matching', () => {
    it('matches keywords case-insensitively as substrings', () => {
      const r = rule({ ruleType: 'keyword', conditions: { keywords: ['pix recebido'] } });
      expect(ruleMatches(r, { description: 'PIX RECEBIDO - Cliente ABC', amountMinor: 100000 })).toBe(true);
      expect(ruleMatches(r, { description: 'PIX enviado', amountMinor: -100 })).toBe(false);
    });

    it('ignores blank keywords', () => {
      const r = rule({ ruleType: 'keyword', conditions: { keywords: ['  '] } });
      expect(ruleMatches(r, { description: 'anything', amountMinor: 1 })).toBe(false);
    });

    it('compares amount ranges against the absolute amount in major units', () => {
      const r = rule({ ruleType: 'amount_range', conditions: { minAmount: 100, maxAmount: 500 } });
      expect(ruleMatches(r, { description: '', amountMinor: -10000 })).toBe(true);
      expect(ruleMatches(r, { description: '', amountMinor: 50000 })).toBe(true);
      expect(ruleMatches(r, { description: '', amountMinor: 50001 })).toBe(false);
      expect(ruleMatches(r, { description: '', amountMinor: 9999 })).toBe(false);
    });

    it('matches open-ended amount ranges', () => {
      const r = rule({ ruleType: 'amount_range', conditions: { minAmount: 1000 } });
      expect(ruleMatches(r, { description: '', amountMinor: 250000 })).toBe(true);
      expect(ruleMatches(r, { description: '', amountMinor: 99999 })).toBe(false);
    });

    it('matches counterparts and never matches a missing counterpart', () => {
      const r = rule({ ruleType: 'counterpart', conditions: { counterparts: ['shell'] } });
      expect(ruleMatches(r, { description: 'Compra', amountMinor: -100, counterpartName: 'Posto Shell' })).toBe(true);
      expect(ruleMatches(r, { description: 'Shell', amountMinor: -100 })).toBe(false);
    });

    it('searches patterns case-insensitively', () => {
      const r = rule({ ruleType: 'pattern', conditions: { pattern: '^tarifa\\s+pacote' } });
      expect(ruleMatches(r, { description: 'TARIFA Pacote de servicos', amountMinor: -1000 })).toBe(true);
      expect(ruleMatches(r, { description: 'Estorno tarifa pacote', amountMinor: 1000 })).toBe(false);
    });

    it('treats an invalid pattern as never matching', () => {
      const r = rule({ ruleType: 'pattern', conditions: { pattern: '([unclosed' } });
      expect(ruleMatches(r, { description: '([unclosed', amountMinor: 0 })).toBe(false);
    });
  });

  describe('ordering', () => {
    it('picks the highest priority match', () => {
      const low = rule({ ruleType: 'keyword', conditions: { keywords: ['pix'] } }, { priority: 1, categoryId: 'low' });
      const high = rule({ ruleType: 'keyword', conditions: { keywords: ['pix'] } }, { priority: 5, categoryId: 'high' });
      const engine = new RulesEngine([low, high]);
      expect(engine.findMatch({ description: 'pix', amountMinor: 1 })?.rule.categoryId).toBe('high');
    });

    it('breaks priority ties by name, independent of input order', () => {
      const b = rule({ ruleType: 'keyword', conditions: { keywords: ['pix'] } }, { name: 'Beta', categoryId: 'b' });
      const a = rule({ ruleType: 'keyword', conditions: { keywords: ['pix'] } }, { name: 'Alpha', categoryId: 'a' });
      const subject = { description: 'pix recebido', amountMinor: 100 };

      expect(new RulesEngine([a, b]).findMatch(subject)?.rule.categoryId).toBe('a');
      expect(new RulesEngine([b, a]).findMatch(subject)?.rule.categoryId).toBe('a');
    });

    it('skips inactive rules', () => {
      const inactive = rule({ ruleType: 'keyword', conditions: { keywords: ['pix'] } }, { isActive: false, priority: 9 });
      const active = rule({ ruleType: 'keyword', conditions: { keywords: ['pix'] } }, { categoryId: 'active' });
      const engine = new RulesEngine([inactive, active]);
      expect(engine.getRules()).toHaveLength(1);
      expect(engine.findMatch({ description: 'pix', amountMinor: 1 })?.rule.categoryId).toBe('active');
    });

    it('returns the rule threshold as match confidence', () => {
      const r = rule({ ruleType: 'keyword', conditions: { keywords: ['pix'] } }, { confidenceThreshold: 0.65 });
      expect(new RulesEngine([r]).findMatch({ description: 'pix', amountMinor: 1 })?.confidence).toBe(0.65);
    });

    it('returns null when nothing matches', () => {
      const r = rule({ ruleType: 'keyword', conditions: { keywords: ['boleto'] } });
      expect(new RulesEngine([r]).findMatch({ description: 'pix', amountMinor: 1 })).toBeNull();
    });

    it('orders by id when priority and name are equal', () => {
      const x = rule({ ruleType: 'keyword', conditions: { keywords: ['a'] } }, { id: 'b-id', name: 'Same' });
      const y = rule({ ruleType: 'keyword', conditions: { keywords: ['a'] } }, { id: 'a-id', name: 'Same' });
      expect([x, y].sort(compareRules).map(r => r.id)).toEqual(['a-id', 'b-id']);
    });
  });
});

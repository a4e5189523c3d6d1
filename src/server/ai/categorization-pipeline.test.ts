import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as db from '../database/database';
import type { BankConnection } from '../database/database';
import { createTestConnection, insertTransaction, resetDatabase, TEST_COMPANY } from '../testing/fixtures';
import { CategorizationPipeline, DEFAULT_CONFIDENCE, resolveCategoryName } from './categorization-pipeline';
import type { CandidateCategory, Classifier, ClassifierInput, ClassifierSuggestion } from './classifier';

class StubClassifier implements Classifier {
  readonly name = 'stub';
  readonly seen: { input: ClassifierInput; candidates: CandidateCategory[] }[] = [];

  constructor(private readonly answer: (input: ClassifierInput) => ClassifierSuggestion | null) {}

  async classify(input: ClassifierInput, candidates: CandidateCategory[]): Promise<ClassifierSuggestion | null> {
    this.seen.push({ input, candidates });
    return this.answer(input);
  }
}

class FailingClassifier implements Classifier {
  readonly name = 'failing';

  async classify(): Promise<ClassifierSuggestion | null> {
    throw new Error('model unavailable');
  }
}

const silent = new StubClassifier(() => null);

function pipelineWith(classifier: Classifier = silent, confidenceThreshold = 0.7): CategorizationPipeline {
  return new CategorizationPipeline({ classifier, confidenceThreshold });
}

function vendasRule(confidenceThreshold = 0.9) {
  return db.insertRule({
    companyId: TEST_COMPANY,
    categoryId: 'system-vendas',
    name: 'PIX de clientes',
    ruleType: 'keyword',
    conditions: { keywords: ['pix recebido'] },
    confidenceThreshold
  });
}

describe('CategorizationPipeline', () => {
  let connection: BankConnection;

  beforeEach(() => {
    resetDatabase();
    connection = createTestConnection();
  });

  describe('rule pass', () => {
    it('categorizes a PIX credit as Vendas through a keyword rule', async () => {
      const rule = vendasRule();
      const tx = insertTransaction(connection, {
        description: 'PIX recebido - Cliente ABC',
        amountMinor: 100000,
        transactionType: 'pix_in'
      });

      const outcome = await pipelineWith().categorize(tx.id);

      expect(outcome).toEqual({
        transactionId: tx.id,
        categoryId: 'system-vendas',
        confidence: 0.9,
        method: 'rule',
        reason: 'Matched rule "PIX de clientes"',
        ruleId: rule.id
      });
      expect(db.getRuleById(rule.id)?.matchCount).toBe(1);

      const stored = db.getTransactionById(tx.id);
      expect(stored?.categoryId).toBe('system-vendas');
      expect(stored?.categorizationMethod).toBe('rule');
      expect(stored?.isAiCategorized).toBe(true);

      const decisions = db.getDecisionsByTransaction(tx.id);
      expect(decisions).toHaveLength(1);
      expect(decisions[0]?.ruleId).toBe(rule.id);
      expect(decisions[0]?.method).toBe('rule');
    });

    it('accepts a rule whose confidence equals the threshold', async () => {
      vendasRule(0.7);
      const tx = insertTransaction(connection, { description: 'PIX recebido', amountMinor: 1000 });

      const outcome = await pipelineWith(silent, 0.7).categorize(tx.id);

      expect(outcome?.method).toBe('rule');
      expect(outcome?.confidence).toBe(0.7);
    });

    it('falls through when the rule confidence is below the threshold', async () => {
      const rule = vendasRule(0.69);
      const tx = insertTransaction(connection, { description: 'PIX recebido', amountMinor: 1000 });

      const outcome = await pipelineWith(silent, 0.7).categorize(tx.id);

      expect(outcome?.method).toBe('default');
      expect(db.getRuleById(rule.id)?.matchCount).toBe(1);
    });
  });

  describe('classifier pass', () => {
    it('accepts a confident suggestion', async () => {
      const classifier = new StubClassifier(() => ({ categoryName: 'vendas', confidence: 0.85, reason: 'looks like a sale' }));
      const tx = insertTransaction(connection, { description: 'Recebimento loja', amountMinor: 25000 });

      const outcome = await pipelineWith(classifier).categorize(tx.id);

      expect(outcome).toEqual({
        transactionId: tx.id,
        categoryId: 'system-vendas',
        confidence: 0.85,
        method: 'classifier',
        reason: 'looks like a sale'
      });
      expect(db.getLatestDecision(tx.id)?.classifierName).toBe('stub');
    });

    it('accepts a suggestion whose confidence equals the threshold', async () => {
      const classifier = new StubClassifier(() => ({ categoryName: 'Vendas', confidence: 0.7 }));
      const tx = insertTransaction(connection, { description: 'Recebimento loja', amountMinor: 25000 });

      const outcome = await pipelineWith(classifier, 0.7).categorize(tx.id);

      expect(outcome?.method).toBe('classifier');
      expect(outcome?.confidence).toBe(0.7);
    });

    it('rejects a suggestion just below the threshold', async () => {
      const classifier = new StubClassifier(() => ({ categoryName: 'Vendas', confidence: 0.6999 }));
      const tx = insertTransaction(connection, { description: 'Recebimento loja', amountMinor: 25000 });

      const outcome = await pipelineWith(classifier, 0.7).categorize(tx.id);

      expect(outcome?.method).toBe('default');
      expect(outcome?.categoryId).toBe('system-outros-recebimentos');
    });

    it('falls back to the default category below the threshold', async () => {
      const classifier = new StubClassifier(() => ({ categoryName: 'Vendas', confidence: 0.4 }));
      const tx = insertTransaction(connection, { description: 'Credito diverso', amountMinor: 5000 });

      const outcome = await pipelineWith(classifier, 0.7).categorize(tx.id);

      expect(outcome?.categoryId).toBe('system-outros-recebimentos');
      expect(outcome?.confidence).toBe(DEFAULT_CONFIDENCE);
      expect(outcome?.method).toBe('default');
      expect(db.getDecisionsByTransaction(tx.id)).toHaveLength(1);
    });

    it('offers only categories matching the transaction direction', async () => {
      const classifier = new StubClassifier(() => ({ categoryName: 'Vendas', confidence: 0.99 }));
      const tx = insertTransaction(connection, { description: 'Pagamento', amountMinor: -5000 });

      const outcome = await pipelineWith(classifier).categorize(tx.id);

      const types = new Set(classifier.seen[0]?.candidates.map(c => c.categoryType));
      expect(types.has('income')).toBe(false);
      expect(outcome?.categoryId).toBe('system-outros-gastos');
      expect(outcome?.method).toBe('default');
    });

    it.each([
      ['a non-finite confidence', { categoryName: 'Vendas', confidence: Number.NaN }],
      ['a confidence above 1', { categoryName: 'Vendas', confidence: 1.5 }],
      ['an unknown category', { categoryName: 'Criptomoedas', confidence: 0.95 }]
    ])('discards %s', async (_label, suggestion) => {
      const tx = insertTransaction(connection, { description: 'Entrada', amountMinor: 5000 });
      const outcome = await pipelineWith(new StubClassifier(() => suggestion)).categorize(tx.id);
      expect(outcome?.method).toBe('default');
    });

    describe('logging', () => {
      afterEach(() => {
        vi.restoreAllMocks();
      });

      it('falls through and logs when the classifier throws', async () => {
        const errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const tx = insertTransaction(connection, { description: 'Entrada', amountMinor: 5000 });

        const outcome = await pipelineWith(new FailingClassifier()).categorize(tx.id);

        expect(outcome?.categoryId).toBe('system-outros-recebimentos');
        expect(errorLog).toHaveBeenCalledWith('[Categorization] classifier: error from failing: model unavailable');
      });

      it('does not log a classifier that has no suggestion', async () => {
        const errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const tx = insertTransaction(connection, { description: 'Entrada', amountMinor: 5000 });

        await pipelineWith(silent).categorize(tx.id);

        expect(errorLog).not.toHaveBeenCalled();
      });
    });
  });

  describe('skips', () => {
    it('leaves manually reviewed transactions alone, even when forced', async () => {
      const tx = insertTransaction(connection, { description: 'PIX recebido', amountMinor: 1000 });
      db.setManualCategory(tx.id, 'system-servicos', 'reviewer');
      vendasRule();

      expect(await pipelineWith().categorize(tx.id, { force: true })).toBeNull();
      expect(db.getTransactionById(tx.id)?.categoryId).toBe('system-servicos');
      expect(db.getDecisionsByTransaction(tx.id)).toHaveLength(0);
    });

    it('re-runs an already categorized transaction only when forced', async () => {
      const tx = insertTransaction(connection, { description: 'PIX recebido', amountMinor: 1000 });
      const pipeline = pipelineWith();
      await pipeline.categorize(tx.id);

      expect(await pipeline.categorize(tx.id)).toBeNull();

      vendasRule();
      const forced = await pipeline.categorize(tx.id, { force: true });
      expect(forced?.method).toBe('rule');
      expect(db.getDecisionsByTransaction(tx.id)).toHaveLength(2);
    });

    it('throws for an unknown transaction', async () => {
      await expect(pipelineWith().categorize('missing')).rejects.toThrow('Transaction missing not found');
    });
  });

  describe('bulk operations', () => {
    it('leaves no uncategorized transaction behind', async () => {
      vendasRule();
      insertTransaction(connection, { description: 'PIX recebido - Cliente A', amountMinor: 1000 });
      insertTransaction(connection, { description: 'Sem pista', amountMinor: -1000 });
      insertTransaction(connection, { description: 'Outra coisa', amountMinor: 2000 });

      const result = await pipelineWith().categorizeUncategorized(TEST_COMPANY);

      expect(result.processed).toBe(3);
      expect(result.failed).toBe(0);
      expect(result.byMethod).toEqual({ rule: 1, classifier: 0, default: 2, manual: 0 });
      expect(db.getUncategorizedTransactions(TEST_COMPANY, 100)).toHaveLength(0);
    });

    it('applies a rule to existing uncategorized matches', () => {
      const first = insertTransaction(connection, { description: 'PIX recebido - A', amountMinor: 1000 });
      insertTransaction(connection, { description: 'PIX recebido - B', amountMinor: 2000 });
      insertTransaction(connection, { description: 'Boleto', amountMinor: -3000 });
      const rule = vendasRule();

      const result = pipelineWith().applyRuleToExisting(rule.id);

      expect(result).toEqual({ matched: 2, categorized: 2 });
      expect(db.getRuleById(rule.id)?.matchCount).toBe(2);
      expect(db.getTransactionById(first.id)?.categoryId).toBe('system-vendas');
      expect(db.getLatestDecision(first.id)?.method).toBe('rule');
    });

    it('reprocesses default-categorized transactions after a new rule', async () => {
      const tx = insertTransaction(connection, { description: 'PIX recebido - C', amountMinor: 1000 });
      const pipeline = pipelineWith();
      expect((await pipeline.categorize(tx.id))?.method).toBe('default');

      vendasRule();
      const result = await pipeline.reprocessDefaults(TEST_COMPANY);

      expect(result.byMethod.rule).toBe(1);
      expect(db.getTransactionById(tx.id)?.categoryId).toBe('system-vendas');
    });
  });
});

describe('resolveCategoryName', () => {
  const candidates: CandidateCategory[] = [
    { id: 'system-vendas', name: 'Vendas', categoryType: 'income', keywords: [] },
    { id: 'system-outros-recebimentos', name: 'Outros Recebimentos', categoryType: 'income', keywords: [] }
  ];

  it('prefers an exact case-insensitive match', () => {
    expect(resolveCategoryName('VENDAS', candidates)?.id).toBe('system-vendas');
  });

  it('falls back to containment in either direction', () => {
    expect(resolveCategoryName('Recebimentos', candidates)?.id).toBe('system-outros-recebimentos');
    expect(resolveCategoryName('Vendas online', candidates)?.id).toBe('system-vendas');
  });

  it('returns null for blank or unknown names', () => {
    expect(resolveCategoryName('  ', candidates)).toBeNull();
    expect(resolveCategoryName('Impostos', candidates)).toBeNull();
  });
});

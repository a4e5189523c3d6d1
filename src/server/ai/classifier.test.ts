import { describe, it, expect } from 'vitest';
import type { TrainingExample } from '../../shared/types';
import { OpenAIClassifier, StatisticalClassifier, type CandidateCategory, type ClassifierInput } from './classifier';

const vendas: CandidateCategory = {
  id: 'cat-vendas',
  name: 'Vendas',
  categoryType: 'income',
  keywords: ['venda', 'cliente', 'pix recebido']
};

const transporte: CandidateCategory = {
  id: 'cat-transporte',
  name: 'Transporte',
  categoryType: 'expense',
  keywords: []
};

function input(description: string, amountMinor = 100000): ClassifierInput {
  return {
    companyId: 'company-1',
    description,
    amountMinor,
    transactionType: amountMinor > 0 ? 'credit' : 'debit',
    occurredAt: '2024-03-15T12:00:00.000Z'
  };
}

function example(categoryId: string, description: string): TrainingExample {
  return {
    id: `ex-${description}`,
    companyId: 'company-1',
    description,
    amountMinor: -2500,
    transactionType: 'debit',
    categoryId,
    verificationSource: 'user_feedback',
    features: {
      descriptionLength: description.length,
      amountRange: 'very_low',
      day: 1,
      weekday: 1,
      hasCounterpart: false,
      descriptionWords: description.split(' ').length,
      amountLog: Math.log1p(25)
    },
    createdAt: '2024-03-01T00:00:00.000Z'
  };
}

describe('StatisticalClassifier', () => {
  it('scores keyword hits', async () => {
    const classifier = new StatisticalClassifier(() => []);
    const suggestion = await classifier.classify(input('PIX recebido - Cliente ABC'), [vendas, transporte]);

    expect(suggestion).toEqual({
      categoryName: 'Vendas',
      confidence: 0.8,
      reason: 'keywords: cliente, pix recebido'
    });
  });

  it('only matches keywords on word boundaries', async () => {
    const classifier = new StatisticalClassifier(() => []);
    expect(await classifier.classify(input('Clientela nova'), [vendas])).toBeNull();
  });

  it('scores similarity to verified examples of the same category', async () => {
    const classifier = new StatisticalClassifier(() => [example('cat-transporte', 'Pagamento Uber viagem centro')]);
    const suggestion = await classifier.classify(input('Uber viagem aeroporto', -3000), [vendas, transporte]);

    expect(suggestion).toEqual({
      categoryName: 'Transporte',
      confidence: 0.675,
      reason: 'similar to verified examples (0.50)'
    });
  });

  it('returns null without any evidence', async () => {
    const classifier = new StatisticalClassifier(() => []);
    expect(await classifier.classify(input('Movimentacao 123'), [vendas, transporte])).toBeNull();
  });

  it('breaks ties alphabetically regardless of candidate order', async () => {
    const a: CandidateCategory = { id: 'a', name: 'Alfa', categoryType: 'income', keywords: ['boleto'] };
    const b: CandidateCategory = { id: 'b', name: 'Beta', categoryType: 'income', keywords: ['boleto'] };
    const classifier = new StatisticalClassifier(() => []);

    expect((await classifier.classify(input('Boleto liquidado'), [b, a]))?.categoryName).toBe('Alfa');
    expect((await classifier.classify(input('Boleto liquidado'), [a, b]))?.categoryName).toBe('Alfa');
  });
});

describe('OpenAIClassifier', () => {
  function completion(content: string | null): Response {
    return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
      status: 200,
      headers: { 'Content-Type': 'application/json' }
    });
  }

  it('sends the candidates and parses the JSON answer', async () => {
    let sentBody = '';
    let sentAuth: string | null = null;
    const fetchFn: typeof fetch = async (_url, init) => {
      sentBody = typeof init?.body === 'string' ? init.body : '';
      sentAuth = new Headers(init?.headers).get('Authorization');
      return completion('{"category":"Vendas","confidence":0.92,"reason":"customer payment"}');
    };
    const classifier = new OpenAIClassifier({ apiKey: 'test-secret', model: 'test-model', fetchFn });

    const suggestion = await classifier.classify(input('PIX recebido - Cliente ABC'), [vendas]);

    expect(suggestion).toEqual({ categoryName: 'Vendas', confidence: 0.92, reason: 'customer payment' });
    expect(classifier.name).toBe('openai:test-model');
    expect(sentAuth).toBe('Bearer test-secret');
    expect(sentBody).toContain('- Vendas: venda, cliente, pix recebido');
    expect(sentBody).toContain('1000.00 BRL (incoming)');
  });

  it('throws on an HTTP error', async () => {
    const fetchFn: typeof fetch = async () => new Response('overloaded', { status: 503 });
    const classifier = new OpenAIClassifier({ apiKey: 'test-secret', model: 'test-model', fetchFn });

    await expect(classifier.classify(input('x'), [vendas])).rejects.toThrow('OpenAI API error: 503 - overloaded');
  });

  it('throws on content that is not the expected JSON shape', async () => {
    const fetchFn: typeof fetch = async () => completion('{"label":"Vendas"}');
    const classifier = new OpenAIClassifier({ apiKey: 'test-secret', model: 'test-model', fetchFn });

    await expect(classifier.classify(input('x'), [vendas])).rejects.toThrow();
  });

  it('gives up on a request that never answers', async () => {
    const fetchFn: typeof fetch = () => new Promise<Response>(() => undefined);
    const classifier = new OpenAIClassifier({ apiKey: 'test-secret', model: 'test-model', timeoutMs: 20, fetchFn });

    await expect(classifier.classify(input('x'), [vendas])).rejects.toThrow('OpenAI request timed out after 20ms');
  });

  it('does not call the API without candidates', async () => {
    let calls = 0;
    const fetchFn: typeof fetch = async () => {
      calls++;
      return completion(null);
    };
    const classifier = new OpenAIClassifier({ apiKey: 'test-secret', model: 'test-model', fetchFn });

    expect(await classifier.classify(input('x'), [])).toBeNull();
    expect(calls).toBe(0);
  });
});

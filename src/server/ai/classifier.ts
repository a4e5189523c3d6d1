/**
 * Classifiers
 *
 * Pluggable second stage of the categorization pipeline. A classifier
 * suggests a category name with a confidence; the pipeline resolves the
 * name and decides whether to accept it.
 */

import { z } from 'zod';
import type { CategoryType, TrainingExample, TransactionType } from '../../shared/types';
import { getTrainingExamples } from '../database/database';
import { abortable } from '../utils/abort';
import { formatMinor } from '../utils/money';
import { normalizeText, significantWords } from './text';

export interface ClassifierInput {
  companyId: string;
  description: string;
  amountMinor: number;
  transactionType: TransactionType;
  counterpartName?: string;
  occurredAt: string;
}

export interface CandidateCategory {
  id: string;
  name: string;
  categoryType: CategoryType;
  keywords: string[];
}

export interface ClassifierSuggestion {
  categoryName: string;
  confidence: number;
  reason?: string;
}

export interface Classifier {
  readonly name: string;
  classify(input: ClassifierInput, candidates: CandidateCategory[]): Promise<ClassifierSuggestion | null>;
}

// ==================== STATISTICAL ====================

/**
 * Deterministic classifier. Scores each candidate by its keyword hints found
 * in the description or counterpart, and by word overlap with the company's
 * verified training examples.
 */
export class StatisticalClassifier implements Classifier {
  readonly name = 'statistical-v1';

  constructor(
    private readonly loadExamples: (companyId: string) => TrainingExample[] = companyId => getTrainingExamples(companyId)
  ) {}

  async classify(input: ClassifierInput, candidates: CandidateCategory[]): Promise<ClassifierSuggestion | null> {
    const text = ` ${normalizeText(`${input.description} ${input.counterpartName ?? ''}`)} `;
    const words = new Set(significantWords(`${input.description} ${input.counterpartName ?? ''}`));
    const examples = this.loadExamples(input.companyId);

    let best: { candidate: CandidateCategory; confidence: number; reason: string } | null = null;

    for (const candidate of [...candidates].sort((a, b) => a.name.localeCompare(b.name))) {
      const hits = candidate.keywords.filter(keyword => {
        const normalized = normalizeText(keyword);
        return normalized !== '' && text.includes(` ${normalized} `);
      });
      const keywordConfidence = hits.length > 0 ? Math.min(0.9, 0.5 + 0.15 * hits.length) : 0;

      let similarity = 0;
      for (const example of examples) {
        if (example.categoryId !== candidate.id) continue;
        similarity = Math.max(similarity, jaccard(words, new Set(significantWords(example.description))));
      }
      const exampleConfidence = similarity > 0 ? Math.min(0.95, 0.4 + 0.55 * similarity) : 0;

      const confidence = Math.max(keywordConfidence, exampleConfidence);
      if (confidence > 0 && (!best || confidence > best.confidence)) {
        const reason = exampleConfidence >= keywordConfidence
          ? `similar to verified examples (${similarity.toFixed(2)})`
          : `keywords: ${hits.join(', ')}`;
        best = { candidate, confidence: round(confidence), reason };
      }
    }

    return best ? { categoryName: best.candidate.name, confidence: best.confidence, reason: best.reason } : null;
  }
}

function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const word of a) {
    if (b.has(word)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

// ==================== OPENAI ====================

const OPENAI_API_URL = 'https://api.openai.com/v1/chat/completions';

const CATEGORIZATION_PROMPT = `Categorize this Brazilian business bank transaction into exactly one of the categories below.

Transaction:
- Description: {description}
- Amount: {amount} BRL ({direction})
- Counterpart: {counterpart}
- Date: {date}

Categories (name: keywords):
{categories}

Respond with JSON: {"category": "<category name>", "confidence": <number between 0 and 1>, "reason": "<short explanation>"}`;

const OpenAIResponseSchema = z.object({
  category: z.string().min(1),
  confidence: z.number(),
  reason: z.string().optional()
});

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() })
  })).min(1)
});

export const DEFAULT_CLASSIFIER_TIMEOUT_MS = 10_000;

export interface OpenAIClassifierOptions {
  apiKey: string;
  model: string;
  /** Bound on one round-trip, response body included. */
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

export class OpenAIClassifier implements Classifier {
  readonly name: string;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: OpenAIClassifierOptions) {
    this.name = `openai:${options.model}`;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async classify(input: ClassifierInput, candidates: CandidateCategory[]): Promise<ClassifierSuggestion | null> {
    if (candidates.length === 0) return null;

    const prompt = CATEGORIZATION_PROMPT
      .replace('{description}', input.description)
      .replace('{amount}', formatMinor(Math.abs(input.amountMinor)))
      .replace('{direction}', input.amountMinor > 0 ? 'incoming' : 'outgoing')
      .replace('{counterpart}', input.counterpartName || 'Unknown')
      .replace('{date}', input.occurredAt.slice(0, 10))
      .replace('{categories}', candidates.map(c => `- ${c.name}: ${c.keywords.join(', ')}`).join('\n'));

    const timeoutMs = this.options.timeoutMs ?? DEFAULT_CLASSIFIER_TIMEOUT_MS;
    const signal = AbortSignal.timeout(timeoutMs);
    try {
      return await abortable(this.request(prompt, signal), signal);
    } catch (error) {
      if (signal.aborted) {
        throw new Error(`OpenAI request timed out after ${timeoutMs}ms`);
      }
      throw error;
    }
  }

  private async request(prompt: string, signal: AbortSignal): Promise<ClassifierSuggestion> {
    const response = await this.fetchFn(OPENAI_API_URL, {
      method: 'POST',
      signal,
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.options.apiKey}`
      },
      body: JSON.stringify({
        model: this.options.model,
        messages: [
          { role: 'system', content: 'You are a financial transaction categorizer. Always respond with valid JSON only.' },
          { role: 'user', content: prompt }
        ],
        temperature: 0.1,
        max_tokens: 150,
        response_format: { type: 'json_object' }
      })
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`OpenAI API error: ${response.status} - ${errorText}`);
    }

    const completion = ChatCompletionSchema.parse(await response.json());
    const content = completion.choices[0].message.content;
    if (!content) {
      throw new Error('No response from OpenAI');
    }

    const parsed = OpenAIResponseSchema.parse(JSON.parse(content));
    return { categoryName: parsed.category, confidence: parsed.confidence, reason: parsed.reason };
  }
}

/**
 * Shared Category Constants
 *
 * System categories seeded at start-up and used by the fallback pass.
 */

import type { CategoryType } from '../types/categorization.types';
import defaultCategories from './default-categories.json';

export interface CategorySeed {
  slug: string;
  name: string;
  categoryType: CategoryType;
  keywords: string[];
}

function isCategoryType(value: string): value is CategoryType {
  return value === 'income' || value === 'expense' || value === 'transfer';
}

export const DEFAULT_CATEGORIES: CategorySeed[] = defaultCategories.map(seed => {
  if (!isCategoryType(seed.categoryType)) {
    throw new Error(`Unknown category type in seed ${seed.slug}: ${seed.categoryType}`);
  }
  return { ...seed, categoryType: seed.categoryType };
});

/**
 * Fallback categories for the default pass
 */
export const FALLBACK_INCOME_SLUG = 'outros-recebimentos';
export const FALLBACK_EXPENSE_SLUG = 'outros-gastos';

/**
 * Banking words too common to identify a payee
 */
export const COMMON_BANKING_WORDS = new Set([
  'pix', 'ted', 'doc', 'transferencia', 'pagamento', 'compra', 'debito', 'credito',
  'saque', 'deposito', 'taxa', 'tarifa', 'banco', 'caixa', 'conta', 'cartao',
  'de', 'do', 'da', 'para', 'em', 'com', 'por', 'ate', 'desde', 'ltda', 'me', 'eireli'
]);

/**
 * Converts a name into a URL-safe slug
 */
export function slugify(name: string): string {
  return name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * SQLite Database Service
 *
 * Schema creation, reference-data seeding and re-exports of all repositories.
 * Uses better-sqlite3 for synchronous, fast SQLite access.
 */

import { db } from './connection';
import { config } from '../config/env';
import { initializeSchema } from './schema';
import { upsertProvider, upsertSystemCategory } from './repositories';
import { DEFAULT_CATEGORIES } from '../../shared/constants/categories';
import { BANK_PROVIDERS, SANDBOX_AUTH_CODE_PREFIX } from '../../shared/constants/bank-providers';

export * from './repositories';
export { db };

let initialized = false;

/**
 * Creates the tables and seeds providers and system categories. Safe to call repeatedly.
 */
export function initializeDatabase(): void {
  initializeSchema();
  seedReferenceData();
  if (!initialized) {
    console.log('[Database] SQLite database initialized');
    initialized = true;
  }
}

function seedReferenceData(): void {
  const seed = db.transaction(() => {
    for (const provider of BANK_PROVIDERS) {
      upsertProvider({
        ...provider,
        isActive: true,
        // Production codes are opaque; only the sandbox issues prefixed codes
        authCodePrefix: config.banking.mode === 'sandbox' ? SANDBOX_AUTH_CODE_PREFIX : ''
      });
    }
    for (const category of DEFAULT_CATEGORIES) {
      upsertSystemCategory(category.name, category.slug, category.categoryType, category.keywords);
    }
  });
  seed();
}

/**
 * Removes every row, children first. Reference data is seeded again.
 */
export function clearAllData(): void {
  db.exec(`
    DELETE FROM category_stats;
    DELETE FROM training_examples;
    DELETE FROM categorization_decisions;
    DELETE FROM category_rules;
    DELETE FROM transactions;
    DELETE FROM sync_runs;
    DELETE FROM sync_locks;
    DELETE FROM consents;
    DELETE FROM bank_connections;
    DELETE FROM categories;
    DELETE FROM providers;
  `);
  seedReferenceData();
}

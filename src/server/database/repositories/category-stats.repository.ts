/**
 * Category Stats Repository
 *
 * Derived accuracy statistics, fully replaced on every recomputation.
 */

import { db } from '../connection';
import type { CategoryStats } from '../../../shared/types';

interface CategoryStatsRow {
  company_id: string;
  category_id: string;
  total_decisions: number;
  reviewed_decisions: number;
  accepted_decisions: number;
  accuracy_rate: number | null;
  computed_at: string;
}

function mapCategoryStats(row: CategoryStatsRow): CategoryStats {
  return {
    companyId: row.company_id,
    categoryId: row.category_id,
    totalDecisions: row.total_decisions,
    reviewedDecisions: row.reviewed_decisions,
    acceptedDecisions: row.accepted_decisions,
    accuracyRate: row.accuracy_rate ?? undefined,
    computedAt: row.computed_at
  };
}

export function replaceCategoryStats(companyId: string, stats: CategoryStats[]): void {
  const remove = db.prepare(`DELETE FROM category_stats WHERE company_id = ?`);
  const insert = db.prepare(`
    INSERT INTO category_stats (
      company_id, category_id, total_decisions, reviewed_decisions, accepted_decisions, accuracy_rate, computed_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  const replace = db.transaction((rows: CategoryStats[]) => {
    remove.run(companyId);
    for (const s of rows) {
      insert.run(
        s.companyId,
        s.categoryId,
        s.totalDecisions,
        s.reviewedDecisions,
        s.acceptedDecisions,
        s.accuracyRate ?? null,
        s.computedAt
      );
    }
  });
  replace(stats);
}

export function getCategoryStats(companyId: string): CategoryStats[] {
  return db.prepare<[string], CategoryStatsRow>(`
    SELECT * FROM category_stats WHERE company_id = ? ORDER BY category_id
  `).all(companyId).map(mapCategoryStats);
}

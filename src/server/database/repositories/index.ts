/**
 * Database Repositories Index
 *
 * Re-exports all repository modules.
 */

export * from './provider.repository';
export * from './consent.repository';
export * from './connection.repository';
export * from './transaction.repository';
export * from './sync-run.repository';
export * from './sync-lock.repository';
export * from './category.repository';
export * from './rule.repository';
export * from './decision.repository';
export * from './training-example.repository';
export * from './category-stats.repository';

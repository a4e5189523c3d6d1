/**
 * Shared Types Index
 *
 * Re-exports all shared types for convenient imports.
 */

export * from './connector.types';
export * from './transaction.types';
export * from './categorization.types';

/**
 * Connector Parsers Index
 *
 * Re-exports all parser modules for convenient imports.
 */

export * from './open-banking-parser';

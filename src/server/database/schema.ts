/**
 * Database Schema
 *
 * SQL schema definitions for all tables.
 * Money columns hold signed integer minor units.
 */

import { db } from './connection';

export const SCHEMA = `
-- Bank providers reachable through the Open Banking directory
CREATE TABLE IF NOT EXISTS providers (
  code TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  slug TEXT NOT NULL UNIQUE,
  is_active INTEGER NOT NULL DEFAULT 1,
  auth_code_prefix TEXT NOT NULL,
  supports_pix INTEGER NOT NULL DEFAULT 1
);

-- Consents awaiting the user's authorization at the bank
CREATE TABLE IF NOT EXISTS consents (
  id TEXT PRIMARY KEY,
  company_id TEXT NOT NULL,
  provider_code TEXT NOT NULL REFERENCES providers(code),
  permissions TEXT NOT NULL, -- JSON array
  state TEXT NOT NULL UNIQUE,
  nonce TEXT NOT NULL,
  status TEXT NOT NULL CHECK(status IN ('awaiting_authorisation', 'authorised', 'rejected', 'expired')),
  expires_at TEXT NOT NULL,
  connection_id TEXT,
  created_at TEXT NOT NULL
);

-- Bank connections (one per account)
CREATE TABLE IF NOT EXISTS bank_connections (
  id TEXT PRIMARY KEY,
  company_id TEXT NOT NULL,
  provider_code TEXT NOT NULL REFERENCES providers(code),
  agency TEXT NOT NULL,
  account_number TEXT NOT NULL,
  account_digit TEXT,
  external_account_id TEXT,
  access_token_encrypted TEXT,
  refresh_token_encrypted TEXT,
  token_expires_at TEXT,
  status TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending', 'active', 'error', 'expired')),
  current_balance_minor INTEGER NOT NULL DEFAULT 0,
  available_balance_minor INTEGER NOT NULL DEFAULT 0,
  currency TEXT NOT NULL DEFAULT 'BRL',
  last_sync_at TEXT,
  last_sync_error TEXT,
  sync_frequency_hours INTEGER NOT NULL DEFAULT 4,
  is_active INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE(company_id, provider_code, agency, account_number)
);

-- Canonical transactions; (connection_id, external_id) is the identity key
CREATE TABLE IF NOT EXISTS transactions (
  id TEXT PRIMARY KEY,
  connection_id TEXT NOT NULL REFERENCES bank_connections(id),
  company_id TEXT NOT NULL,
  external_id TEXT NOT NULL,
  amount_minor INTEGER NOT NULL,
  currency TEXT NOT NULL DEFAULT 'BRL',
  transaction_type TEXT NOT NULL CHECK(transaction_type IN (
    'debit', 'credit', 'transfer_in', 'transfer_out', 'pix_in', 'pix_out', 'fee', 'interest', 'adjustment'
  )),
  description TEXT NOT NULL,
  occurred_at TEXT NOT NULL,
  counterpart_name TEXT,
  counterpart_document TEXT,
  reference_number TEXT,
  balance_after_minor INTEGER,
  status TEXT NOT NULL DEFAULT 'completed' CHECK(status IN ('pending', 'completed')),

  -- Categorization tracking
  category_id TEXT REFERENCES categories(id),
  category_confidence REAL,
  categorization_method TEXT CHECK(categorization_method IS NULL OR categorization_method IN ('rule', 'classifier', 'default', 'manual')),
  categorized_at TEXT,
  is_ai_categorized INTEGER NOT NULL DEFAULT 0,
  is_manually_reviewed INTEGER NOT NULL DEFAULT 0,
  reviewed_by TEXT,

  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE(connection_id, external_id)
);

-- One row per synchronization pass
CREATE TABLE IF NOT EXISTS sync_runs (
  id TEXT PRIMARY KEY,
  connection_id TEXT NOT NULL REFERENCES bank_connections(id),
  from_date TEXT NOT NULL,
  to_date TEXT NOT NULL,
  status TEXT NOT NULL CHECK(status IN ('running', 'completed', 'failed', 'partial')),
  transactions_found INTEGER NOT NULL DEFAULT 0,
  transactions_new INTEGER NOT NULL DEFAULT 0,
  transactions_updated INTEGER NOT NULL DEFAULT 0,
  transactions_skipped INTEGER NOT NULL DEFAULT 0,
  error_message TEXT,
  started_at TEXT NOT NULL,
  completed_at TEXT
);

-- Advisory per-connection sync lock
CREATE TABLE IF NOT EXISTS sync_locks (
  connection_id TEXT PRIMARY KEY,
  owner TEXT NOT NULL,
  acquired_at TEXT NOT NULL,
  expires_at TEXT NOT NULL
);

-- Categories (company_id NULL for system categories)
CREATE TABLE IF NOT EXISTS categories (
  id TEXT PRIMARY KEY,
  company_id TEXT,
  name TEXT NOT NULL,
  slug TEXT NOT NULL,
  category_type TEXT NOT NULL CHECK(category_type IN ('income', 'expense', 'transfer')),
  keywords TEXT NOT NULL DEFAULT '[]', -- JSON array
  is_system INTEGER NOT NULL DEFAULT 0,
  is_active INTEGER NOT NULL DEFAULT 1
);

-- Categorization rules
CREATE TABLE IF NOT EXISTS category_rules (
  id TEXT PRIMARY KEY,
  company_id TEXT NOT NULL,
  category_id TEXT NOT NULL REFERENCES categories(id),
  name TEXT NOT NULL,
  rule_type TEXT NOT NULL CHECK(rule_type IN ('keyword', 'amount_range', 'counterpart', 'pattern')),
  conditions TEXT NOT NULL, -- JSON object
  priority INTEGER NOT NULL DEFAULT 0,
  is_active INTEGER NOT NULL DEFAULT 1,
  confidence_threshold REAL NOT NULL DEFAULT 0.8,
  match_count INTEGER NOT NULL DEFAULT 0,
  accuracy_rate REAL,
  created_by TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

-- Decision log, one row per categorization attempt
CREATE TABLE IF NOT EXISTS categorization_decisions (
  id TEXT PRIMARY KEY,
  seq INTEGER NOT NULL,
  transaction_id TEXT NOT NULL REFERENCES transactions(id),
  method TEXT NOT NULL CHECK(method IN ('rule', 'classifier', 'default', 'manual')),
  suggested_category_id TEXT,
  confidence REAL NOT NULL,
  processing_time_ms INTEGER NOT NULL,
  rule_id TEXT,
  classifier_name TEXT,
  reason TEXT,
  was_accepted INTEGER,
  final_category_id TEXT,
  created_at TEXT NOT NULL
);

-- Verified examples from user corrections
CREATE TABLE IF NOT EXISTS training_examples (
  id TEXT PRIMARY KEY,
  company_id TEXT NOT NULL,
  transaction_id TEXT,
  description TEXT NOT NULL,
  amount_minor INTEGER NOT NULL,
  transaction_type TEXT NOT NULL,
  counterpart_name TEXT,
  category_id TEXT NOT NULL REFERENCES categories(id),
  verification_source TEXT NOT NULL DEFAULT 'user_feedback',
  verified_by TEXT,
  features TEXT NOT NULL, -- JSON object
  created_at TEXT NOT NULL
);

-- Derived accuracy statistics
CREATE TABLE IF NOT EXISTS category_stats (
  company_id TEXT NOT NULL,
  category_id TEXT NOT NULL,
  total_decisions INTEGER NOT NULL,
  reviewed_decisions INTEGER NOT NULL,
  accepted_decisions INTEGER NOT NULL,
  accuracy_rate REAL,
  computed_at TEXT NOT NULL,
  PRIMARY KEY (company_id, category_id)
);

-- Indexes for common queries
CREATE INDEX IF NOT EXISTS idx_connections_company ON bank_connections(company_id);
CREATE INDEX IF NOT EXISTS idx_transactions_connection_date ON transactions(connection_id, occurred_at);
CREATE INDEX IF NOT EXISTS idx_transactions_company_category ON transactions(company_id, category_id);
CREATE INDEX IF NOT EXISTS idx_sync_runs_connection ON sync_runs(connection_id, started_at);
CREATE INDEX IF NOT EXISTS idx_rules_company ON category_rules(company_id, is_active, priority);
CREATE INDEX IF NOT EXISTS idx_decisions_transaction ON categorization_decisions(transaction_id, seq);
CREATE INDEX IF NOT EXISTS idx_training_company ON training_examples(company_id, category_id);
`;

export function initializeSchema(): void {
  db.exec(SCHEMA);
}

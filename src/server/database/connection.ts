/**
 * Database Connection
 *
 * Initializes and manages the SQLite database connection.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { config } from '../config/env';

const DB_PATH = config.databasePath;

// Ensure data directory exists
if (DB_PATH !== ':memory:') {
  const dataDir = dirname(DB_PATH);
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
}

// Initialize database connection
const db = new Database(DB_PATH);
db.pragma('journal_mode = WAL');
db.pragma('foreign_keys = ON');

export function closeDatabase(): void {
  if (db.open) {
    db.close();
    console.log('[Database] Connection closed');
  }
}

export { db, DB_PATH };

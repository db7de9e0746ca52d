/**
 * Database Initialization
 *
 * SQLite database with tables for:
 * - Settings (namespaced key/value, the device's NVS)
 * - Tool call logs (audit trail of tools/call)
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { componentLogger } from '../services/logger';

const log = componentLogger('Database');

export type DeviceDatabase = Database.Database;

/**
 * Open (or create) the device database. Pass ':memory:' for a throwaway one.
 */
export function initDatabase(dbPath: string): DeviceDatabase {
  if (dbPath !== ':memory:') {
    const dbDir = path.dirname(dbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  const db = new Database(dbPath);

  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  db.exec(`
    -- Settings table
    CREATE TABLE IF NOT EXISTS settings (
      namespace TEXT NOT NULL,
      key TEXT NOT NULL,
      value TEXT NOT NULL,
      updated_at TEXT NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (namespace, key)
    );

    -- Tool call logs (audit trail)
    CREATE TABLE IF NOT EXISTS tool_logs (
      id TEXT PRIMARY KEY,
      request_id REAL NOT NULL,
      tool_name TEXT NOT NULL,
      arguments TEXT NOT NULL,
      result TEXT,
      status TEXT NOT NULL,
      execution_time_ms INTEGER,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_tool_logs_tool ON tool_logs(tool_name);
    CREATE INDEX IF NOT EXISTS idx_tool_logs_created ON tool_logs(created_at);
  `);

  log.info('Database schema initialized', { path: dbPath });
  return db;
}

/**
 * Settings Store
 *
 * Namespaced string key/value storage, the host stand-in for the device's
 * non-volatile settings partition.
 */

import type { DeviceDatabase } from './init';
import { auditLog } from '../services/logger';

export interface SettingsStore {
  getString(namespace: string, key: string, defaultValue?: string): string;
  setString(namespace: string, key: string, value: string): void;
}

interface SettingsRow {
  value: string;
}

export class SqliteSettingsStore implements SettingsStore {
  constructor(private readonly db: DeviceDatabase) {}

  getString(namespace: string, key: string, defaultValue = ''): string {
    const row = this.db
      .prepare<[string, string], SettingsRow>('SELECT value FROM settings WHERE namespace = ? AND key = ?')
      .get(namespace, key);
    return row ? row.value : defaultValue;
  }

  setString(namespace: string, key: string, value: string): void {
    this.db.prepare(`
      INSERT INTO settings (namespace, key, value, updated_at)
      VALUES (?, ?, ?, datetime('now'))
      ON CONFLICT(namespace, key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `).run(namespace, key, value);

    auditLog('SETTINGS_WRITE', { namespace, key });
  }
}

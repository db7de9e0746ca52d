/**
 * Tool Call Log
 *
 * Records every tools/call outcome in SQLite so the device keeps a local
 * history of what the orchestrator asked it to do.
 */

import { v4 as uuidv4 } from 'uuid';
import type { DeviceDatabase } from './init';

export type ToolCallStatus = 'success' | 'error' | 'rejected';

export interface ToolCallRecord {
  requestId: number;
  toolName: string;
  arguments: Record<string, unknown>;
  status: ToolCallStatus;
  result?: unknown;
  executionTimeMs: number;
}

export interface ToolCallRecorder {
  record(entry: ToolCallRecord): string;
}

export interface ToolCallHistoryEntry {
  id: string;
  requestId: number;
  toolName: string;
  arguments: unknown;
  result: unknown;
  status: ToolCallStatus;
  executionTimeMs: number | null;
  createdAt: string;
}

interface ToolLogRow {
  id: string;
  request_id: number;
  tool_name: string;
  arguments: string;
  result: string | null;
  status: ToolCallStatus;
  execution_time_ms: number | null;
  created_at: string;
}

export class SqliteToolCallLog implements ToolCallRecorder {
  constructor(private readonly db: DeviceDatabase) {}

  record(entry: ToolCallRecord): string {
    const id = uuidv4();
    this.db.prepare(`
      INSERT INTO tool_logs (id, request_id, tool_name, arguments, result, status, execution_time_ms)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      entry.requestId,
      entry.toolName,
      JSON.stringify(entry.arguments),
      entry.result === undefined ? null : JSON.stringify(entry.result),
      entry.status,
      entry.executionTimeMs
    );
    return id;
  }

  /**
   * Most recent calls first
   */
  getHistory(options: { toolName?: string; limit?: number } = {}): ToolCallHistoryEntry[] {
    const limit = Math.min(Math.max(options.limit ?? 50, 1), 500);
    const rows = options.toolName
      ? this.db
          .prepare<[string, number], ToolLogRow>(
            'SELECT * FROM tool_logs WHERE tool_name = ? ORDER BY created_at DESC, rowid DESC LIMIT ?'
          )
          .all(options.toolName, limit)
      : this.db
          .prepare<[number], ToolLogRow>('SELECT * FROM tool_logs ORDER BY created_at DESC, rowid DESC LIMIT ?')
          .all(limit);

    return rows.map(row => ({
      id: row.id,
      requestId: row.request_id,
      toolName: row.tool_name,
      arguments: JSON.parse(row.arguments),
      result: row.result === null ? null : JSON.parse(row.result),
      status: row.status,
      executionTimeMs: row.execution_time_ms,
      createdAt: row.created_at,
    }));
  }
}

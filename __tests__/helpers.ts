import { vi } from 'vitest';
import { McpServer, ServerInfo } from '../src/mcp/server';
import { TaskQueue, Task } from '../src/core/taskQueue';
import type { ApplicationServices } from '../src/mcp/context';
import type { Board, BoardCapabilities } from '../src/board/interface';
import type { SettingsStore } from '../src/db/settings';
import type { ToolCallRecord, ToolCallRecorder } from '../src/db/toolLog';

// ─── Fakes ─────────────────────────────────────────────────────────

export class MemorySettings implements SettingsStore {
  readonly values = new Map<string, string>();

  getString(namespace: string, key: string, defaultValue = ''): string {
    return this.values.get(`${namespace}.${key}`) ?? defaultValue;
  }

  setString(namespace: string, key: string, value: string): void {
    this.values.set(`${namespace}.${key}`, value);
  }
}

export class MemoryRecorder implements ToolCallRecorder {
  readonly records: ToolCallRecord[] = [];

  record(entry: ToolCallRecord): string {
    this.records.push(entry);
    return `record-${this.records.length}`;
  }
}

export function createFakeBoard(capabilities: BoardCapabilities = {}): Board {
  return {
    name: 'test-board',
    capabilities,
    getDeviceStatusJson: () => ({ network: { type: 'test' } }),
    getSystemInfoJson: () => ({ board: 'test-board' }),
  };
}

export function createFakeApp() {
  const queue = new TaskQueue();
  return {
    queue,
    schedule: (task: Task, label?: string) => {
      queue.schedule(task, label);
    },
    reboot: vi.fn<() => void>(),
    upgradeFirmware: vi.fn<(url: string) => Promise<boolean>>(async () => true),
  } satisfies ApplicationServices & { queue: TaskQueue };
}

// ─── Server harness ────────────────────────────────────────────────

export const TEST_SERVER_INFO: ServerInfo = { name: 'test-board', version: '9.9.9' };

export function createHarness(options: { board?: Board; history?: ToolCallRecorder } = {}) {
  const sent: string[] = [];
  const app = createFakeApp();
  const settings = new MemorySettings();
  const board = options.board ?? createFakeBoard();
  const server = new McpServer({
    board,
    app,
    settings,
    serverInfo: TEST_SERVER_INFO,
    history: options.history,
    send: message => {
      sent.push(message);
    },
  });

  return {
    server,
    sent,
    app,
    settings,
    board,
    /** Feed one JSON-RPC request and wait for any deferred reply */
    async request(message: unknown): Promise<void> {
      server.parseMessage(typeof message === 'string' ? message : JSON.stringify(message));
      await app.queue.idle();
    },
    /** Parsed replies */
    replies(): unknown[] {
      return sent.map(text => JSON.parse(text));
    },
  };
}

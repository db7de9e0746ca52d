/**
 * Collaborators the built-in tools are constructed against.
 */

import type { Board } from '../board/interface';
import type { SettingsStore } from '../db/settings';
import type { Task } from '../core/taskQueue';

/**
 * The application services tools may reach: the single application thread,
 * and the two whole-device operations that must run on it.
 */
export interface ApplicationServices {
  schedule(task: Task, label?: string): void;
  reboot(): void;
  upgradeFirmware(url: string): Promise<boolean>;
}

export interface ToolContext {
  readonly board: Board;
  readonly app: ApplicationServices;
  readonly settings: SettingsStore;
}

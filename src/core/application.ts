/**
 * Application
 *
 * Ties the device together:
 * - Owns the state machine, the application task queue and the MCP server
 * - Runs the startup sequence (tool registration, then activation)
 * - Provides the whole-device operations tools schedule: reboot and
 *   firmware upgrade
 * - Routes outbound MCP messages to whichever orchestrator is connected
 */

import { EventEmitter } from 'events';
import { DeviceStateMachine } from './deviceStateMachine';
import { TaskQueue, Task } from './taskQueue';
import type { DeviceState } from './deviceState';
import type { FirmwareUpdater } from './firmwareUpdater';
import { McpServer, ServerInfo } from '../mcp/server';
import type { ApplicationServices } from '../mcp/context';
import type { Board } from '../board/interface';
import type { SettingsStore } from '../db/settings';
import type { ToolCallRecorder } from '../db/toolLog';
import { componentLogger, auditLog } from '../services/logger';

const log = componentLogger('Application');

// =============================================================================
// TYPES
// =============================================================================

export interface PowerControl {
  restart(): void;
}

export interface ApplicationOptions {
  stateMachine: DeviceStateMachine;
  board: Board;
  settings: SettingsStore;
  power: PowerControl;
  firmware: FirmwareUpdater;
  serverInfo: ServerInfo;
  history?: ToolCallRecorder;
}

export interface StateChangeEvent {
  from: DeviceState;
  to: DeviceState;
}

type MessageSink = (message: string) => void;

// =============================================================================
// APPLICATION
// =============================================================================

export class Application extends EventEmitter implements ApplicationServices {
  readonly stateMachine: DeviceStateMachine;
  readonly mcp: McpServer;
  private readonly board: Board;
  private readonly queue = new TaskQueue();
  private readonly power: PowerControl;
  private readonly firmware: FirmwareUpdater;
  private channel: MessageSink | null = null;

  constructor(options: ApplicationOptions) {
    super();
    this.stateMachine = options.stateMachine;
    this.board = options.board;
    this.power = options.power;
    this.firmware = options.firmware;

    this.mcp = new McpServer({
      board: options.board,
      app: this,
      settings: options.settings,
      serverInfo: options.serverInfo,
      history: options.history,
      send: message => this.sendMcpMessage(message),
    });

    this.stateMachine.addStateChangeListener((from, to) => {
      auditLog('STATE_CHANGE', { from, to });
      this.emit('stateChange', { from, to } satisfies StateChangeEvent);
    });
  }

  // =========================================================================
  // LIFECYCLE
  // =========================================================================

  /**
   * Register every tool, seal the registry and bring the device to idle.
   * Returns false when the device was already started.
   */
  start(): boolean {
    if (!this.stateMachine.transitionTo('starting')) {
      log.warn('Application already started', { state: this.stateMachine.getState() });
      return false;
    }

    log.info(`Starting on board ${this.board.name}`);

    this.board.initializeTools?.(this.mcp);
    this.mcp.addCommonTools();
    this.mcp.addUserOnlyTools();
    this.mcp.seal();

    this.stateMachine.transitionTo('activating');
    this.stateMachine.transitionTo('idle');
    return true;
  }

  getDeviceState(): DeviceState {
    return this.stateMachine.getState();
  }

  /**
   * Resolves once every scheduled task has run.
   */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  // =========================================================================
  // APPLICATION SERVICES
  // =========================================================================

  schedule(task: Task, label?: string): void {
    this.queue.schedule(task, label);
  }

  reboot(): void {
    log.warn('Rebooting');
    auditLog('REBOOT', { state: this.stateMachine.getState() });
    this.power.restart();
  }

  async upgradeFirmware(url: string): Promise<boolean> {
    if (!this.stateMachine.transitionTo('upgrading')) {
      log.warn('Firmware upgrade refused', { state: this.stateMachine.getState() });
      return false;
    }

    auditLog('FIRMWARE_UPGRADE_START', { url });
    try {
      await this.firmware.download(url);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error('Firmware download failed', { url, error: message });
      auditLog('FIRMWARE_UPGRADE_FAILED', { url, error: message });
      this.stateMachine.transitionTo('idle');
      return false;
    }

    auditLog('FIRMWARE_UPGRADE_STAGED', { url });
    this.reboot();
    return true;
  }

  // =========================================================================
  // MCP CHANNEL
  // =========================================================================

  attachChannel(send: MessageSink): void {
    if (this.channel) {
      log.info('Replacing MCP channel');
    }
    this.channel = send;
    log.info('MCP channel attached');
  }

  detachChannel(send?: MessageSink): void {
    if (send && this.channel !== send) return;
    this.channel = null;
    log.info('MCP channel detached');
  }

  sendMcpMessage(message: string): void {
    if (!this.channel) {
      log.warn('MCP message dropped: no channel attached', { bytes: message.length });
      return;
    }
    this.channel(message);
  }
}

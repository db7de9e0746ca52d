/**
 * Device State Machine
 *
 * Owns the device's operating mode:
 * - Validates every change against the fixed transition graph
 * - Rejected transitions are logged and leave the state untouched
 * - Committed transitions are fanned out synchronously to listeners,
 *   in registration order, from a snapshot of the listener list
 */

import { DeviceState, isValidTransition } from './deviceState';
import { componentLogger } from '../services/logger';

const log = componentLogger('StateMachine');

export type StateChangeListener = (oldState: DeviceState, newState: DeviceState) => void;

export class DeviceStateMachine {
  private currentState: DeviceState = 'unknown';
  private listeners: Array<{ id: number; callback: StateChangeListener }> = [];
  private nextListenerId = 0;

  getState(): DeviceState {
    return this.currentState;
  }

  canTransitionTo(target: DeviceState): boolean {
    return isValidTransition(this.currentState, target);
  }

  /**
   * Move to `target`. Returns false (and changes nothing) when the graph
   * does not allow it; re-entering the current state is a silent success.
   */
  transitionTo(target: DeviceState): boolean {
    const oldState = this.currentState;
    if (oldState === target) {
      return true;
    }

    if (!isValidTransition(oldState, target)) {
      log.warn(`Invalid state transition: ${oldState} -> ${target}`);
      return false;
    }

    this.currentState = target;
    log.info(`State: ${oldState} -> ${target}`);

    this.notifyStateChange(oldState, target);
    return true;
  }

  addStateChangeListener(callback: StateChangeListener): number {
    const id = this.nextListenerId++;
    this.listeners.push({ id, callback });
    return id;
  }

  removeStateChangeListener(listenerId: number): void {
    this.listeners = this.listeners.filter(entry => entry.id !== listenerId);
  }

  get listenerCount(): number {
    return this.listeners.length;
  }

  private notifyStateChange(oldState: DeviceState, newState: DeviceState): void {
    const snapshot = this.listeners.map(entry => entry.callback);

    for (const callback of snapshot) {
      try {
        callback(oldState, newState);
      } catch (error) {
        log.error('State change listener failed', {
          from: oldState,
          to: newState,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

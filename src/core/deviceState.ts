/**
 * Device operating modes and the legal transition graph between them.
 */

export const DEVICE_STATES = [
  'unknown',
  'starting',
  'wifi_configuring',
  'idle',
  'connecting',
  'listening',
  'speaking',
  'upgrading',
  'activating',
  'audio_testing',
  'fatal_error',
] as const;

export type DeviceState = (typeof DEVICE_STATES)[number];

/**
 * One-step transitions. Self-transitions are no-ops and are not listed.
 * fatal_error is absorbing.
 */
export const TRANSITIONS: Readonly<Record<DeviceState, ReadonlySet<DeviceState>>> = Object.freeze({
  unknown: new Set<DeviceState>(['starting']),
  starting: new Set<DeviceState>(['wifi_configuring', 'activating']),
  wifi_configuring: new Set<DeviceState>(['activating', 'audio_testing']),
  audio_testing: new Set<DeviceState>(['wifi_configuring']),
  activating: new Set<DeviceState>(['upgrading', 'idle', 'wifi_configuring']),
  upgrading: new Set<DeviceState>(['idle', 'activating']),
  idle: new Set<DeviceState>([
    'connecting',
    'listening',
    'speaking',
    'activating',
    'upgrading',
    'wifi_configuring',
  ]),
  connecting: new Set<DeviceState>(['idle', 'listening']),
  listening: new Set<DeviceState>(['speaking', 'idle']),
  speaking: new Set<DeviceState>(['listening', 'idle']),
  fatal_error: new Set<DeviceState>(),
});

export function isDeviceState(value: unknown): value is DeviceState {
  return DEVICE_STATES.some(state => state === value);
}

export function isValidTransition(from: DeviceState, to: DeviceState): boolean {
  if (from === to) return true;
  return TRANSITIONS[from].has(to);
}

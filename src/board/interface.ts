/**
 * Board Capability Interfaces
 *
 * The contract between the control core and the hardware it runs on.
 * A board resolves its capabilities once at startup; a capability that is
 * absent simply means the tools depending on it are not registered.
 */

import type { JsonObject } from '../mcp/tool';
import type { ToolRegistrar } from '../mcp/server';

// =============================================================================
// CAPABILITIES
// =============================================================================

export interface AudioOutput {
  getOutputVolume(): number;
  setOutputVolume(volume: number): void;
}

export interface Backlight {
  getBrightness(): number;
  /** `permanent` persists the level across restarts */
  setBrightness(brightness: number, permanent: boolean): void;
}

export const THEME_NAMES = ['light', 'dark'] as const;

export type ThemeName = (typeof THEME_NAMES)[number];

export function isThemeName(value: string): value is ThemeName {
  return THEME_NAMES.some(name => name === value);
}

export interface Display {
  readonly kind: 'lcd' | 'oled';
  readonly width: number;
  readonly height: number;
  getTheme(): ThemeName | null;
  setTheme(theme: ThemeName): void;
}

export interface ScreenCapture {
  snapshotToJpeg(quality: number): Promise<Buffer>;
  setPreviewImage(image: Buffer): void;
}

export interface Camera {
  capture(): Promise<boolean>;
  explain(question: string): Promise<string>;
  setExplainUrl(url: string, token: string): void;
}

/**
 * Everything a tool may touch. Optional members are capabilities some
 * boards lack.
 */
export interface BoardCapabilities {
  readonly audio?: AudioOutput;
  readonly backlight?: Backlight;
  readonly display?: Display;
  readonly screenCapture?: ScreenCapture;
  readonly camera?: Camera;
  /** Board has a writable assets partition */
  readonly assets?: boolean;
}

// =============================================================================
// BOARD
// =============================================================================

export interface Board {
  readonly name: string;
  readonly capabilities: BoardCapabilities;
  getDeviceStatusJson(): JsonObject;
  getSystemInfoJson(): JsonObject;
  /** Register board-specific tools; runs before the common set is prefixed */
  initializeTools?(registrar: ToolRegistrar): void;
}

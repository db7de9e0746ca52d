/**
 * Simulated Host Board
 *
 * Runs the control core on an ordinary machine: speaker, backlight and
 * display are in-memory models backed by the settings store, the camera
 * reads frames from an image file.
 */

import os from 'os';
import fs from 'fs';
import {
  AudioOutput,
  Backlight,
  Board,
  BoardCapabilities,
  Display,
  ScreenCapture,
  ThemeName,
  isThemeName,
} from './interface';
import { ExplainingCamera } from './camera';
import { McpTool, JsonObject } from '../mcp/tool';
import { PropertyList } from '../mcp/property';
import type { ToolRegistrar } from '../mcp/server';
import type { SettingsStore } from '../db/settings';
import type { DeviceState } from '../core/deviceState';
import { componentLogger } from '../services/logger';

const log = componentLogger('Board');

const DEFAULT_VOLUME = 70;
const DEFAULT_BRIGHTNESS = 75;

function storedInteger(settings: SettingsStore, namespace: string, key: string, fallback: number): number {
  const parsed = Number.parseInt(settings.getString(namespace, key), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

// =============================================================================
// COMPONENTS
// =============================================================================

class SimulatedSpeaker implements AudioOutput {
  private volume: number;

  constructor(private readonly settings: SettingsStore) {
    this.volume = storedInteger(settings, 'audio', 'output_volume', DEFAULT_VOLUME);
  }

  getOutputVolume(): number {
    return this.volume;
  }

  setOutputVolume(volume: number): void {
    this.volume = volume;
    this.settings.setString('audio', 'output_volume', String(volume));
    log.info(`Set output volume to ${volume}`);
  }
}

class SimulatedBacklight implements Backlight {
  private brightness: number;

  constructor(private readonly settings: SettingsStore) {
    this.brightness = storedInteger(settings, 'display', 'brightness', DEFAULT_BRIGHTNESS);
  }

  getBrightness(): number {
    return this.brightness;
  }

  setBrightness(brightness: number, permanent: boolean): void {
    this.brightness = brightness;
    if (permanent) {
      this.settings.setString('display', 'brightness', String(brightness));
    }
    log.info(`Set brightness to ${brightness}`);
  }
}

class SimulatedScreen implements Display, ScreenCapture {
  readonly kind = 'lcd';
  private theme: ThemeName;
  private previewImage: Buffer | null = null;

  constructor(
    readonly width: number,
    readonly height: number,
    private readonly settings: SettingsStore
  ) {
    const stored = settings.getString('display', 'theme', 'light');
    this.theme = isThemeName(stored) ? stored : 'light';
  }

  getTheme(): ThemeName {
    return this.theme;
  }

  setTheme(theme: ThemeName): void {
    this.theme = theme;
    this.settings.setString('display', 'theme', theme);
    log.info(`Set theme to ${theme}`);
  }

  /**
   * The host screen has no framebuffer; a snapshot is the image currently
   * previewed, passed through unchanged.
   */
  async snapshotToJpeg(quality: number): Promise<Buffer> {
    if (!this.previewImage) {
      throw new Error('Failed to snapshot screen');
    }
    log.debug('Snapshot', { quality, bytes: this.previewImage.length });
    return this.previewImage;
  }

  setPreviewImage(image: Buffer): void {
    this.previewImage = image;
    log.info(`Preview image set (${image.length} bytes)`);
  }
}

// =============================================================================
// BOARD
// =============================================================================

export interface SimulatedBoardOptions {
  name: string;
  version: string;
  settings: SettingsStore;
  getDeviceState: () => DeviceState;
  /** JPEG served as the camera frame; no camera when omitted */
  cameraImagePath?: string;
  screen?: { width: number; height: number };
}

export class SimulatedBoard implements Board {
  readonly name: string;
  readonly capabilities: BoardCapabilities;
  private readonly version: string;
  private readonly getDeviceState: () => DeviceState;
  private readonly speaker: SimulatedSpeaker;
  private readonly backlight: SimulatedBacklight;
  private readonly screen: SimulatedScreen;

  constructor(options: SimulatedBoardOptions) {
    this.name = options.name;
    this.version = options.version;
    this.getDeviceState = options.getDeviceState;

    this.speaker = new SimulatedSpeaker(options.settings);
    this.backlight = new SimulatedBacklight(options.settings);
    const { width, height } = options.screen ?? { width: 240, height: 320 };
    this.screen = new SimulatedScreen(width, height, options.settings);

    const imagePath = options.cameraImagePath;
    this.capabilities = {
      audio: this.speaker,
      backlight: this.backlight,
      display: this.screen,
      screenCapture: this.screen,
      camera: imagePath ? new ExplainingCamera(() => fs.promises.readFile(imagePath)) : undefined,
      assets: true,
    };
  }

  getDeviceStatusJson(): JsonObject {
    return {
      audio_speaker: {
        volume: this.speaker.getOutputVolume(),
      },
      screen: {
        brightness: this.backlight.getBrightness(),
        theme: this.screen.getTheme(),
      },
      network: {
        type: 'ethernet',
        hostname: os.hostname(),
      },
      device_state: this.getDeviceState(),
    };
  }

  getSystemInfoJson(): JsonObject {
    const memory = process.memoryUsage();
    return {
      board: this.name,
      version: this.version,
      node_version: process.version,
      platform: os.platform(),
      arch: os.arch(),
      uptime_seconds: Math.floor(process.uptime()),
      memory: {
        rss: memory.rss,
        heap_used: memory.heapUsed,
      },
    };
  }

  initializeTools(registrar: ToolRegistrar): void {
    registrar.addTool(new McpTool(
      'self.device.get_state',
      'Get the current operating mode of the device (idle, listening, speaking, upgrading, ...).',
      new PropertyList(),
      () => ({ state: this.getDeviceState() })
    ));
  }
}

/**
 * User-Only Tools
 *
 * Tools hidden from default discovery: they are listed only when the
 * orchestrator asks for withUserTools, typically for an operator console.
 */

import { setTimeout as delay } from 'timers/promises';
import { McpTool } from './tool';
import { Property, PropertyList } from './property';
import type { ToolContext } from './context';
import { componentLogger } from '../services/logger';

const log = componentLogger('MCP');

const REBOOT_DELAY_MS = 1000;

async function openUrl(url: string, init: RequestInit): Promise<Response> {
  try {
    return await fetch(url, init);
  } catch (error) {
    throw new Error(`Failed to open URL: ${url}`, { cause: error });
  }
}

export function createUserOnlyTools({ board, app, settings }: ToolContext): McpTool[] {
  const { display, screenCapture, assets } = board.capabilities;
  const userOnly = { userOnly: true };
  const tools: McpTool[] = [];

  // System
  tools.push(new McpTool(
    'self.get_system_info',
    'Get the system information',
    new PropertyList(),
    () => board.getSystemInfoJson(),
    userOnly
  ));

  tools.push(new McpTool(
    'self.reboot',
    'Reboot the system',
    new PropertyList(),
    () => {
      app.schedule(async () => {
        log.warn('User requested reboot');
        await delay(REBOOT_DELAY_MS);
        app.reboot();
      }, 'reboot');
      return true;
    },
    userOnly
  ));

  tools.push(new McpTool(
    'self.upgrade_firmware',
    'Upgrade firmware from a specific URL. This will download and install the firmware, then reboot the device.',
    new PropertyList([Property.string('url')]),
    args => {
      const url = args.string('url');
      log.info(`User requested firmware upgrade from URL: ${url}`);
      app.schedule(async () => {
        const success = await app.upgradeFirmware(url);
        if (!success) {
          log.error('Firmware upgrade failed', { url });
        }
      }, 'upgrade-firmware');
      return true;
    },
    userOnly
  ));

  // Display
  if (display) {
    tools.push(new McpTool(
      'self.screen.get_info',
      'Information about the screen, including width, height, etc.',
      new PropertyList(),
      () => ({
        width: display.width,
        height: display.height,
        monochrome: display.kind === 'oled',
      }),
      userOnly
    ));
  }

  if (screenCapture) {
    tools.push(new McpTool(
      'self.screen.snapshot',
      'Snapshot the screen and upload it to a specific URL',
      new PropertyList([
        Property.string('url'),
        Property.integer('quality', { defaultValue: 80, min: 1, max: 100 }),
      ]),
      async args => {
        const url = args.string('url');
        const jpeg = await screenCapture.snapshotToJpeg(args.integer('quality'));
        log.info(`Upload snapshot ${jpeg.length} bytes to ${url}`);

        const form = new FormData();
        form.append('file', new Blob([jpeg], { type: 'image/jpeg' }), 'screenshot.jpg');

        const response = await openUrl(url, { method: 'POST', body: form });
        if (response.status !== 200) {
          throw new Error(`Unexpected status code: ${response.status}`);
        }
        log.info(`Snapshot screen result: ${await response.text()}`);
        return true;
      },
      userOnly
    ));

    tools.push(new McpTool(
      'self.screen.preview_image',
      'Preview an image on the screen',
      new PropertyList([Property.string('url')]),
      async args => {
        const url = args.string('url');
        const response = await openUrl(url, { method: 'GET' });
        if (response.status !== 200) {
          throw new Error(`Unexpected status code: ${response.status}`);
        }

        const image = Buffer.from(await response.arrayBuffer());
        if (image.length === 0) {
          throw new Error(`Failed to download image: ${url}`);
        }
        screenCapture.setPreviewImage(image);
        return true;
      },
      userOnly
    ));
  }

  // Assets
  if (assets) {
    tools.push(new McpTool(
      'self.assets.set_download_url',
      'Set the download url for the assets',
      new PropertyList([Property.string('url')]),
      args => {
        settings.setString('assets', 'download_url', args.string('url'));
        return true;
      },
      userOnly
    ));
  }

  return tools;
}

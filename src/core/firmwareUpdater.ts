/**
 * Firmware Download
 *
 * The host build stages the image on disk; flashing it is the bootloader's
 * business and happens after the reboot that follows.
 */

import fs from 'fs';
import path from 'path';
import { componentLogger } from '../services/logger';

const log = componentLogger('Firmware');

export interface FirmwareUpdater {
  /** Resolves once the image is staged; rejects on any failure */
  download(url: string): Promise<void>;
}

export class HttpFirmwareUpdater implements FirmwareUpdater {
  constructor(private readonly stagingPath: string) {}

  async download(url: string): Promise<void> {
    const response = await fetch(url);
    if (response.status !== 200) {
      throw new Error(`Unexpected status code: ${response.status}`);
    }

    const image = Buffer.from(await response.arrayBuffer());
    if (image.length === 0) {
      throw new Error(`Empty firmware image: ${url}`);
    }

    await fs.promises.mkdir(path.dirname(this.stagingPath), { recursive: true });
    await fs.promises.writeFile(this.stagingPath, image);
    log.info('Firmware image staged', { bytes: image.length, path: this.stagingPath });
  }
}

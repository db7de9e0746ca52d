/**
 * Camera with remote explanation
 *
 * Frames come from a pluggable source; explaining a frame posts it to the
 * vision endpoint negotiated in MCP initialize.
 */

import type { Camera } from './interface';
import { componentLogger } from '../services/logger';

const log = componentLogger('Camera');

export type FrameSource = () => Promise<Buffer | null>;

export class ExplainingCamera implements Camera {
  private explainUrl = '';
  private explainToken = '';
  private frame: Buffer | null = null;

  constructor(private readonly source: FrameSource) {}

  async capture(): Promise<boolean> {
    try {
      this.frame = await this.source();
    } catch (error) {
      log.error('Frame source failed', { error: error instanceof Error ? error.message : String(error) });
      this.frame = null;
    }
    return this.frame !== null && this.frame.length > 0;
  }

  setExplainUrl(url: string, token: string): void {
    this.explainUrl = url;
    this.explainToken = token;
  }

  async explain(question: string): Promise<string> {
    if (this.explainUrl === '') {
      throw new Error('Image explain URL is not set');
    }
    if (!this.frame) {
      throw new Error('No photo captured');
    }

    const form = new FormData();
    form.append('question', question);
    form.append('file', new Blob([this.frame], { type: 'image/jpeg' }), 'camera.jpg');

    const headers: Record<string, string> = {};
    if (this.explainToken !== '') {
      headers.Authorization = `Bearer ${this.explainToken}`;
    }

    const response = await fetch(this.explainUrl, { method: 'POST', headers, body: form });
    if (response.status !== 200) {
      throw new Error(`Failed to upload photo, status code: ${response.status}`);
    }

    const result = await response.text();
    log.info('Explain image done', { bytes: this.frame.length, question });
    return result;
  }
}

import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ExplainingCamera } from '../src/board/camera';
import { SimulatedBoard } from '../src/board/simulatedBoard';
import { HttpFirmwareUpdater } from '../src/core/firmwareUpdater';
import { McpTool } from '../src/mcp/tool';
import type { ToolRegistrar } from '../src/mcp/server';
import { MemorySettings } from './helpers';

afterEach(() => {
  vi.unstubAllGlobals();
});

// ─── Camera ────────────────────────────────────────────────────────

describe('ExplainingCamera', () => {
  it('reports a failed capture when the source has no frame', async () => {
    const camera = new ExplainingCamera(async () => null);
    expect(await camera.capture()).toBe(false);
  });

  it('reports a failed capture when the source throws', async () => {
    const camera = new ExplainingCamera(async () => {
      throw new Error('sensor offline');
    });
    expect(await camera.capture()).toBe(false);
  });

  it('refuses to explain before a vision url is set', async () => {
    const camera = new ExplainingCamera(async () => Buffer.from('frame'));
    await camera.capture();
    await expect(camera.explain('what?')).rejects.toThrow('Image explain URL is not set');
  });

  it('refuses to explain without a captured frame', async () => {
    const camera = new ExplainingCamera(async () => Buffer.from('frame'));
    camera.setExplainUrl('http://vision.test/explain', '');
    await expect(camera.explain('what?')).rejects.toThrow('No photo captured');
  });

  it('posts the question and frame with the bearer token', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{"text":"a cat"}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const camera = new ExplainingCamera(async () => Buffer.from('frame'));
    camera.setExplainUrl('http://vision.test/explain', 'test-token');
    expect(await camera.capture()).toBe(true);

    expect(await camera.explain('what is it?')).toBe('{"text":"a cat"}');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://vision.test/explain');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-token' });
    const body = init?.body;
    if (!(body instanceof FormData)) throw new Error('expected multipart body');
    expect(body.get('question')).toBe('what is it?');
  });

  it('sends no authorization header without a token', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const camera = new ExplainingCamera(async () => Buffer.from('frame'));
    camera.setExplainUrl('http://vision.test/explain', '');
    await camera.capture();
    await camera.explain('q');

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({});
  });

  it('fails on a non-200 reply', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('busy', { status: 503 })));

    const camera = new ExplainingCamera(async () => Buffer.from('frame'));
    camera.setExplainUrl('http://vision.test/explain', '');
    await camera.capture();

    await expect(camera.explain('q')).rejects.toThrow('Failed to upload photo, status code: 503');
  });
});

// ─── Simulated board ───────────────────────────────────────────────

describe('SimulatedBoard', () => {
  function createBoard(settings = new MemorySettings(), cameraImagePath?: string) {
    return new SimulatedBoard({
      name: 'host-sim',
      version: '1.2.3',
      settings,
      getDeviceState: () => 'idle',
      cameraImagePath,
    });
  }

  it('starts from the default levels', () => {
    const status = createBoard().getDeviceStatusJson();
    expect(status.audio_speaker).toEqual({ volume: 70 });
    expect(status.screen).toEqual({ brightness: 75, theme: 'light' });
    expect(status.device_state).toBe('idle');
  });

  it('restores persisted levels', () => {
    const settings = new MemorySettings();
    settings.setString('audio', 'output_volume', '33');
    settings.setString('display', 'brightness', '12');
    settings.setString('display', 'theme', 'dark');

    const status = createBoard(settings).getDeviceStatusJson();

    expect(status.audio_speaker).toEqual({ volume: 33 });
    expect(status.screen).toEqual({ brightness: 12, theme: 'dark' });
  });

  it('ignores an unreadable persisted theme', () => {
    const settings = new MemorySettings();
    settings.setString('display', 'theme', 'neon');
    expect(createBoard(settings).capabilities.display?.getTheme()).toBe('light');
  });

  it('persists volume and permanent brightness', () => {
    const settings = new MemorySettings();
    const { audio, backlight } = createBoard(settings).capabilities;

    audio?.setOutputVolume(40);
    backlight?.setBrightness(20, false);
    expect(settings.getString('display', 'brightness')).toBe('');
    backlight?.setBrightness(60, true);

    expect(settings.getString('audio', 'output_volume')).toBe('40');
    expect(settings.getString('display', 'brightness')).toBe('60');
  });

  it('has no camera without an image path', () => {
    expect(createBoard().capabilities.camera).toBeUndefined();
  });

  it('captures from the configured image file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'board-test-'));
    const imagePath = path.join(dir, 'frame.jpg');
    fs.writeFileSync(imagePath, 'jpeg');

    const camera = createBoard(new MemorySettings(), imagePath).capabilities.camera;
    expect(await camera?.capture()).toBe(true);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('snapshots the previewed image', async () => {
    const capture = createBoard().capabilities.screenCapture;
    if (!capture) throw new Error('expected screen capture');

    await expect(capture.snapshotToJpeg(80)).rejects.toThrow('Failed to snapshot screen');

    capture.setPreviewImage(Buffer.from('preview'));
    expect((await capture.snapshotToJpeg(80)).toString()).toBe('preview');
  });

  it('reports system info', () => {
    const info = createBoard().getSystemInfoJson();
    expect(info).toMatchObject({ board: 'host-sim', version: '1.2.3', node_version: process.version });
  });

  it('registers its own state tool', async () => {
    const added: McpTool[] = [];
    const registrar: ToolRegistrar = {
      addTool: (tool: McpTool | string) => {
        if (typeof tool === 'string') throw new Error('unexpected form');
        added.push(tool);
        return true;
      },
      addUserOnlyTool: () => false,
    };

    createBoard().initializeTools(registrar);

    expect(added.map(tool => tool.name)).toEqual(['self.device.get_state']);
    const bound = added[0].properties.bind({});
    if (!bound.ok) throw new Error(bound.error);
    expect(await added[0].call(bound.arguments)).toEqual({ ok: true, value: { state: 'idle' } });
  });
});

// ─── Firmware download ─────────────────────────────────────────────

describe('HttpFirmwareUpdater', () => {
  function stagingPath(): string {
    return path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'firmware-test-')), 'staged', 'firmware.bin');
  }

  it('stages the downloaded image', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('firmware-image', { status: 200 })));
    const target = stagingPath();

    await new HttpFirmwareUpdater(target).download('http://firmware.test/v2.bin');

    expect(fs.readFileSync(target, 'utf8')).toBe('firmware-image');
  });

  it('fails on a non-200 reply', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 404 })));
    await expect(new HttpFirmwareUpdater(stagingPath()).download('http://firmware.test/v2.bin')).rejects.toThrow(
      'Unexpected status code: 404'
    );
  });

  it('fails on an empty image', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 200 })));
    await expect(new HttpFirmwareUpdater(stagingPath()).download('http://firmware.test/v2.bin')).rejects.toThrow(
      'Empty firmware image: http://firmware.test/v2.bin'
    );
  });
});

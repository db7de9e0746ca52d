/**
 * Common Tools
 *
 * The tools every board exposes to the model, listed ahead of board tools.
 *
 * Custom tools belong in the board's initializeTools, not here.
 */

import { isThemeName } from '../board/interface';
import { McpTool } from './tool';
import { Property, PropertyList } from './property';
import type { ToolContext } from './context';

export function createCommonTools({ board }: ToolContext): McpTool[] {
  const { audio, backlight, display, camera } = board.capabilities;
  const tools: McpTool[] = [];

  tools.push(new McpTool(
    'self.get_device_status',
    'Provides the real-time information of the device, including the current status of the audio speaker, screen, battery, network, etc.\n' +
    'Use this tool for: \n' +
    '1. Answering questions about current condition (e.g. what is the current volume of the audio speaker?)\n' +
    '2. As the first step to control the device (e.g. turn up / down the volume of the audio speaker, etc.)',
    new PropertyList(),
    () => board.getDeviceStatusJson()
  ));

  if (audio) {
    tools.push(new McpTool(
      'self.audio_speaker.set_volume',
      'Set the volume of the audio speaker. If the current volume is unknown, you must call `self.get_device_status` tool first and then call this tool.',
      new PropertyList([Property.integer('volume', { min: 0, max: 100 })]),
      args => {
        audio.setOutputVolume(args.integer('volume'));
        return true;
      }
    ));
  }

  if (backlight) {
    tools.push(new McpTool(
      'self.screen.set_brightness',
      'Set the brightness of the screen.',
      new PropertyList([Property.integer('brightness', { min: 0, max: 100 })]),
      args => {
        backlight.setBrightness(args.integer('brightness'), true);
        return true;
      }
    ));
  }

  if (display && display.getTheme() !== null) {
    tools.push(new McpTool(
      'self.screen.set_theme',
      'Set the theme of the screen. The theme can be `light` or `dark`.',
      new PropertyList([Property.string('theme')]),
      args => {
        const theme = args.string('theme');
        if (!isThemeName(theme)) {
          return false;
        }
        display.setTheme(theme);
        return true;
      }
    ));
  }

  if (camera) {
    tools.push(new McpTool(
      'self.camera.take_photo',
      'Always remember you have a camera. If the user asks you to see something, use this tool to take a photo and then explain it.\n' +
      'Args:\n' +
      '  `question`: The question that you want to ask about the photo.\n' +
      'Return:\n' +
      '  A JSON object that provides the photo information.',
      new PropertyList([Property.string('question')]),
      async args => {
        if (!(await camera.capture())) {
          throw new Error('Failed to capture photo');
        }
        return camera.explain(args.string('question'));
      }
    ));
  }

  return tools;
}

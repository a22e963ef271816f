/**
 * Shell Input Parser
 * 
 * Turns one line typed (or pasted) at the interactive prompt into a
 * command. Anything that does not start with ':' is a drop payload.
 */

import { COMPRESSION_MODES, type CompressionMode } from '@dualsub/core';
import { tokenizeDropPayload } from '@dualsub/intake';

export type PathSlot = 'video' | 'english' | 'vietnamese' | 'outputDir';

export type ShellCommand =
  | { type: 'empty' }
  | { type: 'drop'; payload: string }
  | { type: 'set-path'; slot: PathSlot; path: string }
  | { type: 'swap' }
  | { type: 'mode'; mode: CompressionMode }
  | { type: 'downscale'; enabled: boolean }
  | { type: 'font'; size: number }
  | { type: 'margins'; english: number; vietnamese: number }
  | { type: 'show' }
  | { type: 'start' }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'invalid'; message: string };

const PATH_COMMANDS: Record<string, PathSlot> = {
  video: 'video',
  en: 'english',
  vi: 'vietnamese',
  out: 'outputDir',
};

export const SHELL_HELP: readonly [string, string][] = [
  ['<paths>', 'Paste or drop files/folders to fill the slots'],
  [':video <path>', 'Set the video file'],
  [':en <path>', 'Set the English subtitle (top line)'],
  [':vi <path>', 'Set the Vietnamese subtitle (bottom line)'],
  [':out <path>', 'Set the output folder'],
  [':swap', 'Swap the English and Vietnamese subtitles'],
  [':mode <m>', `Compression mode (${COMPRESSION_MODES.join(', ')})`],
  [':downscale on|off', 'Scale the output to 720p'],
  [':font <n>', 'Subtitle font size'],
  [':margins <en> <vi>', 'Bottom margins in pixels'],
  [':show', 'Show the current selections'],
  [':start', 'Burn the subtitles'],
  [':help', 'Show this help'],
  [':quit', 'Leave the shell'],
];

function parseInteger(value: string | undefined): number | null {
  if (value === undefined || !/^-?\d+$/.test(value)) return null;
  return Number.parseInt(value, 10);
}

function isCompressionMode(value: string): value is CompressionMode {
  return COMPRESSION_MODES.some((mode) => mode === value);
}

export function parseShellInput(line: string): ShellCommand {
  const trimmed = line.trim();
  if (trimmed === '') return { type: 'empty' };
  if (!trimmed.startsWith(':')) return { type: 'drop', payload: trimmed };

  const match = /^:(\S+)\s*(.*)$/.exec(trimmed);
  const name = (match?.[1] ?? '').toLowerCase();
  const rest = (match?.[2] ?? '').trim();
  const words = rest === '' ? [] : rest.split(/\s+/);

  const slot = PATH_COMMANDS[name];
  if (slot) {
    // Quoting and escaped spaces follow drop rules; only the first path is taken
    const path = tokenizeDropPayload(rest)[0];
    if (path === undefined) return { type: 'invalid', message: `Usage: :${name} <path>` };
    return { type: 'set-path', slot, path };
  }

  switch (name) {
    case 'swap':
      return { type: 'swap' };
    case 'show':
      return { type: 'show' };
    case 'start':
      return { type: 'start' };
    case 'help':
      return { type: 'help' };
    case 'quit':
    case 'exit':
      return { type: 'quit' };
    case 'mode': {
      const mode = (words[0] ?? '').toLowerCase();
      if (!isCompressionMode(mode)) {
        return { type: 'invalid', message: `Unknown mode "${words[0] ?? ''}". Use one of: ${COMPRESSION_MODES.join(', ')}` };
      }
      return { type: 'mode', mode };
    }
    case 'downscale': {
      const value = (words[0] ?? '').toLowerCase();
      if (value === 'on') return { type: 'downscale', enabled: true };
      if (value === 'off') return { type: 'downscale', enabled: false };
      return { type: 'invalid', message: 'Usage: :downscale on|off' };
    }
    case 'font': {
      const size = parseInteger(words[0]);
      if (size === null) return { type: 'invalid', message: 'Usage: :font <size>' };
      return { type: 'font', size };
    }
    case 'margins': {
      const english = parseInteger(words[0]);
      const vietnamese = parseInteger(words[1]);
      if (english === null || vietnamese === null) {
        return { type: 'invalid', message: 'Usage: :margins <english> <vietnamese>' };
      }
      return { type: 'margins', english, vietnamese };
    }
    default:
      return { type: 'invalid', message: `Unknown command ":${name}". Type :help for commands.` };
  }
}

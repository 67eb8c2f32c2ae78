/**
 * Parses the remote-mode control lines typed on stdin
 */

import type { CommandData, RemoteCommandType } from '@companion-remote/shared';

export type ControlLine =
  | { kind: 'command'; type: RemoteCommandType; data?: CommandData }
  | { kind: 'quit' }
  | { kind: 'help' }
  | { kind: 'empty' }
  | { kind: 'invalid'; message: string };

const SIMPLE_COMMANDS = new Map<string, RemoteCommandType>([
  ['play', 'play'],
  ['pause', 'pause'],
  ['toggle', 'playPause'],
  ['stop', 'stop'],
  ['ff', 'seekForward'],
  ['rw', 'seekBackward'],
  ['up', 'volumeUp'],
  ['down', 'volumeDown'],
  ['mute', 'volumeMute'],
]);

export const CONTROL_HELP = `Controls:
  play | pause | toggle | stop
  seek <seconds>     jump to a position
  ff | rw            skip forward / back
  vol <0-100>        set the volume
  up | down | mute   adjust the volume
  help | quit`;

export function parseControlLine(line: string): ControlLine {
  const [word = '', ...rest] = line.trim().split(/\s+/);
  const name = word.toLowerCase();

  if (name === '') {
    return { kind: 'empty' };
  }
  if (name === 'quit' || name === 'exit') {
    return { kind: 'quit' };
  }
  if (name === 'help' || name === '?') {
    return { kind: 'help' };
  }

  const simple = SIMPLE_COMMANDS.get(name);
  if (simple) {
    return rest.length === 0
      ? { kind: 'command', type: simple }
      : { kind: 'invalid', message: `${name} takes no arguments` };
  }

  if (name === 'seek') {
    const seconds = Number(rest[0]);
    if (rest.length !== 1 || !Number.isFinite(seconds) || seconds < 0) {
      return { kind: 'invalid', message: 'Usage: seek <seconds>' };
    }
    return { kind: 'command', type: 'seek', data: { positionMs: Math.round(seconds * 1000) } };
  }

  if (name === 'vol') {
    const level = Number(rest[0]);
    if (rest.length !== 1 || !Number.isInteger(level) || level < 0 || level > 100) {
      return { kind: 'invalid', message: 'Usage: vol <0-100>' };
    }
    return { kind: 'command', type: 'volume', data: { level } };
  }

  return { kind: 'invalid', message: `Unknown control: ${word}` };
}

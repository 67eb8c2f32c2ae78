import { parseControlLine } from './control-line.js';

describe('parseControlLine', () => {
  it('should map single-word controls to commands', () => {
    expect(parseControlLine('play')).toEqual({ kind: 'command', type: 'play' });
    expect(parseControlLine('toggle')).toEqual({ kind: 'command', type: 'playPause' });
    expect(parseControlLine('ff')).toEqual({ kind: 'command', type: 'seekForward' });
    expect(parseControlLine('rw')).toEqual({ kind: 'command', type: 'seekBackward' });
    expect(parseControlLine('up')).toEqual({ kind: 'command', type: 'volumeUp' });
    expect(parseControlLine('down')).toEqual({ kind: 'command', type: 'volumeDown' });
    expect(parseControlLine('mute')).toEqual({ kind: 'command', type: 'volumeMute' });
    expect(parseControlLine('stop')).toEqual({ kind: 'command', type: 'stop' });
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(parseControlLine('  PAUSE \n')).toEqual({ kind: 'command', type: 'pause' });
  });

  it('should convert seek seconds to milliseconds', () => {
    expect(parseControlLine('seek 90')).toEqual({ kind: 'command', type: 'seek', data: { positionMs: 90000 } });
    expect(parseControlLine('seek 1.5')).toEqual({ kind: 'command', type: 'seek', data: { positionMs: 1500 } });
  });

  it('should reject bad seek arguments', () => {
    const usage = { kind: 'invalid', message: 'Usage: seek <seconds>' };
    expect(parseControlLine('seek')).toEqual(usage);
    expect(parseControlLine('seek soon')).toEqual(usage);
    expect(parseControlLine('seek -5')).toEqual(usage);
  });

  it('should parse vol levels between 0 and 100', () => {
    expect(parseControlLine('vol 0')).toEqual({ kind: 'command', type: 'volume', data: { level: 0 } });
    expect(parseControlLine('vol 75')).toEqual({ kind: 'command', type: 'volume', data: { level: 75 } });
    expect(parseControlLine('vol 101')).toEqual({ kind: 'invalid', message: 'Usage: vol <0-100>' });
    expect(parseControlLine('vol 2.5')).toEqual({ kind: 'invalid', message: 'Usage: vol <0-100>' });
  });

  it('should recognise quit, help and blank lines', () => {
    expect(parseControlLine('quit')).toEqual({ kind: 'quit' });
    expect(parseControlLine('exit')).toEqual({ kind: 'quit' });
    expect(parseControlLine('help')).toEqual({ kind: 'help' });
    expect(parseControlLine('   ')).toEqual({ kind: 'empty' });
  });

  it('should report unknown controls and stray arguments', () => {
    expect(parseControlLine('rewind')).toEqual({ kind: 'invalid', message: 'Unknown control: rewind' });
    expect(parseControlLine('play now')).toEqual({ kind: 'invalid', message: 'play takes no arguments' });
  });
});

import { logger as defaultLogger } from '@companion-remote/shared';
import type { Logger } from '@companion-remote/shared';
import { LOG_TAGS, PLAYER } from '../constants.js';
import type { MediaPlayer } from './receiver.js';

const TAG = LOG_TAGS.PLAYER;

function formatPosition(positionMs: number): string {
  const totalSeconds = Math.floor(positionMs / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

// Player that only tracks state and logs what a real one would do
export class ConsoleMediaPlayer implements MediaPlayer {
  private playing = false;
  private position = 0;
  private level: number = PLAYER.MAX_VOLUME;
  private readonly log: Logger;

  constructor(log: Logger = defaultLogger) {
    this.log = log;
  }

  get isPlaying(): boolean {
    return this.playing;
  }

  get positionMs(): number {
    return this.position;
  }

  get volume(): number {
    return this.level;
  }

  play(): void {
    this.playing = true;
    this.log.info(TAG, `▶️ Playing at ${formatPosition(this.position)}`);
  }

  pause(): void {
    this.playing = false;
    this.log.info(TAG, `⏸️ Paused at ${formatPosition(this.position)}`);
  }

  stop(): void {
    this.playing = false;
    this.position = 0;
    this.log.info(TAG, '⏹️ Stopped');
  }

  seek(positionMs: number): void {
    this.position = positionMs;
    this.log.info(TAG, `⏩ Seek to ${formatPosition(positionMs)}`);
  }

  setVolume(level: number): void {
    this.level = level;
    this.log.info(TAG, `🔊 Volume ${level}`);
  }
}

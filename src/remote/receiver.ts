import { logger as defaultLogger } from '@companion-remote/shared';
import type { Logger, RemoteCommand } from '@companion-remote/shared';
import { LOG_TAGS, PLAYER } from '../constants.js';

const TAG = LOG_TAGS.PLAYER;

/**
 * Playback surface a received command acts on.
 */
export interface MediaPlayer {
  readonly isPlaying: boolean;
  readonly positionMs: number;
  readonly volume: number;
  play(): void;
  pause(): void;
  stop(): void;
  seek(positionMs: number): void;
  setVolume(level: number): void;
}

export interface CommandReceiverOptions {
  seekStepSeconds?: number;
  maxVolume?: number;
  logger?: Logger;
}

function numberField(command: RemoteCommand, key: string): number | undefined {
  const value = command.data?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Applies remote commands to a media player.
 */
export class CommandReceiver {
  private readonly player: MediaPlayer;
  private readonly seekStepMs: number;
  private readonly maxVolume: number;
  private readonly log: Logger;

  constructor(player: MediaPlayer, options: CommandReceiverOptions = {}) {
    this.player = player;
    this.seekStepMs = (options.seekStepSeconds ?? PLAYER.SEEK_STEP_SECONDS) * 1000;
    this.maxVolume = options.maxVolume ?? PLAYER.MAX_VOLUME;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Returns false for commands that do not apply to the player or carry no
   * usable value.
   */
  handle(command: RemoteCommand): boolean {
    switch (command.type) {
      case 'playPause':
        if (this.player.isPlaying) {
          this.player.pause();
        } else {
          this.player.play();
        }
        return true;

      case 'play':
        this.player.play();
        return true;

      case 'pause':
        this.player.pause();
        return true;

      case 'stop':
        this.player.stop();
        return true;

      case 'seek': {
        const positionMs = numberField(command, 'positionMs');
        if (positionMs === undefined) {
          this.log.warn(TAG, 'seek without a positionMs value');
          return false;
        }
        this.player.seek(Math.max(0, positionMs));
        return true;
      }

      case 'seekForward':
        this.player.seek(this.player.positionMs + this.seekStepMs);
        return true;

      case 'seekBackward':
        this.player.seek(Math.max(0, this.player.positionMs - this.seekStepMs));
        return true;

      case 'volume': {
        const level = numberField(command, 'level');
        if (level === undefined) {
          this.log.warn(TAG, 'volume without a level value');
          return false;
        }
        this.setVolume(level);
        return true;
      }

      case 'volumeUp':
        this.setVolume(this.player.volume + PLAYER.VOLUME_STEP);
        return true;

      case 'volumeDown':
        this.setVolume(this.player.volume - PLAYER.VOLUME_STEP);
        return true;

      case 'volumeMute':
        this.setVolume(this.player.volume > 0 ? 0 : PLAYER.UNMUTED_VOLUME);
        return true;

      default:
        this.log.debug(TAG, `Ignoring command: ${command.type}`);
        return false;
    }
  }

  private setVolume(level: number): void {
    this.player.setVolume(clamp(Math.round(level), 0, this.maxVolume));
  }
}

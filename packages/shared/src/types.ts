// Command types the client knows about. The wire accepts any other name as a
// generic playback command.
export type KnownCommandType =
  | 'ping'
  | 'pong'
  | 'ack'
  | 'deviceInfo'
  | 'syncState'
  | 'playPause'
  | 'play'
  | 'pause'
  | 'stop'
  | 'seek'
  | 'seekForward'
  | 'seekBackward'
  | 'volume'
  | 'volumeUp'
  | 'volumeDown'
  | 'volumeMute'
  | 'nextTrack'
  | 'previousTrack'
  | 'subtitles'
  | 'audioTracks'
  | 'fullscreen'
  | 'home';

export type RemoteCommandType = KnownCommandType | (string & {});

export type CommandValue = string | number | boolean | null;

export type CommandData = Readonly<Record<string, CommandValue>>;

export interface RemoteCommand {
  readonly type: RemoteCommandType;
  readonly data?: CommandData;
}

// Handshake frames carry their fields next to `type`, not under `data`
export type HandshakeFrame =
  | {
      type: 'auth';
      sessionId: string;
      pin: string;
      deviceName: string;
      platform: string;
    }
  | { type: 'authSuccess' }
  | { type: 'authFailed'; message: string };

export interface RemoteDevice {
  id: string;
  name: string;
  platform: string;
}

export type SessionRole = 'host' | 'remote';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

export interface CreatedSession {
  sessionId: string;
  pin: string;
  address: string;
}

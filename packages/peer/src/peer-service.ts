import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  AUTH_MESSAGES,
  AUTH_TIMEOUT_MS,
  CLOSE_CODES,
  DEFAULT_HOST_PORT,
  JOIN_TIMEOUT_MS,
  PLACEHOLDER_DEVICES,
  SOCKET_PATH,
  logger as defaultLogger,
} from '@companion-remote/shared';
import type {
  ConnectionState,
  CreatedSession,
  HandshakeFrame,
  Logger,
  RemoteCommand,
  RemoteDevice,
  SessionRole,
} from '@companion-remote/shared';
import { AuthGuard, type AuthGuardOptions } from './auth-guard.js';
import {
  createCommand,
  decodeFrame,
  encodeCommand,
  encodeHandshake,
  requiresAck,
  type AuthRequest,
} from './codec.js';
import {
  credentialsMatch,
  generatePin,
  generateSessionId,
  normalizeSessionId,
} from './credentials.js';
import { RemotePeerError, describeError, toPeerError } from './errors.js';
import { LivenessMonitor } from './liveness.js';
import { buildSocketUrl, resolveLocalIPv4 } from './network.js';
import type { ListeningServer, PeerSocket, Transport } from './transport.js';
import { createWsTransport } from './ws-transport.js';

const TAG = '[CompanionRemote]';
const NORMAL_CLOSURE = 1000;

export interface PeerServiceEvents {
  command: (command: RemoteCommand) => void;
  deviceConnected: (device: RemoteDevice) => void;
  deviceDisconnected: (closeCode: number) => void;
  peerError: (error: RemotePeerError) => void;
  stateChange: (state: ConnectionState) => void;
}

/**
 * Surface of the protocol engine the application layer talks to.
 */
export interface PeerService {
  readonly sessionId: string | null;
  readonly pin: string | null;
  readonly myPeerId: string | null;
  readonly hostAddress: string | null;
  readonly role: SessionRole | null;
  readonly isHost: boolean;
  readonly isConnected: boolean;
  readonly state: ConnectionState;

  createSession(deviceName: string, platform: string): Promise<CreatedSession>;
  joinSession(
    sessionId: string,
    pin: string,
    deviceName: string,
    platform: string,
    hostAddress: string
  ): Promise<void>;
  sendCommand(command: RemoteCommand): void;
  sendDeviceInfo(deviceName: string, platform: string): void;
  disconnect(): Promise<void>;

  on<E extends keyof PeerServiceEvents>(event: E, listener: PeerServiceEvents[E]): this;
  off<E extends keyof PeerServiceEvents>(event: E, listener: PeerServiceEvents[E]): this;
  removeAllListeners(): this;
}

export interface RemotePeerServiceOptions {
  transport?: Transport;
  preferredPort?: number;
  resolveAddress?: () => string;
  authTimeoutMs?: number;
  joinTimeoutMs?: number;
  pingIntervalMs?: number;
  authGuard?: AuthGuardOptions;
  logger?: Logger;
}

interface HostIdentity {
  name: string;
  platform: string;
}

type ConnectionPhase = 'pending' | 'authenticated' | 'rejected';

export interface RemotePeerService {
  on<E extends keyof PeerServiceEvents>(event: E, listener: PeerServiceEvents[E]): this;
  once<E extends keyof PeerServiceEvents>(event: E, listener: PeerServiceEvents[E]): this;
  off<E extends keyof PeerServiceEvents>(event: E, listener: PeerServiceEvents[E]): this;
}

/**
 * Companion remote session engine. One instance hosts a session or joins one,
 * never both at once; starting either tears down whatever was active.
 */
export class RemotePeerService extends EventEmitter implements PeerService {
  private readonly transport: Transport;
  private readonly preferredPort: number;
  private readonly resolveAddress: () => string;
  private readonly authTimeoutMs: number;
  private readonly joinTimeoutMs: number;
  private readonly authGuardOptions: AuthGuardOptions;
  private readonly log: Logger;
  private readonly liveness: LivenessMonitor;

  // Host side
  private listener: ListeningServer | null = null;
  private controller: PeerSocket | null = null;
  private pendingSockets = new Set<PeerSocket>();
  private authGuard: AuthGuard;

  // Remote side
  private channel: PeerSocket | null = null;
  private channelAuthenticated = false;
  private pendingJoin: ((error: RemotePeerError) => void) | null = null;

  private _sessionId: string | null = null;
  private _pin: string | null = null;
  private _myPeerId: string | null = null;
  private _hostAddress: string | null = null;
  private _role: SessionRole | null = null;
  private _state: ConnectionState = 'disconnected';

  // Bumped by every create, join and disconnect so late async work can tell it is stale
  private generation = 0;

  constructor(options: RemotePeerServiceOptions = {}) {
    super();
    this.transport = options.transport ?? createWsTransport();
    this.preferredPort = options.preferredPort ?? DEFAULT_HOST_PORT;
    this.resolveAddress = options.resolveAddress ?? (() => resolveLocalIPv4());
    this.authTimeoutMs = options.authTimeoutMs ?? AUTH_TIMEOUT_MS;
    this.joinTimeoutMs = options.joinTimeoutMs ?? JOIN_TIMEOUT_MS;
    this.authGuardOptions = options.authGuard ?? {};
    this.authGuard = new AuthGuard(this.authGuardOptions);
    this.log = options.logger ?? defaultLogger;
    this.liveness = new LivenessMonitor({
      intervalMs: options.pingIntervalMs,
      isConnected: () => this.isConnected,
      sendPing: () => this.sendCommand(createCommand('ping')),
    });
  }

  get sessionId(): string | null {
    return this._sessionId;
  }

  get pin(): string | null {
    return this._pin;
  }

  get myPeerId(): string | null {
    return this._myPeerId;
  }

  get hostAddress(): string | null {
    return this._hostAddress;
  }

  get role(): SessionRole | null {
    return this._role;
  }

  get isHost(): boolean {
    return this._role === 'host';
  }

  get isConnected(): boolean {
    return this.activeSocket() !== null;
  }

  get state(): ConnectionState {
    return this._state;
  }

  // ---------------------------------------------------------------------------
  // Host
  // ---------------------------------------------------------------------------

  async createSession(deviceName: string, platform: string): Promise<CreatedSession> {
    const listen = this.transport.listen?.bind(this.transport);
    if (!listen) {
      throw new RemotePeerError('serverError', 'Hosting sessions is not supported on this platform');
    }

    if (this._role !== null) {
      await this.disconnect();
    }

    const generation = ++this.generation;
    const sessionId = generateSessionId();
    const pin = generatePin();
    this._role = 'host';
    this._sessionId = sessionId;
    this._pin = pin;
    this._myPeerId = `host-${sessionId}`;
    this.authGuard = new AuthGuard(this.authGuardOptions);

    const host: HostIdentity = { name: deviceName, platform };

    try {
      const onConnection = (socket: PeerSocket) => this.acceptConnection(socket, host);
      let listener: ListeningServer;
      try {
        listener = await listen(this.preferredPort, SOCKET_PATH, onConnection);
      } catch (error) {
        this.log.warn(TAG, `Port ${this.preferredPort} unavailable, using an OS-assigned port:`, error);
        listener = await listen(0, SOCKET_PATH, onConnection);
      }

      if (generation !== this.generation) {
        await listener.close();
        throw new RemotePeerError('connectionFailed', 'Session was closed before it started');
      }
      this.listener = listener;

      const address = `${this.resolveAddress()}:${listener.port}`;
      this._hostAddress = address;
      this.log.info(TAG, `Host server started at ${address}`);

      this.setState('connecting');
      return { sessionId, pin, address };
    } catch (error) {
      const peerError = toPeerError(error, 'serverError', 'Failed to create server');
      if (generation === this.generation) {
        this.log.error(TAG, 'Failed to create server:', peerError);
        this.generation++;
        await this.teardown();
        this.setState('error');
        this.emitEvent('peerError', peerError);
      }
      throw peerError;
    }
  }

  private acceptConnection(socket: PeerSocket, host: HostIdentity): void {
    this.log.debug(TAG, 'New WebSocket connection');

    let phase: ConnectionPhase = 'pending';
    this.pendingSockets.add(socket);

    const authTimer = setTimeout(() => {
      if (phase === 'pending') {
        this.log.warn(TAG, 'Authentication timeout');
        phase = 'rejected';
        socket.close(CLOSE_CODES.AUTH_TIMEOUT, 'Authentication timeout');
      }
    }, this.authTimeoutMs);

    socket.onMessage((text) => {
      this.runHandler(() => {
        if (phase === 'rejected') return;

        const result = decodeFrame(text);
        if (!result.ok) {
          this.log.warn(TAG, 'Ignoring malformed frame:', result.error);
          return;
        }
        const { frame } = result;

        if (phase === 'pending') {
          if (frame.kind !== 'auth') {
            const label = frame.kind === 'command' ? frame.command.type : frame.kind;
            this.log.warn(TAG, `Expected auth, got ${label}`);
            phase = 'rejected';
            socket.close(CLOSE_CODES.AUTH_REQUIRED, 'Authentication required');
            return;
          }
          if (this.authenticate(socket, frame.auth, host)) {
            phase = 'authenticated';
            clearTimeout(authTimer);
          } else {
            phase = 'rejected';
          }
          return;
        }

        // Frames still in flight from a controller that has since been replaced
        if (this.controller !== socket) return;

        if (frame.kind !== 'command') {
          this.log.warn(TAG, `Ignoring ${frame.kind} frame after authentication`);
          return;
        }
        this.dispatch(frame.command, socket);
      });
    });

    socket.onClose((code) => {
      clearTimeout(authTimer);
      this.pendingSockets.delete(socket);
      this.log.debug(TAG, `WebSocket connection closed (${code})`);

      if (phase === 'authenticated' && this.controller === socket) {
        this.controller = null;
        this.emitEvent('deviceDisconnected', code);
        this.setState('disconnected');
      }
    });

    socket.onError((error) => {
      clearTimeout(authTimer);
      this.log.error(TAG, 'WebSocket error:', error);
      this.emitEvent(
        'peerError',
        new RemotePeerError('dataChannelError', `WebSocket error: ${error.message}`, error)
      );
    });
  }

  private authenticate(socket: PeerSocket, auth: AuthRequest, host: HostIdentity): boolean {
    // Lockout is checked before the credentials and does not count as another failure
    if (this.authGuard.isLockedOut()) {
      this.log.warn(TAG, 'Auth attempt rejected (rate limited)');
      this.writeHandshake(socket, { type: 'authFailed', message: AUTH_MESSAGES.RATE_LIMITED });
      socket.close(CLOSE_CODES.RATE_LIMITED, 'Rate limited');
      return false;
    }

    const sessionId = this._sessionId;
    const pin = this._pin;
    if (sessionId === null || pin === null || !credentialsMatch({ sessionId, pin }, auth)) {
      this.authGuard.recordFailure();
      this.log.warn(
        TAG,
        `Invalid credentials (attempt ${this.authGuard.failedAttempts}/${this.authGuard.maxAttempts})`
      );
      if (this.authGuard.isLockedOut()) {
        this.log.warn(TAG, 'Too many failed auth attempts, locking out new attempts');
      }
      this.writeHandshake(socket, {
        type: 'authFailed',
        message: AUTH_MESSAGES.INVALID_CREDENTIALS,
      });
      socket.close(CLOSE_CODES.INVALID_CREDENTIALS, 'Invalid credentials');
      return false;
    }

    this.authGuard.recordSuccess();
    this.pendingSockets.delete(socket);

    const previous = this.controller;
    if (previous && previous !== socket) {
      this.log.debug(TAG, 'Replacing existing controller connection');
      previous.close(CLOSE_CODES.REPLACED, 'Replaced by new connection');
    }
    this.controller = socket;

    const device: RemoteDevice = {
      id: PLACEHOLDER_DEVICES.REMOTE.id,
      name: auth.deviceName ?? PLACEHOLDER_DEVICES.REMOTE.name,
      platform: auth.platform ?? PLACEHOLDER_DEVICES.REMOTE.platform,
    };
    this.log.info(TAG, `Controller authenticated: ${device.name} (${device.platform})`);

    this.writeHandshake(socket, { type: 'authSuccess' });
    this.emitEvent('deviceConnected', device);
    this.sendDeviceInfo(host.name, host.platform);
    this.setState('connected');
    return true;
  }

  // ---------------------------------------------------------------------------
  // Remote
  // ---------------------------------------------------------------------------

  async joinSession(
    sessionId: string,
    pin: string,
    deviceName: string,
    platform: string,
    hostAddress: string
  ): Promise<void> {
    if (this._role !== null) {
      await this.disconnect();
    }

    const generation = ++this.generation;
    const normalizedId = normalizeSessionId(sessionId);
    this._role = 'remote';
    this._sessionId = normalizedId;
    this._pin = pin;
    this._hostAddress = hostAddress;
    this._myPeerId = `remote-${uuidv4().slice(0, 8)}`;

    const url = buildSocketUrl(hostAddress);
    this.log.info(TAG, `Connecting to ${url}`);
    this.setState('connecting');

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const settle = (error?: RemotePeerError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (this.generation === generation) {
          this.pendingJoin = null;
        }
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const fail = (error: RemotePeerError) => {
        if (settled) return;
        settle(error);
        this.emitEvent('peerError', error);
        this.setState('error');
      };

      const timer = setTimeout(() => {
        this.log.warn(TAG, 'Timed out joining session');
        this.dropChannel();
        fail(new RemotePeerError('timeout', 'Timed out joining session'));
      }, this.joinTimeoutMs);

      this.pendingJoin = settle;

      let socket: PeerSocket;
      try {
        socket = this.transport.connect(url);
      } catch (error) {
        this.log.error(TAG, 'Failed to connect:', error);
        fail(new RemotePeerError('connectionFailed', `Failed to connect: ${describeError(error)}`, error));
        return;
      }
      this.channel = socket;
      this.channelAuthenticated = false;

      socket.onMessage((text) => {
        this.runHandler(() => {
          if (this.channel !== socket) return;

          const result = decodeFrame(text);
          if (!result.ok) {
            this.log.warn(TAG, 'Ignoring malformed frame:', result.error);
            return;
          }
          const { frame } = result;

          switch (frame.kind) {
            case 'authSuccess':
              if (this.channelAuthenticated) return;
              this.log.info(TAG, 'Authentication successful');
              this.channelAuthenticated = true;
              settle();
              this.emitEvent('deviceConnected', { ...PLACEHOLDER_DEVICES.HOST });
              this.setState('connected');
              this.sendDeviceInfo(deviceName, platform);
              this.liveness.start();
              return;
            case 'authFailed': {
              const message = frame.message ?? AUTH_MESSAGES.DEFAULT_FAILURE;
              this.log.warn(TAG, `Authentication failed: ${message}`);
              this.liveness.stop();
              fail(new RemotePeerError('authFailed', message));
              return;
            }
            case 'auth':
              this.log.warn(TAG, 'Ignoring auth frame sent by host');
              return;
            case 'command':
              if (!this.channelAuthenticated) {
                this.log.warn(TAG, `Ignoring ${frame.command.type} before authentication`);
                return;
              }
              this.dispatch(frame.command, socket);
              return;
          }
        });
      });

      socket.onClose((code, reason) => {
        if (this.channel !== socket) return;
        const wasAuthenticated = this.channelAuthenticated;
        this.channel = null;
        this.channelAuthenticated = false;
        this.liveness.stop();

        if (wasAuthenticated) {
          // Reconnecting is left to the application layer
          this.log.info(TAG, `Connection closed (${code})`);
          this.emitEvent('deviceDisconnected', code);
          this.setState('disconnected');
          return;
        }

        const detail = reason ? `${code}: ${reason}` : String(code);
        fail(
          new RemotePeerError('connectionFailed', `Connection closed before authentication (${detail})`)
        );
      });

      socket.onError((error) => {
        if (this.channel !== socket) return;
        this.log.error(TAG, 'Connection error:', error);
        const peerError = new RemotePeerError(
          'connectionFailed',
          `Connection error: ${error.message}`,
          error
        );
        if (settled) {
          this.emitEvent('peerError', peerError);
          this.setState('error');
        } else {
          fail(peerError);
        }
      });

      const auth: HandshakeFrame = {
        type: 'auth',
        sessionId: normalizedId,
        pin,
        deviceName,
        platform,
      };
      this.writeHandshake(socket, auth);
    });
  }

  // ---------------------------------------------------------------------------
  // Shared
  // ---------------------------------------------------------------------------

  private dispatch(command: RemoteCommand, socket: PeerSocket): void {
    this.log.debug(TAG, `Received command: ${command.type}`);

    if (requiresAck(command.type)) {
      this.write(socket, createCommand('ack'));
    }

    this.emitEvent('command', command);

    if (command.type === 'ping') {
      this.write(socket, createCommand('pong'));
    }
  }

  sendDeviceInfo(deviceName: string, platform: string): void {
    this.sendCommand(
      createCommand('deviceInfo', {
        id: this._myPeerId,
        name: deviceName,
        platform,
        role: this._role,
      })
    );
  }

  sendCommand(command: RemoteCommand): void {
    const socket = this.activeSocket();
    if (!socket) {
      this.log.warn(TAG, `No connection to send command: ${command.type}`);
      return;
    }
    this.write(socket, command);
  }

  async disconnect(): Promise<void> {
    this.log.debug(TAG, 'Disconnecting');
    this.generation++;
    await this.teardown();
    this.setState('disconnected');
  }

  async dispose(): Promise<void> {
    await this.disconnect();
    this.removeAllListeners();
  }

  private async teardown(): Promise<void> {
    this.liveness.stop();

    const pendingJoin = this.pendingJoin;
    this.pendingJoin = null;
    pendingJoin?.(
      new RemotePeerError('connectionFailed', 'Disconnected before the session was established')
    );

    const controller = this.controller;
    this.controller = null;
    controller?.close(NORMAL_CLOSURE, 'Session ended');

    for (const socket of this.pendingSockets) {
      socket.close(NORMAL_CLOSURE, 'Session ended');
    }
    this.pendingSockets.clear();

    this.dropChannel();

    const listener = this.listener;
    this.listener = null;
    if (listener) {
      try {
        await listener.close();
      } catch (error) {
        this.log.warn(TAG, 'Failed to close listener:', error);
      }
    }

    this._sessionId = null;
    this._pin = null;
    this._myPeerId = null;
    this._hostAddress = null;
    this._role = null;
  }

  private dropChannel(): void {
    const channel = this.channel;
    this.channel = null;
    this.channelAuthenticated = false;
    channel?.close(NORMAL_CLOSURE, 'Session ended');
  }

  private activeSocket(): PeerSocket | null {
    if (this._role === 'host') {
      return this.controller?.isOpen ? this.controller : null;
    }
    if (this._role === 'remote' && this.channelAuthenticated) {
      return this.channel?.isOpen ? this.channel : null;
    }
    return null;
  }

  private write(socket: PeerSocket, command: RemoteCommand): void {
    try {
      socket.send(encodeCommand(command));
      this.log.debug(TAG, `Sent command (${this._role}): ${command.type}`);
    } catch (error) {
      this.log.error(TAG, 'Failed to send command:', error);
      this.emitEvent(
        'peerError',
        new RemotePeerError('dataChannelError', `Failed to send command: ${describeError(error)}`, error)
      );
    }
  }

  private writeHandshake(socket: PeerSocket, frame: HandshakeFrame): void {
    try {
      socket.send(encodeHandshake(frame));
    } catch (error) {
      this.log.error(TAG, `Failed to send ${frame.type}:`, error);
      this.emitEvent(
        'peerError',
        new RemotePeerError('dataChannelError', `Failed to send ${frame.type}: ${describeError(error)}`, error)
      );
    }
  }

  // A throwing listener must not take the socket's event loop down with it
  private runHandler(handler: () => void): void {
    try {
      handler();
    } catch (error) {
      this.log.error(TAG, 'Failed to process message:', error);
      this.emitEvent(
        'peerError',
        new RemotePeerError('unknown', `Failed to process message: ${describeError(error)}`, error)
      );
    }
  }

  private setState(state: ConnectionState): void {
    this._state = state;
    this.emitEvent('stateChange', state);
  }

  private emitEvent<E extends keyof PeerServiceEvents>(
    event: E,
    ...args: Parameters<PeerServiceEvents[E]>
  ): void {
    this.emit(event, ...args);
  }
}

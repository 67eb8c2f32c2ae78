/**
 * Remote control manager - application view over one peer session
 */

import { EventEmitter } from 'events';
import {
  AUTH_MESSAGES,
  CLOSE_CODES,
  MAX_RECONNECT_ATTEMPTS,
  RECONNECT_BASE_DELAY_MS,
  logger as defaultLogger,
} from '@companion-remote/shared';
import type {
  CommandData,
  ConnectionState,
  CreatedSession,
  Logger,
  RemoteCommand,
  RemoteCommandType,
  RemoteDevice,
} from '@companion-remote/shared';
import { RemotePeerError, createCommand, describeError } from '@companion-remote/peer';
import type { PeerService } from '@companion-remote/peer';
import { DEVICE_DEFAULTS, LOG_TAGS } from '../constants.js';
import type { TrustedDeviceStore } from './trusted-devices.js';
import type {
  DeviceApprovalCallback,
  RecentSession,
  RemoteSession,
  RemoteSessionStatus,
} from './types.js';

const TAG = LOG_TAGS.REMOTE;

// Host close codes that end the session for this controller; reconnecting would not help
const FINAL_CLOSE_MESSAGES = new Map<number, string>([
  [CLOSE_CODES.INVALID_CREDENTIALS, AUTH_MESSAGES.INVALID_CREDENTIALS],
  [CLOSE_CODES.REPLACED, 'Replaced by another controller'],
  [CLOSE_CODES.RATE_LIMITED, AUTH_MESSAGES.RATE_LIMITED],
]);

export interface RemoteControlManagerOptions {
  deviceName: string;
  platform: string;
  createPeerService: () => PeerService;
  trustedDevices?: TrustedDeviceStore;
  onDeviceApprovalRequired?: DeviceApprovalCallback;
  maxReconnectAttempts?: number;
  reconnectBaseDelayMs?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface RemoteControlManagerEvents {
  changed: (session: RemoteSession | null) => void;
  command: (command: RemoteCommand) => void;
}

interface JoinTarget {
  sessionId: string;
  pin: string;
  hostAddress: string;
}

function stringField(data: CommandData | undefined, key: string): string | undefined {
  const value = data?.[key];
  return typeof value === 'string' ? value : undefined;
}

export interface RemoteControlManager {
  on<E extends keyof RemoteControlManagerEvents>(event: E, listener: RemoteControlManagerEvents[E]): this;
  once<E extends keyof RemoteControlManagerEvents>(event: E, listener: RemoteControlManagerEvents[E]): this;
  off<E extends keyof RemoteControlManagerEvents>(event: E, listener: RemoteControlManagerEvents[E]): this;
}

export class RemoteControlManager extends EventEmitter {
  private readonly deviceName: string;
  private readonly platform: string;
  private readonly createPeerService: () => PeerService;
  private readonly trustedDevices: TrustedDeviceStore | null;
  private readonly onDeviceApprovalRequired: DeviceApprovalCallback | undefined;
  private readonly maxReconnectAttempts: number;
  private readonly reconnectBaseDelayMs: number;
  private readonly now: () => Date;
  private readonly log: Logger;

  private peer: PeerService | null = null;
  private _session: RemoteSession | null = null;
  private _isPlayerActive = false;
  private _recentSession: RecentSession | null = null;

  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempts = 0;
  private reconnecting = false;
  private intentionalDisconnect = false;
  private lastTarget: JoinTarget | null = null;

  constructor(options: RemoteControlManagerOptions) {
    super();
    this.deviceName = options.deviceName;
    this.platform = options.platform;
    this.createPeerService = options.createPeerService;
    this.trustedDevices = options.trustedDevices ?? null;
    this.onDeviceApprovalRequired = options.onDeviceApprovalRequired;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? MAX_RECONNECT_ATTEMPTS;
    this.reconnectBaseDelayMs = options.reconnectBaseDelayMs ?? RECONNECT_BASE_DELAY_MS;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? defaultLogger;
  }

  get session(): RemoteSession | null {
    return this._session;
  }

  get status(): RemoteSessionStatus {
    return this._session?.status ?? 'disconnected';
  }

  get isInSession(): boolean {
    return this._session !== null && this._session.status !== 'disconnected';
  }

  get isHost(): boolean {
    return this._session?.role === 'host';
  }

  get isRemote(): boolean {
    return this._session?.role === 'remote';
  }

  get isConnected(): boolean {
    return this._session?.status === 'connected';
  }

  get connectedDevice(): RemoteDevice | null {
    return this._session?.connectedDevice ?? null;
  }

  get isPlayerActive(): boolean {
    return this._isPlayerActive;
  }

  get reconnectAttemptCount(): number {
    return this.reconnectAttempts;
  }

  get recentSession(): RecentSession | null {
    return this._recentSession;
  }

  /**
   * Host a new session, leaving any current one first.
   */
  async createSession(): Promise<CreatedSession> {
    await this.leaveSession();

    this.log.info(TAG, 'Creating session as host');
    const peer = this.attachPeer();

    try {
      const result = await peer.createSession(this.deviceName, this.platform);
      this.setSession({
        sessionId: result.sessionId,
        pin: result.pin,
        role: 'host',
        status: peer.state,
        connectedDevice: null,
        errorMessage: null,
        hostAddress: result.address,
      });
      this.log.info(TAG, `Session created - ID: ${result.sessionId}, address: ${result.address}`);
      return result;
    } catch (err) {
      this.log.error(TAG, 'Failed to create session:', err);
      this.setSession({
        sessionId: '',
        pin: '',
        role: 'host',
        status: 'error',
        connectedDevice: null,
        errorMessage: describeError(err),
        hostAddress: null,
      });
      throw err;
    }
  }

  /**
   * Join a hosted session. The credentials are kept for reconnecting.
   */
  async joinSession(sessionId: string, pin: string, hostAddress: string): Promise<void> {
    await this.leaveSession();

    this.lastTarget = { sessionId, pin, hostAddress };
    this.log.info(TAG, `Joining session ${sessionId} at ${hostAddress}`);

    const peer = this.attachPeer();
    this.setSession({
      sessionId,
      pin,
      role: 'remote',
      status: 'connecting',
      connectedDevice: null,
      errorMessage: null,
      hostAddress,
    });

    try {
      await peer.joinSession(sessionId, pin, this.deviceName, this.platform, hostAddress);
      this.update({ status: 'connected' });
      this.log.info(TAG, 'Joined session');
    } catch (err) {
      this.log.error(TAG, 'Failed to join session:', err);
      this.update({ status: 'error', errorMessage: describeError(err) });
      throw err;
    }
  }

  async connectToRecent(recent: RecentSession): Promise<void> {
    if (!recent.hostAddress) {
      throw new RemotePeerError(
        'invalidSession',
        'No host address available for this session. Join it again with its session code.'
      );
    }
    await this.joinSession(recent.sessionId, recent.pin, recent.hostAddress);
  }

  sendCommand(type: RemoteCommandType, data?: CommandData): void {
    if (!this.peer || !this.isConnected) {
      this.log.warn(TAG, `Cannot send ${type} - not connected`);
      return;
    }
    this.log.debug(TAG, `Sending command ${type}`);
    this.peer.sendCommand(createCommand(type, data));
  }

  async leaveSession(): Promise<void> {
    this.intentionalDisconnect = true;
    this.stopReconnect();

    const peer = this.peer;
    this.peer = null;
    if (peer) {
      this.log.info(TAG, 'Leaving session');
      await peer.disconnect();
      peer.removeAllListeners();
    }

    this._isPlayerActive = false;
    this.intentionalDisconnect = false;
    this.setSession(null);
  }

  /**
   * Retry immediately instead of waiting out the backoff.
   */
  retryReconnectNow(): Promise<void> {
    this.clearReconnectTimer();
    this.reconnectAttempts = 0;
    this.reconnecting = true;
    return this.attemptReconnect();
  }

  async cancelReconnect(): Promise<void> {
    this.stopReconnect();

    const peer = this.peer;
    if (this.isRemote && peer && !peer.isConnected) {
      this.peer = null;
      peer.removeAllListeners();
      await peer.disconnect();
    }

    this.update({ status: 'disconnected', connectedDevice: null });
  }

  async dispose(): Promise<void> {
    await this.leaveSession();
    this.removeAllListeners();
  }

  private attachPeer(): PeerService {
    const peer = this.createPeerService();
    this.peer = peer;

    peer.on('command', (command) => this.handleCommand(command));
    peer.on('deviceConnected', (device) => this.handleDeviceConnected(device));
    peer.on('deviceDisconnected', (closeCode) => this.handleDeviceDisconnected(closeCode));
    peer.on('peerError', (error) => this.handlePeerError(error));
    peer.on('stateChange', (state) => this.handleStateChange(state));

    return peer;
  }

  private handleCommand(command: RemoteCommand): void {
    switch (command.type) {
      case 'deviceInfo':
        this.handleDeviceInfo(command);
        return;
      case 'syncState':
        this.handleSyncState(command);
        return;
      case 'ping':
      case 'pong':
      case 'ack':
        return;
      default:
        this.emitEvent('command', command);
    }
  }

  private handleDeviceInfo(command: RemoteCommand): void {
    const device: RemoteDevice = {
      id: stringField(command.data, 'id') ?? DEVICE_DEFAULTS.ID,
      name: stringField(command.data, 'name') ?? DEVICE_DEFAULTS.NAME,
      platform: stringField(command.data, 'platform') ?? DEVICE_DEFAULTS.PLATFORM,
    };
    this.log.debug(TAG, `Device info - name: ${device.name}, platform: ${device.platform}`);
    this.update({ connectedDevice: device });

    const session = this._session;
    if (session && session.role === 'remote' && session.sessionId) {
      this._recentSession = {
        sessionId: session.sessionId,
        pin: session.pin,
        deviceName: device.name,
        platform: device.platform,
        lastConnected: this.now().toISOString(),
        hostAddress: session.hostAddress,
      };
    }
  }

  private handleSyncState(command: RemoteCommand): void {
    const playerActive = command.data?.playerActive === true;
    if (this._isPlayerActive !== playerActive) {
      this._isPlayerActive = playerActive;
      this.emitEvent('changed', this._session);
    }
  }

  private handleDeviceConnected(device: RemoteDevice): void {
    this.log.info(TAG, `Device connected: ${device.name}`);
    this.update({ status: 'connected', connectedDevice: device, errorMessage: null });
    this.recordTrustedDevice(device).catch((err) => {
      this.log.error(TAG, 'Failed to record trusted device:', err);
    });
  }

  private async recordTrustedDevice(device: RemoteDevice): Promise<void> {
    if (!this.trustedDevices) return;
    const isHost = this.isHost;
    await this.trustedDevices.add(device, isHost, this.onDeviceApprovalRequired);
    if (!isHost) {
      this.trustedDevices.setLastConnectedDevice(device.id);
    }
  }

  private handleDeviceDisconnected(closeCode: number): void {
    this.log.info(
      TAG,
      `Device disconnected (code: ${closeCode}, intentional: ${this.intentionalDisconnect})`
    );

    const finalMessage = this.isRemote ? FINAL_CLOSE_MESSAGES.get(closeCode) : undefined;
    if (this.intentionalDisconnect) {
      this.update({ status: 'disconnected', connectedDevice: null });
    } else if (finalMessage) {
      this.log.warn(TAG, `Session ended by host: ${finalMessage}`);
      this.stopReconnect();
      this.update({ status: 'disconnected', connectedDevice: null, errorMessage: finalMessage });
    } else if (this.isHost) {
      // The server keeps running; the controller reconnects on its own
      this.update({ status: 'reconnecting', connectedDevice: null, errorMessage: null });
      this.log.info(TAG, 'Host waiting for the controller to reconnect');
    } else {
      this.update({ status: 'reconnecting' });
      this.reconnecting = true;
      this.scheduleReconnect();
    }
  }

  private handlePeerError(error: RemotePeerError): void {
    if (this.reconnecting) {
      this.log.debug(TAG, `Error while reconnecting: ${error.message}`);
      return;
    }
    this.log.error(TAG, `Error: ${error.message}`);
    this.update({ status: 'error', errorMessage: error.message });
  }

  private handleStateChange(state: ConnectionState): void {
    this.log.debug(TAG, `Status changed: ${state}`);
    // Reconnect attempts report their own outcome
    if (this.reconnecting) return;
    if (state === 'disconnected' && this._session?.status === 'reconnecting') return;
    this.update({ status: state });
  }

  private scheduleReconnect(): void {
    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      this.log.warn(TAG, 'Max reconnect attempts reached');
      this.reconnecting = false;
      this.reconnectAttempts = 0;
      this.update({
        status: 'error',
        errorMessage: `Connection lost after ${this.maxReconnectAttempts} attempts`,
      });
      return;
    }

    const delay = this.reconnectBaseDelayMs * 2 ** this.reconnectAttempts;
    this.reconnectAttempts++;
    this.log.info(TAG, `Reconnect attempt ${this.reconnectAttempts} in ${delay}ms`);

    this.clearReconnectTimer();
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.attemptReconnect().catch((err) => {
        this.log.error(TAG, 'Reconnect attempt failed unexpectedly:', err);
      });
    }, delay);
  }

  private async attemptReconnect(): Promise<void> {
    const target = this.lastTarget;
    if (!target) {
      this.log.warn(TAG, 'No stored credentials for reconnect');
      this.reconnecting = false;
      this.update({ status: 'error', errorMessage: 'Connection lost' });
      return;
    }

    const previous = this.peer;
    this.peer = null;
    if (previous) {
      previous.removeAllListeners();
      await previous.disconnect();
    }

    const peer = this.attachPeer();
    try {
      this.log.info(TAG, 'Attempting reconnect...');
      await peer.joinSession(target.sessionId, target.pin, this.deviceName, this.platform, target.hostAddress);
      if (this.peer !== peer) return;

      this.reconnecting = false;
      this.reconnectAttempts = 0;
      this.update({ status: 'connected', errorMessage: null });
      this.log.info(TAG, 'Reconnected');
    } catch (err) {
      if (this.peer !== peer || !this.reconnecting) return;
      this.log.warn(TAG, 'Reconnect failed:', err);
      this.scheduleReconnect();
    }
  }

  private stopReconnect(): void {
    this.clearReconnectTimer();
    this.reconnectAttempts = 0;
    this.reconnecting = false;
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private update(changes: Partial<RemoteSession>): void {
    if (!this._session) return;
    this.setSession({ ...this._session, ...changes });
  }

  private setSession(session: RemoteSession | null): void {
    this._session = session;
    this.emitEvent('changed', session);
  }

  private emitEvent<E extends keyof RemoteControlManagerEvents>(
    event: E,
    ...args: Parameters<RemoteControlManagerEvents[E]>
  ): void {
    this.emit(event, ...args);
  }
}

/**
 * Remote control types
 */

import type { RemoteDevice, SessionRole } from '@companion-remote/shared';

export type RemoteSessionStatus =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'reconnecting'
  | 'error';

// Application view of the current session
export interface RemoteSession {
  sessionId: string;
  pin: string;
  role: SessionRole;
  status: RemoteSessionStatus;
  connectedDevice: RemoteDevice | null;
  errorMessage: string | null;
  hostAddress: string | null;
}

// A session the remote has joined before
export interface RecentSession {
  sessionId: string;
  pin: string;
  deviceName: string;
  platform: string;
  lastConnected: string;
  hostAddress: string | null;
}

export interface TrustedDevice {
  peerId: string;
  deviceName: string;
  platform: string;
  isApproved: boolean;
  lastConnected: string;
}

export type DeviceApprovalCallback = (device: RemoteDevice) => Promise<boolean>;

// Hosting
export const DEFAULT_HOST_PORT = 48632;
export const SOCKET_PATH = '/ws';

// Credentials
export const SESSION_ID_LENGTH = 8;
export const SESSION_ID_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const PIN_LENGTH = 6;

// Timing
export const AUTH_TIMEOUT_MS = 10 * 1000; // host waits this long for the auth frame
export const JOIN_TIMEOUT_MS = 15 * 1000;
export const PING_INTERVAL_MS = 5 * 1000;

// Brute-force protection
export const MAX_FAILED_AUTH_ATTEMPTS = 5;
export const AUTH_LOCKOUT_MS = 30 * 1000;

// Reconnection (application layer)
export const MAX_RECONNECT_ATTEMPTS = 5;
export const RECONNECT_BASE_DELAY_MS = 1000;

// Host-initiated close codes
export const CLOSE_CODES = {
  AUTH_TIMEOUT: 4001,
  AUTH_REQUIRED: 4002,
  INVALID_CREDENTIALS: 4003,
  REPLACED: 4004,
  RATE_LIMITED: 4005,
} as const;

export const AUTH_MESSAGES = {
  INVALID_CREDENTIALS: 'Invalid session ID or PIN',
  RATE_LIMITED: 'Too many attempts. Try again later.',
  DEFAULT_FAILURE: 'Authentication failed',
} as const;

// Placeholder identities used until the peer's deviceInfo arrives
export const PLACEHOLDER_DEVICES = {
  HOST: { id: 'host', name: 'Desktop', platform: 'desktop' },
  REMOTE: { id: 'remote-client', name: 'Unknown Device', platform: 'unknown' },
} as const;

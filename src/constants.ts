/**
 * Application constants
 */

// Log tags
export const LOG_TAGS = {
  REMOTE: '[Remote]',
  PLAYER: '[Player]',
  DEVICES: '[Devices]',
  CONFIG: '[Config]',
  CLI: '[CLI]',
} as const;

export const PLAYER = {
  // Default seek step for seekForward / seekBackward
  SEEK_STEP_SECONDS: 10,

  // Step for volumeUp / volumeDown
  VOLUME_STEP: 10,

  MAX_VOLUME: 100,

  // Level restored by volumeMute when muted
  UNMUTED_VOLUME: 100,
} as const;

export const DEVICE_DEFAULTS = {
  ID: 'unknown',
  NAME: 'Unknown Device',
  PLATFORM: 'unknown',
} as const;

import { randomInt, timingSafeEqual } from 'crypto';
import {
  PIN_LENGTH,
  SESSION_ID_ALPHABET,
  SESSION_ID_LENGTH,
} from '@companion-remote/shared';

export interface SessionCredentials {
  sessionId: string;
  pin: string;
}

// Generate a session id (8 characters from A-Z and 0-9)
export function generateSessionId(): string {
  let id = '';
  for (let i = 0; i < SESSION_ID_LENGTH; i++) {
    id += SESSION_ID_ALPHABET.charAt(randomInt(SESSION_ID_ALPHABET.length));
  }
  return id;
}

// Generate a numeric PIN, leading zeros included
export function generatePin(): string {
  let pin = '';
  for (let i = 0; i < PIN_LENGTH; i++) {
    pin += String(randomInt(10));
  }
  return pin;
}

export function normalizeSessionId(sessionId: string): string {
  return sessionId.trim().toUpperCase();
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}

/**
 * Compare a claimed session id / PIN pair against the active session. Both
 * fields are always compared so the result never hints at which one was wrong.
 */
export function credentialsMatch(
  expected: SessionCredentials,
  given: Partial<SessionCredentials>
): boolean {
  if (given.sessionId === undefined || given.pin === undefined) {
    return false;
  }
  const sessionIdMatches = safeEqual(normalizeSessionId(given.sessionId), expected.sessionId);
  const pinMatches = safeEqual(given.pin, expected.pin);
  return sessionIdMatches && pinMatches;
}

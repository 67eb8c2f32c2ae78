import { AuthGuard } from './auth-guard.js';

describe('AuthGuard', () => {
  let now: number;
  let guard: AuthGuard;

  beforeEach(() => {
    now = 1_000_000;
    guard = new AuthGuard({ now: () => now });
  });

  it('should not lock out before the fifth failure', () => {
    for (let i = 0; i < 4; i++) {
      guard.recordFailure();
    }
    expect(guard.failedAttempts).toBe(4);
    expect(guard.isLockedOut()).toBe(false);
    expect(guard.lockoutUntil).toBeNull();
  });

  it('should lock out for 30 seconds on the fifth failure', () => {
    for (let i = 0; i < 5; i++) {
      guard.recordFailure();
    }
    expect(guard.lockoutUntil).toBe(1_030_000);
    expect(guard.isLockedOut()).toBe(true);

    now += 29_999;
    expect(guard.isLockedOut()).toBe(true);

    now += 1;
    expect(guard.isLockedOut()).toBe(false);
  });

  it('should reset the counter on success', () => {
    guard.recordFailure();
    guard.recordFailure();
    guard.recordSuccess();
    expect(guard.failedAttempts).toBe(0);

    for (let i = 0; i < 4; i++) {
      guard.recordFailure();
    }
    expect(guard.isLockedOut()).toBe(false);
  });

  it('should not lift an active lockout on success', () => {
    for (let i = 0; i < 5; i++) {
      guard.recordFailure();
    }
    guard.recordSuccess();
    expect(guard.failedAttempts).toBe(0);
    expect(guard.isLockedOut()).toBe(true);
  });

  it('should honour custom thresholds', () => {
    const strict = new AuthGuard({ maxFailedAttempts: 2, lockoutMs: 1000, now: () => now });
    strict.recordFailure();
    expect(strict.isLockedOut()).toBe(false);
    strict.recordFailure();
    expect(strict.lockoutUntil).toBe(1_001_000);
  });
});

import { AUTH_LOCKOUT_MS, MAX_FAILED_AUTH_ATTEMPTS } from '@companion-remote/shared';

export interface AuthGuardOptions {
  maxFailedAttempts?: number;
  lockoutMs?: number;
  now?: () => number;
}

/**
 * Failed-attempt counter for one hosting period. Shared by every connection
 * attempt made while the session is up.
 */
export class AuthGuard {
  private readonly maxFailedAttempts: number;
  private readonly lockoutMs: number;
  private readonly now: () => number;
  private _failedAttempts = 0;
  private _lockoutUntil: number | null = null;

  constructor(options: AuthGuardOptions = {}) {
    this.maxFailedAttempts = options.maxFailedAttempts ?? MAX_FAILED_AUTH_ATTEMPTS;
    this.lockoutMs = options.lockoutMs ?? AUTH_LOCKOUT_MS;
    this.now = options.now ?? Date.now;
  }

  get failedAttempts(): number {
    return this._failedAttempts;
  }

  get lockoutUntil(): number | null {
    return this._lockoutUntil;
  }

  get maxAttempts(): number {
    return this.maxFailedAttempts;
  }

  recordFailure(): void {
    this._failedAttempts++;
    if (this._failedAttempts >= this.maxFailedAttempts) {
      this._lockoutUntil = this.now() + this.lockoutMs;
    }
  }

  // Does not lift a lockout that is already running
  recordSuccess(): void {
    this._failedAttempts = 0;
  }

  isLockedOut(): boolean {
    return this._lockoutUntil !== null && this.now() < this._lockoutUntil;
  }
}

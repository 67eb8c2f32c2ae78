export type RemotePeerErrorType =
  | 'connectionFailed'
  // Reserved for application-level signaling; the protocol engine never raises it
  | 'peerDisconnected'
  | 'dataChannelError'
  | 'serverError'
  | 'timeout'
  // Reserved; credential mismatches are reported as authFailed
  | 'invalidSession'
  | 'authFailed'
  | 'networkError'
  | 'unknown';

export class RemotePeerError extends Error {
  readonly type: RemotePeerErrorType;
  override readonly cause?: unknown;

  constructor(type: RemotePeerErrorType, message: string, cause?: unknown) {
    super(message);
    this.name = 'RemotePeerError';
    this.type = type;
    this.cause = cause;
  }

  override toString(): string {
    return `RemotePeerError(${this.type}): ${this.message}`;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Wraps anything thrown into a RemotePeerError, keeping existing ones as they are
export function toPeerError(
  error: unknown,
  type: RemotePeerErrorType,
  context: string
): RemotePeerError {
  if (error instanceof RemotePeerError) {
    return error;
  }
  return new RemotePeerError(type, `${context}: ${describeError(error)}`, error);
}

export { RemotePeerService } from './peer-service.js';
export type { PeerService, PeerServiceEvents, RemotePeerServiceOptions } from './peer-service.js';
export { AuthGuard } from './auth-guard.js';
export type { AuthGuardOptions } from './auth-guard.js';
export { LivenessMonitor } from './liveness.js';
export type { LivenessMonitorOptions } from './liveness.js';
export {
  createCommand,
  decodeFrame,
  encodeCommand,
  encodeHandshake,
  requiresAck,
} from './codec.js';
export type { AuthRequest, DecodedFrame, DecodeResult } from './codec.js';
export {
  credentialsMatch,
  generatePin,
  generateSessionId,
  normalizeSessionId,
} from './credentials.js';
export type { SessionCredentials } from './credentials.js';
export { RemotePeerError, describeError, toPeerError } from './errors.js';
export type { RemotePeerErrorType } from './errors.js';
export { buildSocketUrl, resolveLocalIPv4 } from './network.js';
export type { InterfaceTable } from './network.js';
export { clientOnlyTransport } from './transport.js';
export type { ListeningServer, PeerSocket, Transport } from './transport.js';
export { createWsTransport } from './ws-transport.js';

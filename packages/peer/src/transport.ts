/**
 * Capabilities the peer service needs from the platform. A runtime that
 * cannot accept inbound connections leaves out `listen`.
 */

export interface PeerSocket {
  readonly isOpen: boolean;
  send(text: string): void;
  close(code?: number, reason?: string): void;
  onMessage(listener: (text: string) => void): void;
  onClose(listener: (code: number, reason: string) => void): void;
  onError(listener: (error: Error) => void): void;
}

export interface ListeningServer {
  readonly port: number;
  close(): Promise<void>;
}

export interface Transport {
  listen?(
    port: number,
    path: string,
    onConnection: (socket: PeerSocket) => void
  ): Promise<ListeningServer>;
  connect(url: string): PeerSocket;
}

export function clientOnlyTransport(transport: Transport): Transport {
  return {
    connect: (url) => transport.connect(url),
  };
}

import express from 'express';
import type { Request, Response } from 'express';
import { createServer } from 'http';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { ListeningServer, PeerSocket, Transport } from './transport.js';

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

class WsPeerSocket implements PeerSocket {
  private ws: WebSocket;
  // Frames written before the client handshake completes
  private outbox: string[] = [];

  constructor(ws: WebSocket) {
    this.ws = ws;

    if (ws.readyState === WebSocket.CONNECTING) {
      ws.once('open', () => {
        const pending = this.outbox;
        this.outbox = [];
        for (const text of pending) {
          ws.send(text);
        }
      });
    }
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(text: string): void {
    switch (this.ws.readyState) {
      case WebSocket.CONNECTING:
        this.outbox.push(text);
        break;
      case WebSocket.OPEN:
        this.ws.send(text);
        break;
      default:
        throw new Error('WebSocket is not open');
    }
  }

  close(code?: number, reason?: string): void {
    if (this.ws.readyState === WebSocket.CLOSING || this.ws.readyState === WebSocket.CLOSED) {
      return;
    }
    this.outbox = [];
    this.ws.close(code, reason);
  }

  onMessage(listener: (text: string) => void): void {
    this.ws.on('message', (data: RawData) => listener(rawDataToString(data)));
  }

  onClose(listener: (code: number, reason: string) => void): void {
    this.ws.on('close', (code: number, reason: Buffer) => listener(code, reason.toString('utf8')));
  }

  onError(listener: (error: Error) => void): void {
    this.ws.on('error', listener);
  }
}

async function listen(
  port: number,
  path: string,
  onConnection: (socket: PeerSocket) => void
): Promise<ListeningServer> {
  const app = express();
  app.use((_req: Request, res: Response) => {
    res.status(404).end();
  });

  const httpServer = createServer(app);
  const wss = new WebSocketServer({ noServer: true });

  httpServer.on('upgrade', (request, socket, head) => {
    const pathname = new URL(request.url ?? '/', 'http://localhost').pathname;
    if (pathname !== path) {
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      onConnection(new WsPeerSocket(ws));
    });
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (error: Error) => {
      httpServer.off('listening', onListening);
      reject(error);
    };
    const onListening = () => {
      httpServer.off('error', onError);
      resolve();
    };
    httpServer.once('error', onError);
    httpServer.once('listening', onListening);
    httpServer.listen(port, '0.0.0.0');
  });

  const address = httpServer.address();
  const boundPort = typeof address === 'object' && address !== null ? address.port : port;

  return {
    port: boundPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close();
        httpServer.close((error) => (error ? reject(error) : resolve()));
        httpServer.closeAllConnections();
      }),
  };
}

export function createWsTransport(): Transport {
  return {
    listen,
    connect: (url) => new WsPeerSocket(new WebSocket(url)),
  };
}

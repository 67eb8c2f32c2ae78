import { WebSocket, WebSocketServer } from 'ws';
import { Logger } from '@companion-remote/shared';
import type { ConnectionState, RemoteCommand, RemoteDevice } from '@companion-remote/shared';
import { createCommand } from './codec.js';
import { RemotePeerError } from './errors.js';
import { RemotePeerService, type RemotePeerServiceOptions } from './peer-service.js';
import { clientOnlyTransport } from './transport.js';
import { createWsTransport } from './ws-transport.js';

const LOCALHOST = '127.0.0.1';

const quietLogger = new Logger();
quietLogger.setLevel('silent');

interface WireFrame {
  type: string;
  message?: string;
  data?: Record<string, unknown>;
}

// Protocol-level client that records every frame the host sends
class RawClient {
  readonly frames: WireFrame[] = [];
  readonly closed: Promise<number>;
  private listeners = new Set<() => void>();

  constructor(readonly ws: WebSocket) {
    ws.on('message', (data) => {
      this.frames.push(JSON.parse(data.toString()));
      for (const listener of [...this.listeners]) listener();
    });
    this.closed = new Promise((resolve) => ws.on('close', (code) => resolve(code)));
  }

  static async connect(address: string): Promise<RawClient> {
    const client = new RawClient(new WebSocket(`ws://${address}/ws`));
    await new Promise<void>((resolve, reject) => {
      client.ws.once('open', () => resolve());
      client.ws.once('error', reject);
    });
    return client;
  }

  send(frame: object): void {
    this.ws.send(JSON.stringify(frame));
  }

  sendText(text: string): void {
    this.ws.send(text);
  }

  count(type: string): number {
    return this.frames.filter((frame) => frame.type === type).length;
  }

  // Resolves with the nth frame of the given type
  waitFor(type: string, nth = 1): Promise<WireFrame> {
    return new Promise((resolve) => {
      const check = () => {
        const matches = this.frames.filter((frame) => frame.type === type);
        if (matches.length >= nth) {
          this.listeners.delete(check);
          resolve(matches[nth - 1]);
        }
      };
      this.listeners.add(check);
      check();
    });
  }

  close(): void {
    this.ws.close();
  }
}

describe('RemotePeerService', () => {
  const services: RemotePeerService[] = [];
  const rawClients: RawClient[] = [];
  const servers: WebSocketServer[] = [];

  function createService(options: RemotePeerServiceOptions = {}): RemotePeerService {
    const service = new RemotePeerService({
      preferredPort: 0,
      resolveAddress: () => LOCALHOST,
      logger: quietLogger,
      ...options,
    });
    services.push(service);
    return service;
  }

  async function connectRaw(address: string): Promise<RawClient> {
    const client = await RawClient.connect(address);
    rawClients.push(client);
    return client;
  }

  async function authenticatedRaw(
    host: RemotePeerService,
    address: string
  ): Promise<RawClient> {
    const client = await connectRaw(address);
    client.send({
      type: 'auth',
      sessionId: host.sessionId,
      pin: host.pin,
      deviceName: 'Raw Client',
      platform: 'test',
    });
    await client.waitFor('authSuccess');
    return client;
  }

  async function silentServer(): Promise<{ port: number; connections: WebSocket[] }> {
    const wss = new WebSocketServer({ port: 0, host: LOCALHOST });
    servers.push(wss);
    const connections: WebSocket[] = [];
    wss.on('connection', (ws) => connections.push(ws));
    await new Promise<void>((resolve) => wss.once('listening', () => resolve()));
    const address = wss.address();
    if (address === null || typeof address === 'string') throw new Error('Expected a TCP address');
    return { port: address.port, connections };
  }

  function wrongPin(pin: string | null): string {
    return pin === '000000' ? '111111' : '000000';
  }

  afterEach(async () => {
    for (const client of rawClients.splice(0)) {
      client.ws.terminate();
    }
    for (const service of services.splice(0)) {
      await service.dispose();
    }
    for (const wss of servers.splice(0)) {
      for (const client of wss.clients) client.terminate();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }
  });

  describe('createSession', () => {
    it('should create a session with a fresh id, pin and LAN address', async () => {
      const host = createService();
      const states: ConnectionState[] = [];
      host.on('stateChange', (state) => states.push(state));

      const session = await host.createSession('Living Room', 'linux');

      expect(session.sessionId).toMatch(/^[A-Z0-9]{8}$/);
      expect(session.pin).toMatch(/^[0-9]{6}$/);
      expect(session.address).toMatch(/^127\.0\.0\.1:\d+$/);
      expect(host.sessionId).toBe(session.sessionId);
      expect(host.pin).toBe(session.pin);
      expect(host.hostAddress).toBe(session.address);
      expect(host.myPeerId).toBe(`host-${session.sessionId}`);
      expect(host.role).toBe('host');
      expect(host.isHost).toBe(true);
      expect(host.isConnected).toBe(false);
      expect(states).toEqual(['connecting']);
    });

    it('should fall back to an OS-assigned port when the preferred one is taken', async () => {
      const first = createService();
      const { address } = await first.createSession('First', 'linux');
      const takenPort = Number(address.split(':')[1]);

      const second = createService({ preferredPort: takenPort });
      const session = await second.createSession('Second', 'linux');

      const port = Number(session.address.split(':')[1]);
      expect(port).toBeGreaterThan(0);
      expect(port).not.toBe(takenPort);
    });

    it('should replace the previous session when called again', async () => {
      const host = createService();
      const first = await host.createSession('Living Room', 'linux');
      const second = await host.createSession('Living Room', 'linux');

      expect(host.sessionId).toBe(second.sessionId);
      expect(second.sessionId).not.toBe(first.sessionId);

      const client = await connectRaw(second.address);
      client.send({ type: 'auth', sessionId: first.sessionId, pin: first.pin, deviceName: 'Phone', platform: 'ios' });
      expect((await client.waitFor('authFailed')).message).toBe('Invalid session ID or PIN');
    });

    it('should refuse to host on a transport that cannot listen', async () => {
      const host = createService({ transport: clientOnlyTransport(createWsTransport()) });

      await expect(host.createSession('Browser', 'web')).rejects.toMatchObject({
        type: 'serverError',
        message: 'Hosting sessions is not supported on this platform',
      });
      expect(host.role).toBeNull();
    });

    it('should fail with a network error when no interface resolves', async () => {
      const host = createService({
        resolveAddress: () => {
          throw new RemotePeerError('networkError', 'No network interface found');
        },
      });
      const errors: RemotePeerError[] = [];
      host.on('peerError', (error) => errors.push(error));

      await expect(host.createSession('Living Room', 'linux')).rejects.toMatchObject({
        type: 'networkError',
      });
      expect(errors.map((error) => error.type)).toEqual(['networkError']);
      expect(host.sessionId).toBeNull();
      expect(host.state).toBe('error');
    });

    it('should answer other paths with 404', async () => {
      const host = createService();
      const { address } = await host.createSession('Living Room', 'linux');

      const response = await fetch(`http://${address}/other`);
      expect(response.status).toBe(404);

      const ws = new WebSocket(`ws://${address}/other`);
      const error = await new Promise<Error>((resolve) => ws.once('error', resolve));
      expect(error.message).toBe('Unexpected server response: 404');
    });
  });

  describe('authentication', () => {
    it('should accept a case-insensitive session id and announce the controller once', async () => {
      const host = createService();
      const remote = createService();
      const session = await host.createSession('Living Room', 'linux');

      const connected: RemoteDevice[] = [];
      const hostCommands: RemoteCommand[] = [];
      const remoteCommands: RemoteCommand[] = [];
      host.on('deviceConnected', (device) => connected.push(device));
      host.on('command', (command) => hostCommands.push(command));
      remote.on('command', (command) => remoteCommands.push(command));

      await remote.joinSession(session.sessionId.toLowerCase(), session.pin, 'Phone', 'android', session.address);

      expect(connected).toEqual([{ id: 'remote-client', name: 'Phone', platform: 'android' }]);
      expect(remote.isConnected).toBe(true);
      expect(remote.sessionId).toBe(session.sessionId);
      expect(remote.role).toBe('remote');
      expect(remote.myPeerId).toMatch(/^remote-[0-9a-f]{8}$/);
      expect(host.isConnected).toBe(true);
      expect(host.state).toBe('connected');

      await vi.waitFor(() => {
        expect(hostCommands.find((command) => command.type === 'deviceInfo')?.data).toEqual({
          id: remote.myPeerId,
          name: 'Phone',
          platform: 'android',
          role: 'remote',
        });
        expect(remoteCommands.find((command) => command.type === 'deviceInfo')?.data).toEqual({
          id: `host-${session.sessionId}`,
          name: 'Living Room',
          platform: 'linux',
          role: 'host',
        });
      });
    });

    it('should emit a placeholder host device on the remote side', async () => {
      const host = createService();
      const remote = createService();
      const session = await host.createSession('Living Room', 'linux');
      const devices: RemoteDevice[] = [];
      remote.on('deviceConnected', (device) => devices.push(device));

      await remote.joinSession(session.sessionId, session.pin, 'Phone', 'android', session.address);

      expect(devices).toEqual([{ id: 'host', name: 'Desktop', platform: 'desktop' }]);
    });

    it('should reject wrong credentials without locking out before the fifth failure', async () => {
      const host = createService();
      const { address } = await host.createSession('Living Room', 'linux');

      for (let attempt = 0; attempt < 4; attempt++) {
        const client = await connectRaw(address);
        client.send({ type: 'auth', sessionId: host.sessionId, pin: wrongPin(host.pin), deviceName: 'Guess', platform: 'test' });
        const reply = await client.waitFor('authFailed');
        expect(reply.message).toBe('Invalid session ID or PIN');
        expect(await client.closed).toBe(4003);
      }

      // The fifth attempt is still checked against the credentials
      const remote = createService();
      const sessionId = host.sessionId ?? '';
      const pin = host.pin ?? '';
      await expect(remote.joinSession(sessionId, pin, 'Phone', 'ios', address)).resolves.toBeUndefined();
    });

    it('should lock out after five failures even for correct credentials', async () => {
      const host = createService();
      const { address, sessionId, pin } = await host.createSession('Living Room', 'linux');

      for (let attempt = 0; attempt < 5; attempt++) {
        const client = await connectRaw(address);
        client.send({ type: 'auth', sessionId, pin: wrongPin(pin), deviceName: 'Guess', platform: 'test' });
        expect((await client.waitFor('authFailed')).message).toBe('Invalid session ID or PIN');
      }

      const client = await connectRaw(address);
      client.send({ type: 'auth', sessionId, pin, deviceName: 'Phone', platform: 'ios' });
      const reply = await client.waitFor('authFailed');
      expect(reply.message).toBe('Too many attempts. Try again later.');
      expect(await client.closed).toBe(4005);

      const remote = createService();
      const states: ConnectionState[] = [];
      remote.on('stateChange', (state) => states.push(state));
      await expect(remote.joinSession(sessionId, pin, 'Phone', 'ios', address)).rejects.toMatchObject({
        type: 'authFailed',
        message: 'Too many attempts. Try again later.',
      });
      expect(states).toEqual(['connecting', 'error']);
    });

    it('should require auth as the first frame', async () => {
      const host = createService();
      const { address } = await host.createSession('Living Room', 'linux');

      const client = await connectRaw(address);
      client.send({ type: 'playPause' });
      expect(await client.closed).toBe(4002);
    });

    it('should close connections that never authenticate', async () => {
      const host = createService({ authTimeoutMs: 100 });
      const { address } = await host.createSession('Living Room', 'linux');

      const client = await connectRaw(address);
      expect(await client.closed).toBe(4001);
    });

    it('should not time out a connection that authenticated in time', async () => {
      const host = createService({ authTimeoutMs: 150 });
      const { address } = await host.createSession('Living Room', 'linux');

      const client = await authenticatedRaw(host, address);
      await new Promise((resolve) => setTimeout(resolve, 300));
      expect(client.ws.readyState).toBe(WebSocket.OPEN);
      expect(host.isConnected).toBe(true);
    });
  });

  describe('single controller', () => {
    it('should evict the previous controller when a new one authenticates', async () => {
      const host = createService();
      const session = await host.createSession('Living Room', 'linux');
      const first = createService();
      const second = createService();

      const firstCommands: RemoteCommand[] = [];
      const secondCommands: RemoteCommand[] = [];
      first.on('command', (command) => firstCommands.push(command));
      second.on('command', (command) => secondCommands.push(command));
      const firstDisconnected = new Promise<number>((resolve) => first.once('deviceDisconnected', resolve));

      await first.joinSession(session.sessionId, session.pin, 'Phone A', 'android', session.address);
      await second.joinSession(session.sessionId, session.pin, 'Phone B', 'ios', session.address);
      expect(await firstDisconnected).toBe(4004);

      expect(first.isConnected).toBe(false);
      expect(second.isConnected).toBe(true);
      expect(host.isConnected).toBe(true);

      host.sendCommand(createCommand('seek', { positionMs: 42000 }));

      await vi.waitFor(() => {
        expect(secondCommands.filter((command) => command.type === 'seek')).toEqual([
          { type: 'seek', data: { positionMs: 42000 } },
        ]);
      });
      expect(firstCommands.some((command) => command.type === 'seek')).toBe(false);
    });

    it('should close the evicted socket with the replaced code', async () => {
      const host = createService();
      const { address } = await host.createSession('Living Room', 'linux');

      const first = await authenticatedRaw(host, address);
      await authenticatedRaw(host, address);

      expect(await first.closed).toBe(4004);
      expect(host.isConnected).toBe(true);
    });
  });

  describe('command traffic', () => {
    it('should acknowledge control commands only', async () => {
      const host = createService();
      const { address } = await host.createSession('Living Room', 'linux');
      const received: RemoteCommand[] = [];
      host.on('command', (command) => received.push(command));

      const client = await authenticatedRaw(host, address);
      client.send({ type: 'playPause' });
      await client.waitFor('ack', 1);

      client.send({ type: 'deviceInfo', data: { id: 'raw', name: 'Raw Client', platform: 'test', role: 'remote' } });
      client.send({ type: 'pong' });
      client.send({ type: 'ack' });
      client.send({ type: 'stop' });
      await client.waitFor('ack', 2);

      expect(client.count('ack')).toBe(2);
      expect(received.map((command) => command.type)).toEqual(['playPause', 'deviceInfo', 'pong', 'ack', 'stop']);
    });

    it('should answer a ping with exactly one pong and no ack', async () => {
      const host = createService();
      const { address } = await host.createSession('Living Room', 'linux');
      const client = await authenticatedRaw(host, address);

      client.send({ type: 'ping' });
      await client.waitFor('pong');

      client.send({ type: 'volumeUp' });
      await client.waitFor('ack');

      expect(client.count('pong')).toBe(1);
      expect(client.count('ack')).toBe(1);
    });

    it('should have the remote answer host pings', async () => {
      const host = createService();
      const remote = createService();
      const session = await host.createSession('Living Room', 'linux');
      await remote.joinSession(session.sessionId, session.pin, 'Phone', 'android', session.address);

      const hostCommands: RemoteCommand[] = [];
      const remoteCommands: RemoteCommand[] = [];
      host.on('command', (command) => hostCommands.push(command));
      remote.on('command', (command) => remoteCommands.push(command));

      host.sendCommand(createCommand('ping'));

      // deviceInfo from the handshake may still be in flight
      const types = (commands: RemoteCommand[]) =>
        commands.map((command) => command.type).filter((type) => type !== 'deviceInfo');

      await vi.waitFor(() => {
        expect(types(hostCommands)).toEqual(['pong']);
      });
      expect(types(remoteCommands)).toEqual(['ping']);
    });

    it('should keep the connection open after a malformed frame', async () => {
      const host = createService();
      const { address } = await host.createSession('Living Room', 'linux');
      const received: RemoteCommand[] = [];
      host.on('command', (command) => received.push(command));

      const client = await authenticatedRaw(host, address);
      client.sendText('this is not json');
      client.sendText('{"data":{}}');
      client.send({ type: 'pause' });
      await client.waitFor('ack');

      expect(client.ws.readyState).toBe(WebSocket.OPEN);
      expect(host.isConnected).toBe(true);
      expect(received.map((command) => command.type)).toEqual(['pause']);
    });

    it('should report a throwing listener as an unknown error and keep going', async () => {
      const host = createService();
      const { address } = await host.createSession('Living Room', 'linux');
      const errors: RemotePeerError[] = [];
      host.on('peerError', (error) => errors.push(error));
      host.on('command', (command) => {
        if (command.type === 'explode') throw new Error('listener failed');
      });

      const client = await authenticatedRaw(host, address);
      client.send({ type: 'explode' });
      client.send({ type: 'play' });
      await client.waitFor('ack', 2);

      expect(errors.map((error) => [error.type, error.message])).toEqual([
        ['unknown', 'Failed to process message: listener failed'],
      ]);
      expect(client.ws.readyState).toBe(WebSocket.OPEN);
    });

    it('should send pings from the remote while connected', async () => {
      const host = createService();
      const remote = createService({ pingIntervalMs: 50 });
      const session = await host.createSession('Living Room', 'linux');
      const hostCommands: RemoteCommand[] = [];
      host.on('command', (command) => hostCommands.push(command));

      await remote.joinSession(session.sessionId, session.pin, 'Phone', 'android', session.address);

      await vi.waitFor(() => {
        expect(hostCommands.filter((command) => command.type === 'ping').length).toBeGreaterThanOrEqual(2);
      });
    });

    it('should treat sendCommand without a connection as a no-op', () => {
      const service = createService();
      expect(() => service.sendCommand(createCommand('playPause'))).not.toThrow();
    });
  });

  describe('joinSession', () => {
    it('should time out, close the socket, and still allow a later join', async () => {
      const { port, connections } = await silentServer();
      const remote = createService({ joinTimeoutMs: 300 });
      const errors: RemotePeerError[] = [];
      remote.on('peerError', (error) => errors.push(error));

      const joining = remote.joinSession('ABCD1234', '123456', 'Phone', 'android', `${LOCALHOST}:${port}`);
      const outcome = expect(joining).rejects.toMatchObject({ type: 'timeout', message: 'Timed out joining session' });
      await vi.waitFor(() => expect(connections).toHaveLength(1));
      const serverSideClosed = new Promise<void>((resolve) => connections[0].once('close', () => resolve()));

      await outcome;
      await serverSideClosed;
      expect(errors.map((error) => error.type)).toEqual(['timeout']);
      expect(remote.isConnected).toBe(false);

      const host = createService();
      const session = await host.createSession('Living Room', 'linux');
      await remote.joinSession(session.sessionId, session.pin, 'Phone', 'android', session.address);
      expect(remote.isConnected).toBe(true);
    });

    it('should fail with connectionFailed when nothing listens', async () => {
      const probe = createService();
      const { address } = await probe.createSession('Probe', 'linux');
      await probe.disconnect();

      const remote = createService();
      await expect(remote.joinSession('ABCD1234', '123456', 'Phone', 'android', address)).rejects.toMatchObject({
        type: 'connectionFailed',
      });
      expect(remote.state).toBe('error');
    });

    it('should fail a pending join when disconnect is called', async () => {
      const { port, connections } = await silentServer();
      const remote = createService();

      const joining = remote.joinSession('ABCD1234', '123456', 'Phone', 'android', `${LOCALHOST}:${port}`);
      const outcome = expect(joining).rejects.toMatchObject({
        type: 'connectionFailed',
        message: 'Disconnected before the session was established',
      });
      await vi.waitFor(() => expect(connections).toHaveLength(1));
      await remote.disconnect();

      await outcome;
    });

    it('should report the host going away', async () => {
      const host = createService();
      const remote = createService();
      const session = await host.createSession('Living Room', 'linux');
      await remote.joinSession(session.sessionId, session.pin, 'Phone', 'android', session.address);

      const disconnected = new Promise<number>((resolve) => remote.once('deviceDisconnected', resolve));
      await host.disconnect();
      expect(await disconnected).toBe(1000);

      expect(remote.isConnected).toBe(false);
      expect(remote.state).toBe('disconnected');
    });
  });

  describe('disconnect', () => {
    it('should be safe on a service that never connected, and when repeated', async () => {
      const service = createService();
      await service.disconnect();
      await service.disconnect();

      expect(service.isConnected).toBe(false);
      expect(service.sessionId).toBeNull();
      expect(service.pin).toBeNull();
      expect(service.myPeerId).toBeNull();
      expect(service.hostAddress).toBeNull();
      expect(service.role).toBeNull();
      expect(service.state).toBe('disconnected');
    });

    it('should clear identity and notify the host when the controller leaves', async () => {
      const host = createService();
      const remote = createService();
      const session = await host.createSession('Living Room', 'linux');
      await remote.joinSession(session.sessionId, session.pin, 'Phone', 'android', session.address);

      const hostStates: ConnectionState[] = [];
      host.on('stateChange', (state) => hostStates.push(state));
      const hostLost = new Promise<number>((resolve) => host.once('deviceDisconnected', resolve));

      await remote.disconnect();
      await remote.disconnect();
      expect(await hostLost).toBe(1000);

      expect(remote.isConnected).toBe(false);
      expect(remote.sessionId).toBeNull();
      expect(remote.hostAddress).toBeNull();
      expect(remote.role).toBeNull();
      expect(host.isConnected).toBe(false);
      expect(hostStates).toEqual(['disconnected']);
      // The host keeps listening for the next controller
      expect(host.sessionId).toBe(session.sessionId);
    });
  });
});

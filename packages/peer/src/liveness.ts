import { PING_INTERVAL_MS } from '@companion-remote/shared';

export interface LivenessMonitorOptions {
  intervalMs?: number;
  isConnected: () => boolean;
  sendPing: () => void;
}

/**
 * Periodic keep-alive for the controller side. Pongs are not tracked: the
 * pings only keep proxies and NAT mappings from dropping an idle socket.
 */
export class LivenessMonitor {
  private readonly intervalMs: number;
  private readonly isConnected: () => boolean;
  private readonly sendPing: () => void;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: LivenessMonitorOptions) {
    this.intervalMs = options.intervalMs ?? PING_INTERVAL_MS;
    this.isConnected = options.isConnected;
    this.sendPing = options.sendPing;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    this.stop();
    this.timer = setInterval(() => {
      if (this.isConnected()) {
        this.sendPing();
      }
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

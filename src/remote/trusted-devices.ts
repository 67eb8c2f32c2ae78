import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger } from '@companion-remote/shared';
import type { RemoteDevice } from '@companion-remote/shared';
import { LOG_TAGS } from '../constants.js';
import type { DeviceApprovalCallback, TrustedDevice } from './types.js';

const TAG = LOG_TAGS.DEVICES;

const trustedDeviceSchema = z.object({
  peerId: z.string(),
  deviceName: z.string(),
  platform: z.string(),
  isApproved: z.boolean(),
  lastConnected: z.string(),
});

const storeFileSchema = z.object({
  devices: z.array(trustedDeviceSchema).default([]),
  lastConnectedDeviceId: z.string().nullable().default(null),
});

/**
 * Devices seen on connect, persisted to a JSON file. Read and write failures
 * are logged and leave the in-memory list as it was.
 */
export class TrustedDeviceStore {
  private devices: TrustedDevice[] = [];
  private lastDeviceId: string | null = null;
  private readonly filePath: string;
  private readonly now: () => Date;

  constructor(filePath: string, now: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.now = now;
  }

  get lastConnectedDeviceId(): string | null {
    return this.lastDeviceId;
  }

  load(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    try {
      const parsed = storeFileSchema.parse(JSON.parse(fs.readFileSync(this.filePath, 'utf-8')));
      this.devices = parsed.devices;
      this.lastDeviceId = parsed.lastConnectedDeviceId;
      logger.debug(TAG, `Loaded ${this.devices.length} trusted devices`);
    } catch (err) {
      logger.error(TAG, `Failed to load trusted devices from ${this.filePath}:`, err);
    }
  }

  list(): TrustedDevice[] {
    return this.devices.map((device) => ({ ...device }));
  }

  isTrusted(peerId: string): boolean {
    return this.devices.some((device) => device.peerId === peerId && device.isApproved);
  }

  /**
   * Record a device that just connected. Known devices are refreshed and keep
   * an earlier approval; new ones go through `approve` when approval is required.
   */
  async add(
    device: RemoteDevice,
    requireApproval: boolean,
    approve?: DeviceApprovalCallback
  ): Promise<TrustedDevice> {
    const lastConnected = this.now().toISOString();
    const existing = this.devices.find((entry) => entry.peerId === device.id);
    let record: TrustedDevice;

    if (existing) {
      record = {
        ...existing,
        deviceName: device.name,
        platform: device.platform,
        lastConnected,
        isApproved: !requireApproval || existing.isApproved,
      };
    } else {
      let approved = !requireApproval;
      if (requireApproval && approve) {
        approved = await approve(device);
      }
      record = {
        peerId: device.id,
        deviceName: device.name,
        platform: device.platform,
        isApproved: approved,
        lastConnected,
      };
    }

    this.devices = [...this.devices.filter((entry) => entry.peerId !== device.id), record];
    this.save();
    return { ...record };
  }

  approve(peerId: string): boolean {
    const device = this.devices.find((entry) => entry.peerId === peerId);
    if (!device) {
      return false;
    }
    this.devices = [
      ...this.devices.filter((entry) => entry.peerId !== peerId),
      { ...device, isApproved: true },
    ];
    this.save();
    return true;
  }

  remove(peerId: string): boolean {
    const before = this.devices.length;
    this.devices = this.devices.filter((entry) => entry.peerId !== peerId);
    if (this.devices.length === before) {
      return false;
    }
    this.save();
    return true;
  }

  setLastConnectedDevice(peerId: string): void {
    this.lastDeviceId = peerId;
    this.save();
  }

  private save(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const contents = { devices: this.devices, lastConnectedDeviceId: this.lastDeviceId };
      fs.writeFileSync(this.filePath, JSON.stringify(contents, null, 2), 'utf-8');
      logger.debug(TAG, `Saved ${this.devices.length} trusted devices`);
    } catch (err) {
      logger.error(TAG, `Failed to save trusted devices to ${this.filePath}:`, err);
    }
  }
}

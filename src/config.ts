import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import {
  DEFAULT_HOST_PORT,
  MAX_RECONNECT_ATTEMPTS,
  RECONNECT_BASE_DELAY_MS,
} from '@companion-remote/shared';
import { PLAYER } from './constants.js';

const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.companion-remote.json');
const DEFAULT_TRUSTED_DEVICES_PATH = path.join(os.homedir(), '.companion-remote-devices.json');

const portSchema = z.number().int().min(0).max(65535);

const configSchema = z.object({
  device: z
    .object({
      name: z.string().min(1).default(os.hostname()),
      platform: z.string().min(1).default(process.platform),
    })
    .default({}),
  host: z
    .object({
      port: portSchema.default(DEFAULT_HOST_PORT),
    })
    .default({}),
  remote: z
    .object({
      maxReconnectAttempts: z.number().int().min(0).default(MAX_RECONNECT_ATTEMPTS),
      reconnectBaseDelayMs: z.number().int().positive().default(RECONNECT_BASE_DELAY_MS),
    })
    .default({}),
  player: z
    .object({
      seekStepSeconds: z.number().positive().default(PLAYER.SEEK_STEP_SECONDS),
      maxVolume: z.number().int().min(1).max(PLAYER.MAX_VOLUME).default(PLAYER.MAX_VOLUME),
    })
    .default({}),
  trustedDevicesPath: z.string().min(1).default(DEFAULT_TRUSTED_DEVICES_PATH),
});

// Environment overrides
const envSchema = z.object({
  COMPANION_DEVICE_NAME: z.string().min(1).optional(),
  COMPANION_PLATFORM: z.string().min(1).optional(),
  COMPANION_PORT: z.coerce.number().pipe(portSchema).optional(),
  COMPANION_TRUSTED_DEVICES: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

export function getConfigPath(customPath?: string): string {
  return customPath || DEFAULT_CONFIG_PATH;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const filePath = getConfigPath(configPath);

  if (!fs.existsSync(filePath)) {
    throw new Error(
      `Config file not found: ${filePath}\nRun 'companion-remote --init' to create one`
    );
  }

  const raw = fs.readFileSync(filePath, 'utf-8');
  let json: unknown;

  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error(`Config file is not valid JSON: ${filePath}`);
  }

  const parsed = configSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Invalid config in ${filePath}: ${formatIssues(parsed.error)}`);
  }
  const config = parsed.data;

  const overrides = envSchema.safeParse(env);
  if (!overrides.success) {
    throw new Error(`Invalid environment override: ${formatIssues(overrides.error)}`);
  }

  const {
    COMPANION_DEVICE_NAME,
    COMPANION_PLATFORM,
    COMPANION_PORT,
    COMPANION_TRUSTED_DEVICES,
  } = overrides.data;

  if (COMPANION_DEVICE_NAME !== undefined) {
    config.device.name = COMPANION_DEVICE_NAME;
  }
  if (COMPANION_PLATFORM !== undefined) {
    config.device.platform = COMPANION_PLATFORM;
  }
  if (COMPANION_PORT !== undefined) {
    config.host.port = COMPANION_PORT;
  }
  if (COMPANION_TRUSTED_DEVICES !== undefined) {
    config.trustedDevicesPath = COMPANION_TRUSTED_DEVICES;
  }

  return config;
}

export function initConfig(configPath?: string): string {
  const filePath = getConfigPath(configPath);

  if (fs.existsSync(filePath)) {
    throw new Error(`Config file already exists: ${filePath}`);
  }

  const template = configSchema.parse({});
  fs.writeFileSync(filePath, JSON.stringify(template, null, 2), 'utf-8');
  return filePath;
}

import * as readline from 'readline/promises';
import { logger } from '@companion-remote/shared';
import type { RemoteDevice } from '@companion-remote/shared';
import { RemotePeerService, describeError } from '@companion-remote/peer';
import { loadConfig, initConfig, type Config } from './config.js';
import { CONTROL_HELP, parseControlLine } from './cli/control-line.js';
import { LOG_TAGS } from './constants.js';
import { ConsoleMediaPlayer } from './remote/console-player.js';
import { RemoteControlManager } from './remote/manager.js';
import { CommandReceiver } from './remote/receiver.js';
import { TrustedDeviceStore } from './remote/trusted-devices.js';

export { loadConfig, initConfig } from './config.js';
export type { Config } from './config.js';
export { RemoteControlManager } from './remote/manager.js';
export type { RemoteControlManagerEvents, RemoteControlManagerOptions } from './remote/manager.js';
export { CommandReceiver } from './remote/receiver.js';
export type { CommandReceiverOptions, MediaPlayer } from './remote/receiver.js';
export { ConsoleMediaPlayer } from './remote/console-player.js';
export { TrustedDeviceStore } from './remote/trusted-devices.js';
export { parseControlLine } from './cli/control-line.js';
export type { ControlLine } from './cli/control-line.js';
export type * from './remote/types.js';
export * from './constants.js';

const TAG = LOG_TAGS.CLI;

type Mode =
  | { kind: 'host' }
  | { kind: 'join'; sessionId: string; pin: string; hostAddress: string };

export async function main(args: string[]): Promise<void> {
  const configPath = getArgValue(args, '--config', '-c');

  if (args.includes('--init')) {
    try {
      const path = initConfig(configPath);
      console.log(`✅ Config file created: ${path}`);
    } catch (err) {
      console.error(`❌ ${describeError(err)}`);
      process.exit(1);
    }
    return;
  }

  if (args.includes('--help') || args.includes('-h')) {
    printHelp();
    return;
  }

  const mode = parseMode(positionalArgs(args));
  if (!mode) {
    printHelp();
    process.exit(1);
  }

  let config: Config;
  try {
    config = loadConfig(configPath);
  } catch (err) {
    console.error(`❌ ${describeError(err)}`);
    process.exit(1);
  }

  const prompt = readline.createInterface({ input: process.stdin, output: process.stdout });
  const trustedDevices = new TrustedDeviceStore(config.trustedDevicesPath);
  trustedDevices.load();

  const manager = new RemoteControlManager({
    deviceName: config.device.name,
    platform: config.device.platform,
    createPeerService: () => new RemotePeerService({ preferredPort: config.host.port }),
    trustedDevices,
    maxReconnectAttempts: config.remote.maxReconnectAttempts,
    reconnectBaseDelayMs: config.remote.reconnectBaseDelayMs,
    onDeviceApprovalRequired: async (device: RemoteDevice) => {
      const answer = await prompt.question(
        `Allow ${device.name} (${device.platform}) to control this player? [y/N] `
      );
      return answer.trim().toLowerCase().startsWith('y');
    },
  });

  let lastStatus = manager.status;
  manager.on('changed', (session) => {
    const status = session?.status ?? 'disconnected';
    if (status !== lastStatus) {
      lastStatus = status;
      const detail = session?.errorMessage ? ` (${session.errorMessage})` : '';
      logger.info(TAG, `Status: ${status}${detail}`);
    }
  });

  let stopping = false;
  const shutdown = async (code: number) => {
    if (stopping) return;
    stopping = true;
    console.log('\nShutting down...');
    prompt.close();
    await manager.dispose();
    process.exit(code);
  };
  const onSignal = () => {
    shutdown(0).catch((err) => {
      logger.error(TAG, 'Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    if (mode.kind === 'host') {
      await runHost(manager, config);
    } else {
      await manager.joinSession(mode.sessionId, mode.pin, mode.hostAddress);
      runControls(manager, prompt, onSignal);
    }
  } catch (err) {
    console.error(`❌ ${describeError(err)}`);
    await shutdown(1);
  }
}

async function runHost(manager: RemoteControlManager, config: Config): Promise<void> {
  const receiver = new CommandReceiver(new ConsoleMediaPlayer(), config.player);
  manager.on('command', (command) => {
    if (!receiver.handle(command)) {
      logger.debug(TAG, `Unhandled command: ${command.type}`);
    }
  });

  const session = await manager.createSession();
  console.log(`
📺 Hosting as ${config.device.name}
   Session ID: ${session.sessionId}
   PIN:        ${session.pin}
   Address:    ${session.address}

Join from another terminal with:
  companion-remote join ${session.sessionId} ${session.pin} ${session.address}
`);
}

function runControls(
  manager: RemoteControlManager,
  prompt: readline.Interface,
  quit: () => void
): void {
  console.log(`🎮 Connected. ${CONTROL_HELP}`);

  prompt.on('line', (line) => {
    const control = parseControlLine(line);
    switch (control.kind) {
      case 'command':
        if (!manager.isConnected) {
          console.log(`Not connected (${manager.status})`);
          return;
        }
        manager.sendCommand(control.type, control.data);
        return;
      case 'quit':
        quit();
        return;
      case 'help':
        console.log(CONTROL_HELP);
        return;
      case 'invalid':
        console.log(control.message);
        return;
      case 'empty':
        return;
    }
  });
  prompt.on('close', quit);
}

function parseMode(positional: string[]): Mode | null {
  const [command, ...rest] = positional;
  if (command === 'host' && rest.length === 0) {
    return { kind: 'host' };
  }
  if (command === 'join' && rest.length === 3) {
    const [sessionId, pin, hostAddress] = rest;
    return { kind: 'join', sessionId, pin, hostAddress };
  }
  return null;
}

function positionalArgs(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--config' || arg === '-c') {
      i++;
    } else if (!arg.startsWith('-')) {
      result.push(arg);
    }
  }
  return result;
}

function getArgValue(args: string[], longFlag: string, shortFlag: string): string | undefined {
  const longIndex = args.indexOf(longFlag);
  if (longIndex !== -1 && args[longIndex + 1]) {
    return args[longIndex + 1];
  }

  const shortIndex = args.indexOf(shortFlag);
  if (shortIndex !== -1 && args[shortIndex + 1]) {
    return args[shortIndex + 1];
  }

  return undefined;
}

function printHelp(): void {
  console.log(`
companion-remote - control a media player from another device on the LAN

Usage:
  companion-remote [options] host
  companion-remote [options] join <session-id> <pin> <address>

Options:
  --init              Create a config file template
  -c, --config PATH   Config file path (default: ~/.companion-remote.json)
  -h, --help          Show this help

Environment:
  COMPANION_DEVICE_NAME      Override device.name
  COMPANION_PLATFORM         Override device.platform
  COMPANION_PORT             Override host.port
  COMPANION_TRUSTED_DEVICES  Override trustedDevicesPath
  LOG_LEVEL                  debug | info | warn | error | silent

Examples:
  companion-remote --init
  companion-remote host
  companion-remote join ABCD1234 123456 192.168.1.20:48632
`);
}

// Run when executed directly
if (process.argv[1]?.endsWith('index.js') || process.argv[1]?.endsWith('index.ts')) {
  main(process.argv.slice(2)).catch((err) => {
    console.error(`❌ ${describeError(err)}`);
    process.exit(1);
  });
}

import { networkInterfaces, type NetworkInterfaceInfo } from 'os';
import { SOCKET_PATH } from '@companion-remote/shared';
import { RemotePeerError } from './errors.js';

export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

// Interface names that usually belong to Wi-Fi or Ethernet adapters
const PREFERRED_INTERFACE = /^(en|eth|wl)/i;

function externalIPv4(addresses: NetworkInterfaceInfo[] | undefined): string | undefined {
  return addresses?.find((addr) => addr.family === 'IPv4' && !addr.internal)?.address;
}

/**
 * Pick the LAN address a controller should dial: a Wi-Fi/Ethernet adapter
 * first, then any other non-loopback IPv4 address.
 */
export function resolveLocalIPv4(interfaces: InterfaceTable = networkInterfaces()): string {
  const names = Object.keys(interfaces);

  for (const name of names) {
    if (!PREFERRED_INTERFACE.test(name)) continue;
    const address = externalIPv4(interfaces[name]);
    if (address) return address;
  }

  for (const name of names) {
    const address = externalIPv4(interfaces[name]);
    if (address) return address;
  }

  throw new RemotePeerError('networkError', 'No network interface found');
}

export function buildSocketUrl(hostAddress: string): string {
  const scheme = /^https:\/\//i.test(hostAddress) ? 'wss' : 'ws';
  const host = hostAddress.replace(/^https?:\/\//i, '').replace(/\/+$/, '');
  return `${scheme}://${host}${SOCKET_PATH}`;
}

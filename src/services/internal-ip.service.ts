import * as os from 'os';
import { isIP } from 'net';
import { IpLookupError } from '../utils/errors';
import type { CurrentInternalIp, InternalIpRecord } from './ports/internal-ip.repository.port';

export interface InternalAddress {
  ip: string;
  interfaceName: string;
  isIpv6: boolean;
  hostname: string;
  macAddress: string | null;
  timestamp: Date;
}

export interface DeviceInfo {
  hostname: string;
  os: string;
  arch: string;
  user: string;
}

/** The host facts this module reads; swapped out in tests. */
export interface HostProbe {
  hostname(): string;
  networkInterfaces(): NodeJS.Dict<os.NetworkInterfaceInfo[]>;
  platform(): string;
  arch(): string;
  user(): string;
  now(): Date;
}

export const osProbe: HostProbe = {
  hostname: () => os.hostname(),
  networkInterfaces: () => os.networkInterfaces(),
  platform: () => os.platform(),
  arch: () => os.arch(),
  user: () => process.env.USER ?? '',
  now: () => new Date(),
};

const PREFERRED_INTERFACES = ['en0', 'eth0', 'wlan0', 'wifi'];
const EMPTY_MAC = '00:00:00:00:00:00';

export function isLinkLocal(ip: string): boolean {
  if (isIP(ip) === 4) return ip.startsWith('169.254.');
  return /^fe[89ab][0-9a-f]:/i.test(ip);
}

export function deviceInfo(probe: HostProbe = osProbe): DeviceInfo {
  return {
    hostname: probe.hostname() || 'unknown',
    os: probe.platform(),
    arch: probe.arch(),
    user: probe.user(),
  };
}

/** Every non-loopback, non-link-local address, in interface order. */
export function listInternalAddresses(probe: HostProbe = osProbe): InternalAddress[] {
  const hostname = probe.hostname() || 'unknown';
  const timestamp = probe.now();
  const addresses: InternalAddress[] = [];
  for (const [name, infos] of Object.entries(probe.networkInterfaces())) {
    for (const info of infos ?? []) {
      if (info.internal || isLinkLocal(info.address)) continue;
      addresses.push({
        ip: info.address,
        interfaceName: name,
        isIpv6: isIP(info.address) === 6,
        hostname,
        macAddress: info.mac && info.mac !== EMPTY_MAC ? info.mac : null,
        timestamp,
      });
    }
  }
  if (addresses.length === 0) {
    throw new IpLookupError('No internal IP addresses found');
  }
  return addresses;
}

export function filterByInterface(addresses: InternalAddress[], interfaceName: string): InternalAddress[] {
  const filtered = addresses.filter((a) => a.interfaceName === interfaceName);
  if (filtered.length === 0) {
    throw new IpLookupError(`No IPs found for interface ${interfaceName}`, { interface: interfaceName });
  }
  return filtered;
}

/**
 * A well-known primary interface of the requested family, else the first address of that
 * family, else the first address.
 */
export function pickPreferred(addresses: InternalAddress[], preferIpv6: boolean): InternalAddress {
  const sameFamily = addresses.filter((a) => a.isIpv6 === preferIpv6);
  const preferred = sameFamily.find((a) => PREFERRED_INTERFACES.some((name) => a.interfaceName.includes(name)));
  const chosen = preferred ?? sameFamily[0] ?? addresses[0];
  if (!chosen) {
    throw new IpLookupError('No internal IP addresses found');
  }
  return chosen;
}

function rfc3339(value: Date | string): string {
  const date = value instanceof Date ? value : new Date(value);
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function toRecord(address: InternalAddress): InternalIpRecord {
  return {
    hostname: address.hostname,
    interfaceName: address.interfaceName,
    ip: address.ip,
    isIpv6: address.isIpv6,
    macAddress: address.macAddress,
  };
}

export function addressJson(address: InternalAddress): Record<string, unknown> {
  return {
    ip: address.ip,
    interface: address.interfaceName,
    is_ipv6: address.isIpv6,
    hostname: address.hostname,
    timestamp: rfc3339(address.timestamp),
    ...(address.macAddress ? { mac_address: address.macAddress } : {}),
  };
}

export function formatAddressTable(device: DeviceInfo, addresses: InternalAddress[]): string {
  const lines = [
    `# Device: ${device.hostname} (${device.os}/${device.arch}) User: ${device.user}`,
    '# Interface\tIP Address\tIPv6\tMAC Address\tTimestamp',
    ...addresses.map((a) =>
      [a.interfaceName, a.ip, a.isIpv6 ? 'Yes' : 'No', a.macAddress ?? 'N/A', rfc3339(a.timestamp)].join('\t')
    ),
  ];
  return lines.join('\n');
}

export function formatStoredRow(row: CurrentInternalIp): string {
  const fields = [row.hostname, row.interfaceName, row.ip, rfc3339(row.firstUseAt)];
  if (row.macAddress) fields.push(row.macAddress);
  return fields.join('\t');
}

import type { NetworkInterfaceInfo } from 'os';
import {
  addressJson,
  deviceInfo,
  filterByInterface,
  formatAddressTable,
  formatStoredRow,
  HostProbe,
  isLinkLocal,
  listInternalAddresses,
  pickPreferred,
  toRecord,
} from '../../../services/internal-ip.service';
import { IpLookupError } from '../../../utils/errors';

const NOW = new Date('2025-11-04T08:30:15.123Z');

function v4(address: string, mac = '3c:22:fb:00:00:01', internal = false): NetworkInterfaceInfo {
  return { address, netmask: '255.255.255.0', family: 'IPv4', mac, internal, cidr: `${address}/24` };
}

function v6(address: string, mac = '3c:22:fb:00:00:01'): NetworkInterfaceInfo {
  return { address, netmask: 'ffff:ffff:ffff:ffff::', family: 'IPv6', mac, internal: false, cidr: `${address}/64`, scopeid: 0 };
}

function probe(interfaces: Record<string, NetworkInterfaceInfo[]>, hostname = 'workstation'): HostProbe {
  return {
    hostname: () => hostname,
    networkInterfaces: () => interfaces,
    platform: () => 'linux',
    arch: () => 'x64',
    user: () => 'ops',
    now: () => NOW,
  };
}

const host = probe({
  lo: [v4('127.0.0.1', '00:00:00:00:00:00', true)],
  docker0: [v4('172.17.0.1', '00:00:00:00:00:00')],
  eth0: [v4('192.168.1.20'), v4('169.254.10.2'), v6('fe80::1'), v6('2001:db8::20')],
});

describe('listInternalAddresses', () => {
  it('skips loopback and link-local addresses', () => {
    const addresses = listInternalAddresses(host);
    expect(addresses.map((a) => `${a.interfaceName}/${a.ip}`)).toEqual([
      'docker0/172.17.0.1',
      'eth0/192.168.1.20',
      'eth0/2001:db8::20',
    ]);
    expect(addresses[0]).toEqual({
      ip: '172.17.0.1',
      interfaceName: 'docker0',
      isIpv6: false,
      hostname: 'workstation',
      macAddress: null,
      timestamp: NOW,
    });
  });

  it('fails when nothing routable is configured', () => {
    expect(() => listInternalAddresses(probe({ lo: [v4('127.0.0.1', '00:00:00:00:00:00', true)] }))).toThrow(
      IpLookupError
    );
  });

  it('recognises link-local ranges', () => {
    expect(isLinkLocal('169.254.1.1')).toBe(true);
    expect(isLinkLocal('FEBF::1')).toBe(true);
    expect(isLinkLocal('fec0::1')).toBe(false);
    expect(isLinkLocal('10.0.0.1')).toBe(false);
  });
});

describe('choosing an address', () => {
  const addresses = listInternalAddresses(host);

  it('prefers a primary interface of the requested family', () => {
    expect(pickPreferred(addresses, false).ip).toBe('192.168.1.20');
    expect(pickPreferred(addresses, true).ip).toBe('2001:db8::20');
  });

  it('falls back to the first address when the family is missing', () => {
    expect(pickPreferred(addresses.slice(0, 1), true).ip).toBe('172.17.0.1');
  });

  it('filters by interface name', () => {
    expect(filterByInterface(addresses, 'docker0').map((a) => a.ip)).toEqual(['172.17.0.1']);
    expect(() => filterByInterface(addresses, 'wg0')).toThrow('No IPs found for interface wg0');
  });
});

describe('formatting', () => {
  const [docker, eth] = listInternalAddresses(host);

  it('renders JSON with RFC 3339 timestamps and optional MAC', () => {
    expect(addressJson(eth)).toEqual({
      ip: '192.168.1.20',
      interface: 'eth0',
      is_ipv6: false,
      hostname: 'workstation',
      timestamp: '2025-11-04T08:30:15Z',
      mac_address: '3c:22:fb:00:00:01',
    });
    expect(addressJson(docker)).not.toHaveProperty('mac_address');
  });

  it('renders the device table', () => {
    expect(formatAddressTable(deviceInfo(host), [docker, eth])).toBe(
      [
        '# Device: workstation (linux/x64) User: ops',
        '# Interface\tIP Address\tIPv6\tMAC Address\tTimestamp',
        'docker0\t172.17.0.1\tNo\tN/A\t2025-11-04T08:30:15Z',
        'eth0\t192.168.1.20\tNo\t3c:22:fb:00:00:01\t2025-11-04T08:30:15Z',
      ].join('\n')
    );
  });

  it('maps addresses to repository records', () => {
    expect(toRecord(eth)).toEqual({
      hostname: 'workstation',
      interfaceName: 'eth0',
      ip: '192.168.1.20',
      isIpv6: false,
      macAddress: '3c:22:fb:00:00:01',
    });
  });

  it('renders stored rows tab separated', () => {
    expect(
      formatStoredRow({ ...toRecord(eth), firstUseAt: '2025-11-01T00:00:00.000Z' })
    ).toBe('workstation\teth0\t192.168.1.20\t2025-11-01T00:00:00Z\t3c:22:fb:00:00:01');
    expect(formatStoredRow({ ...toRecord(docker), firstUseAt: new Date('2025-11-02T10:00:00Z') })).toBe(
      'workstation\tdocker0\t172.17.0.1\t2025-11-02T10:00:00Z'
    );
  });
});

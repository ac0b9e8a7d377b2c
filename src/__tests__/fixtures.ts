/**
 * Canned host outputs shared by resolver and facade tests
 */

import { FakeHost } from './fake-host.js';

export const NETNS = '/host/proc/1/ns/net';
export const ROUTE_COMMAND = `nsenter --net=${NETNS} ip -4 route show default`;
export const addressCommand = (iface: string): string =>
  `nsenter --net=${NETNS} ip -4 -o addr show dev ${iface} scope global`;

export const DHCP_ROUTE = 'default via 192.168.1.1 dev eth0 proto dhcp src 192.168.1.50 metric 100';
export const DHCP_ADDRESS =
  '2: eth0    inet 192.168.1.50/24 brd 192.168.1.255 scope global dynamic eth0\\       valid_lft 86000sec preferred_lft 86000sec';
export const STATIC_ADDRESS =
  '2: eth0    inet 192.168.1.60/24 brd 192.168.1.255 scope global eth0\\       valid_lft forever preferred_lft forever';

// Little-endian /proc/net/route: default via 192.168.1.1 on eth0, 192.168.1.0/24 connected
export const ROUTE_TABLE = [
  'Iface\tDestination\tGateway \tFlags\tRefCnt\tUse\tMetric\tMask\t\tMTU\tWindow\tIRTT',
  'eth0\t00000000\t0101A8C0\t0003\t0\t0\t100\t00000000\t0\t0\t0',
  'eth0\t0001A8C0\t00000000\t0001\t0\t0\t100\t00FFFFFF\t0\t0\t0',
].join('\n');

export const FIB_TRIE = [
  'Local:',
  '  +-- 127.0.0.0/8 2 0 2',
  '        |-- 127.0.0.1',
  '           /32 host LOCAL',
  '        |-- 192.168.1.50',
  '           /32 host LOCAL',
].join('\n');

/**
 * A host whose network namespace answers with a DHCP lease on eth0
 */
export function dhcpHost(): FakeHost {
  return new FakeHost()
    .command(ROUTE_COMMAND, { stdout: DHCP_ROUTE })
    .command(addressCommand('eth0'), { stdout: DHCP_ADDRESS });
}

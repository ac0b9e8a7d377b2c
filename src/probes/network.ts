/**
 * Network identity probes.
 *
 * The process usually runs behind a container bridge, so its own stack
 * only sees the bridge. These probes look at the physical host from
 * several angles: the host's network namespace, the host's kernel tables
 * under /proc, the socket layer, and finally the local interfaces.
 */

import { join } from 'path';
import type { HostEnvironment } from '../host/environment.js';
import {
  intToIPv4,
  ipv4ToInt,
  isExcludedAddress,
  prefixToSubnetMask,
  routeHexToIPv4,
  type CidrRange,
  type IPv4,
} from '../net/ipv4.js';
import type { DefaultRoute, InterfaceAddress } from '../types/network.js';
import type { Probe } from '../types/probe.js';
import { parseFibTrieLocalAddresses, parseRouteTable } from '../utils/proc-parser.js';
import { defineProbe, found, malformed, unavailable } from './probe.js';

// Route flags from linux/route.h
const RTF_UP = 0x0001;
const RTF_GATEWAY = 0x0002;

/**
 * Pick the default route with the lowest metric out of `ip -4 route show default`
 */
export function parseDefaultRoute(output: string): DefaultRoute | null {
  let best: (DefaultRoute & { metric: number }) | null = null;

  for (const line of output.split('\n')) {
    const match = /^default via (\S+) dev (\S+)(.*)$/.exec(line.trim());
    if (!match || !match[1] || !match[2]) continue;
    if (ipv4ToInt(match[1]) === null) continue;

    const rest = match[3] ?? '';
    const metricMatch = /\bmetric (\d+)/.exec(rest);
    const metric = metricMatch && metricMatch[1] ? parseInt(metricMatch[1], 10) : 0;

    if (!best || metric < best.metric) {
      best = { gateway: match[1], interfaceName: match[2], viaDhcp: /\bproto dhcp\b/.test(rest), metric };
    }
  }

  if (!best) {
    return null;
  }
  return { gateway: best.gateway, interfaceName: best.interfaceName, viaDhcp: best.viaDhcp };
}

/**
 * First global IPv4 address out of `ip -4 -o addr show dev X scope global`.
 * "dynamic" marks a DHCP lease; a lifetime of "forever" marks a static address.
 */
export function parseInterfaceAddress(output: string): InterfaceAddress | null {
  for (const line of output.split('\n')) {
    const match = /\binet (\d{1,3}(?:\.\d{1,3}){3})\/(\d{1,2})\b/.exec(line);
    if (!match || !match[1] || !match[2]) continue;

    const prefixLength = parseInt(match[2], 10);
    const subnetMask = prefixToSubnetMask(prefixLength);
    if (ipv4ToInt(match[1]) === null || subnetMask === null) continue;

    let assignment: InterfaceAddress['assignment'] = null;
    if (/\bdynamic\b/.test(line)) {
      assignment = 'DHCP';
    } else if (/\bvalid_lft forever\b/.test(line)) {
      assignment = 'STATIC';
    }

    return { address: match[1], prefixLength, subnetMask, assignment };
  }
  return null;
}

function netnsArgs(netnsPath: string, ipArgs: string[]): string[] {
  return [`--net=${netnsPath}`, 'ip', ...ipArgs];
}

/**
 * Default route as seen from the host's own network namespace
 */
export function hostDefaultRouteProbe(
  env: HostEnvironment,
  options: { netnsPath: string; timeoutMs: number }
): Probe<DefaultRoute> {
  return defineProbe({
    name: 'host-default-route',
    timeoutMs: options.timeoutMs,
    sideEffect: 'external-process-invocation',
    run: async () => {
      const result = await env.exec(
        'nsenter',
        netnsArgs(options.netnsPath, ['-4', 'route', 'show', 'default']),
        options.timeoutMs
      );
      if (result.exitCode !== 0) {
        return unavailable(`nsenter exited ${result.exitCode}: ${result.stderr}`);
      }

      const route = parseDefaultRoute(result.stdout);
      return route ? found(route) : malformed('no default route in host namespace');
    },
  });
}

/**
 * Global IPv4 address of one interface in the host's network namespace
 */
export function hostInterfaceAddressProbe(
  env: HostEnvironment,
  options: { netnsPath: string; interfaceName: string; timeoutMs: number }
): Probe<InterfaceAddress> {
  return defineProbe({
    name: 'host-interface-address',
    timeoutMs: options.timeoutMs,
    sideEffect: 'external-process-invocation',
    run: async () => {
      const result = await env.exec(
        'nsenter',
        netnsArgs(options.netnsPath, ['-4', '-o', 'addr', 'show', 'dev', options.interfaceName, 'scope', 'global']),
        options.timeoutMs
      );
      if (result.exitCode !== 0) {
        return unavailable(`nsenter exited ${result.exitCode}: ${result.stderr}`);
      }

      const address = parseInterfaceAddress(result.stdout);
      return address ? found(address) : malformed(`no global IPv4 address on ${options.interfaceName}`);
    },
  });
}

export interface RouteTableFacts {
  gateway: IPv4;
  interfaceName: string;
  subnetMask: IPv4 | null;
}

/**
 * Default gateway straight from the host's kernel route table, plus the
 * netmask of the directly connected route on the same interface
 */
export function routeTableProbe(
  env: HostEnvironment,
  options: { procNetDir: string; timeoutMs: number; byteOrder?: 'LE' | 'BE' }
): Probe<RouteTableFacts> {
  const path = join(options.procNetDir, 'route');

  return defineProbe({
    name: 'host-route-table',
    timeoutMs: options.timeoutMs,
    sideEffect: 'read-only-filesystem',
    run: async () => {
      const entries = parseRouteTable(await env.readFile(path));
      if (!entries) {
        return malformed(`${path} has no route table header`);
      }

      const defaults = entries
        .filter((entry) => entry.destination === '00000000' && (entry.flags & (RTF_UP | RTF_GATEWAY)) === (RTF_UP | RTF_GATEWAY))
        .sort((a, b) => a.metric - b.metric);

      const route = defaults[0];
      if (!route) {
        return unavailable(`no default route in ${path}`);
      }

      const gateway = routeHexToIPv4(route.gateway, options.byteOrder);
      if (!gateway) {
        return malformed(`unreadable gateway column "${route.gateway}"`);
      }

      const connected = entries.find(
        (entry) => entry.iface === route.iface && entry.destination !== '00000000' && (entry.flags & RTF_GATEWAY) === 0
      );
      const subnetMask = connected ? routeHexToIPv4(connected.mask, options.byteOrder) : null;

      return found({ gateway, interfaceName: route.iface, subnetMask });
    },
  });
}

/**
 * First local address in the host's forwarding information base that is
 * not loopback or a container bridge address
 */
export function fibTrieProbe(
  env: HostEnvironment,
  options: { procNetDir: string; excludedRanges: readonly CidrRange[]; timeoutMs: number }
): Probe<IPv4> {
  const path = join(options.procNetDir, 'fib_trie');

  return defineProbe({
    name: 'host-fib-trie',
    timeoutMs: options.timeoutMs,
    sideEffect: 'read-only-filesystem',
    run: async () => {
      const addresses = parseFibTrieLocalAddresses(await env.readFile(path));
      if (addresses.length === 0) {
        return malformed(`no local addresses in ${path}`);
      }

      const address = addresses.find((candidate) => !isExcludedAddress(candidate, options.excludedRanges));
      return address ? found(address) : unavailable('only loopback and bridge addresses are local');
    },
  });
}

/**
 * Local address the kernel would use to reach a public target.
 * A connected UDP socket sends nothing.
 */
export function outboundAddressProbe(
  env: HostEnvironment,
  options: { target: IPv4; excludedRanges: readonly CidrRange[]; timeoutMs: number }
): Probe<IPv4> {
  return defineProbe({
    name: 'outbound-socket',
    timeoutMs: options.timeoutMs,
    sideEffect: 'read-only-network',
    run: async () => {
      const address = await env.outboundAddress(options.target, 80);
      if (ipv4ToInt(address) === null) {
        return malformed(`socket reported non-IPv4 address ${address}`);
      }
      return isExcludedAddress(address, options.excludedRanges)
        ? unavailable(`outbound address ${address} is a bridge or loopback address`)
        : found(address);
    },
  });
}

export interface InterfaceFacts {
  interfaceName: string;
  address: IPv4;
  subnetMask: IPv4 | null;
}

/**
 * First usable IPv4 address of the visible interfaces, in the operator's
 * priority order, then any remaining interface in name order
 */
export function interfacePriorityProbe(
  env: HostEnvironment,
  options: { priority: readonly string[]; excludedRanges: readonly CidrRange[]; timeoutMs: number }
): Probe<InterfaceFacts> {
  return defineProbe({
    name: 'interface-priority',
    timeoutMs: options.timeoutMs,
    sideEffect: 'read-only-network',
    run: async () => {
      const interfaces = env.networkInterfaces();
      const remaining = Object.keys(interfaces)
        .filter((name) => !options.priority.includes(name))
        .sort();

      for (const name of [...options.priority, ...remaining]) {
        for (const info of interfaces[name] ?? []) {
          if (info.family !== 'IPv4' || info.internal) continue;
          if (isExcludedAddress(info.address, options.excludedRanges)) continue;

          const mask = ipv4ToInt(info.netmask);
          return found({
            interfaceName: name,
            address: info.address,
            subnetMask: mask === null ? null : intToIPv4(mask),
          });
        }
      }
      return unavailable('no interface carries a usable IPv4 address');
    },
  });
}

/**
 * Network identity type definitions
 */

import type { IPv4 } from '../net/ipv4.js';

export type AssignmentMode = 'STATIC' | 'DHCP' | 'STATIC_OVERRIDE' | 'UNKNOWN';

export interface NetworkIdentity {
  hostIp: IPv4 | null;
  containerIp: IPv4 | null;
  gateway: IPv4 | null;
  subnetMask: IPv4 | null;
  assignmentMode: AssignmentMode;
  sourceStrategy: string;
}

/**
 * What a single network strategy may report. Every field is optional;
 * the resolver merges them field by field.
 */
export interface NetworkFacts {
  hostIp: IPv4;
  containerIp: IPv4;
  gateway: IPv4;
  subnetMask: IPv4;
  assignmentMode: Exclude<AssignmentMode, 'UNKNOWN'>;
  interfaceName: string;
}

export interface DefaultRoute {
  gateway: IPv4;
  interfaceName: string;
  viaDhcp: boolean;
}

export interface InterfaceAddress {
  address: IPv4;
  prefixLength: number;
  subnetMask: IPv4;
  assignment: 'DHCP' | 'STATIC' | null;
}

export interface InterfaceCounters {
  rxBytes: number;
  txBytes: number;
  interfaces: string[];
}

/**
 * IPv4 address arithmetic shared by config validation and the network probes
 */

import { endianness } from 'os';

export type IPv4 = string;

export interface CidrRange {
  cidr: string;
  network: number;
  mask: number;
}

const DOTTED_QUAD = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

/**
 * Parse a dotted-quad address into an unsigned 32-bit integer
 */
export function ipv4ToInt(address: string): number | null {
  const match = DOTTED_QUAD.exec(address.trim());
  if (!match) {
    return null;
  }

  let value = 0;
  for (let i = 1; i <= 4; i++) {
    const octet = parseInt(match[i] ?? '', 10);
    if (isNaN(octet) || octet > 255) {
      return null;
    }
    value = value * 256 + octet;
  }
  return value;
}

export function intToIPv4(value: number): IPv4 {
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join('.');
}

export function isIPv4(address: string): boolean {
  return ipv4ToInt(address) !== null;
}

/**
 * Convert a prefix length (0-32) to a dotted subnet mask
 */
export function prefixToSubnetMask(prefix: number): IPv4 | null {
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > 32) {
    return null;
  }
  const mask = prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
  return intToIPv4(mask);
}

export function parseCidr(cidr: string): CidrRange | null {
  const [address, prefixText] = cidr.trim().split('/');
  if (address === undefined || prefixText === undefined || !/^\d{1,2}$/.test(prefixText)) {
    return null;
  }

  const base = ipv4ToInt(address);
  const prefix = parseInt(prefixText, 10);
  if (base === null || prefix > 32) {
    return null;
  }

  const mask = prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
  return { cidr, network: (base & mask) >>> 0, mask };
}

export function isInRange(address: string, range: CidrRange): boolean {
  const value = ipv4ToInt(address);
  if (value === null) {
    return false;
  }
  return ((value & range.mask) >>> 0) === range.network;
}

/**
 * True when the address falls inside any of the excluded ranges
 * (loopback and the container runtime's bridge networks by default)
 */
export function isExcludedAddress(address: string, ranges: readonly CidrRange[]): boolean {
  return ranges.some((range) => isInRange(address, range));
}

/**
 * Convert an address column of the kernel route table to dotted decimal.
 *
 * The kernel prints the in-memory (network order) address as a native
 * 32-bit integer, so the hex digits appear byte-swapped on little-endian
 * hosts. Writing the integer back in the host's byte order recovers the
 * original network-order bytes on either kind of host.
 */
export function routeHexToIPv4(hex: string, byteOrder: 'LE' | 'BE' = endianness()): IPv4 | null {
  if (!/^[0-9a-f]{8}$/i.test(hex)) {
    return null;
  }

  const buffer = Buffer.alloc(4);
  const value = parseInt(hex, 16);
  if (byteOrder === 'LE') {
    buffer.writeUInt32LE(value, 0);
  } else {
    buffer.writeUInt32BE(value, 0);
  }
  return Array.from(buffer.values()).join('.');
}

/**
 * synthctl Engine — IP Address Classification
 *
 * Normalization, family classification and public/special-use filtering
 * for candidate target addresses.
 *
 * The special-use tables follow the IANA IPv4 and IPv6 Special-Purpose
 * Address Registries, plus link-local, multicast and private space.
 */

import { BlockList, isIP } from 'node:net';
import { ConfigurationError } from '@synthctl/match-dsl';

export type AddressFamily = 'dual' | 'v4' | 'v6';

const FAMILY_SPELLINGS: Readonly<Record<string, AddressFamily>> = {
  dual: 'dual',
  ipv4: 'v4',
  v4: 'v4',
  ipv6: 'v6',
  v6: 'v6',
};

// ---------------------------------------------------------------------------
// Special-use ranges
// ---------------------------------------------------------------------------

const NON_PUBLIC_V4: ReadonlyArray<readonly [string, number]> = [
  ['0.0.0.0', 8],
  ['10.0.0.0', 8],
  ['100.64.0.0', 10],
  ['127.0.0.0', 8],
  ['169.254.0.0', 16],
  ['172.16.0.0', 12],
  ['192.0.0.0', 24],
  ['192.0.2.0', 24],
  ['192.88.99.0', 24],
  ['192.168.0.0', 16],
  ['198.18.0.0', 15],
  ['198.51.100.0', 24],
  ['203.0.113.0', 24],
  ['224.0.0.0', 4],
  ['240.0.0.0', 4],
  ['255.255.255.255', 32],
];

// IPv4-mapped addresses (::ffff:0:0/96) are classified by their embedded
// IPv4 address instead of being listed here.
const NON_PUBLIC_V6: ReadonlyArray<readonly [string, number]> = [
  ['::', 128],
  ['::1', 128],
  ['64:ff9b::', 96],
  ['64:ff9b:1::', 48],
  ['100::', 64],
  ['2001::', 23],
  ['2001:db8::', 32],
  ['2002::', 16],
  ['fc00::', 7],
  ['fe80::', 10],
  ['ff00::', 8],
];

const NON_PUBLIC = new BlockList();
for (const [network, prefix] of NON_PUBLIC_V4) {
  NON_PUBLIC.addSubnet(network, prefix, 'ipv4');
}
for (const [network, prefix] of NON_PUBLIC_V6) {
  NON_PUBLIC.addSubnet(network, prefix, 'ipv6');
}

const MAPPED_V4 = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse a configured family name.
 *
 * @throws {ConfigurationError} on an unknown spelling
 */
export function parseAddressFamily(value: string, location?: string): AddressFamily {
  const family = FAMILY_SPELLINGS[value.trim().toLowerCase()];
  if (family === undefined) {
    throw new ConfigurationError(
      `unknown address family "${value}" (expected dual, ipv4 or ipv6)`,
      location,
    );
  }
  return family;
}

/**
 * Canonical form of an address candidate, or undefined when the candidate
 * is not an IP literal.
 *
 * Trims whitespace and drops a `/prefix` suffix. IPv6 addresses lose their
 * zone index and are lower-cased and compressed.
 */
export function normalizeAddress(raw: string): string | undefined {
  let candidate = raw.trim();
  const slash = candidate.indexOf('/');
  if (slash !== -1) {
    candidate = candidate.slice(0, slash);
  }

  // A zone index (fe80::1%eth0) is only valid on IPv6 and is dropped.
  const zone = candidate.indexOf('%');
  if (zone !== -1) {
    const host = candidate.slice(0, zone);
    return isIP(host) === 6 ? compressV6(host) : undefined;
  }

  switch (isIP(candidate)) {
    case 4:
      return candidate;
    case 6:
      return compressV6(candidate);
    default:
      return undefined;
  }
}

/** Address family by syntax: a colon means IPv6. */
export function classifyAddress(ip: string): 'v4' | 'v6' {
  return ip.includes(':') ? 'v6' : 'v4';
}

/** True when a family selection admits the address. */
export function acceptsFamily(family: AddressFamily, ip: string): boolean {
  return family === 'dual' || classifyAddress(ip) === family;
}

/**
 * True when the address is globally routable: not private, loopback,
 * link-local, multicast, documentation, or any other special-use range.
 *
 * @param ip - A normalized address (see normalizeAddress)
 */
export function isPublicAddress(ip: string): boolean {
  if (classifyAddress(ip) === 'v4') {
    return !NON_PUBLIC.check(ip, 'ipv4');
  }
  const embedded = mappedV4(ip);
  if (embedded !== undefined) {
    return isPublicAddress(embedded);
  }
  return !NON_PUBLIC.check(ip, 'ipv6');
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

/** Dotted IPv4 form of an IPv4-mapped IPv6 address, e.g. ::ffff:7f00:1. */
function mappedV4(ip: string): string | undefined {
  const match = MAPPED_V4.exec(ip);
  if (match === null) {
    return undefined;
  }
  const high = parseInt(match[1] ?? '0', 16);
  const low = parseInt(match[2] ?? '0', 16);
  return [high >> 8, high & 0xff, low >> 8, low & 0xff].join('.');
}

function compressV6(ip: string): string {
  // The URL parser serializes IPv6 hosts in RFC 5952 form, writing an
  // embedded IPv4 tail as two hex groups.
  return new URL(`http://[${ip}]/`).hostname.slice(1, -1);
}

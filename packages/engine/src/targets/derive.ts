/**
 * synthctl Engine — Target Address Derivation
 *
 * Turns matched devices into an ordered, deduplicated list of target
 * addresses, reading each configured address source in a fixed order.
 */

import {
  attributePath,
  ConfigurationError,
  isMapping,
  isSequence,
  resolveAttribute,
} from '@synthctl/match-dsl';
import type { AttributePath, AttributeValue, InventoryObject } from '@synthctl/match-dsl';
import type { MatchedDevice } from '../types/inventory.js';
import { acceptsFamily, isPublicAddress, normalizeAddress } from './address.js';
import type { AddressFamily } from './address.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AddressSource = 'interface_addresses' | 'sending_ips' | 'snmp_ip';

/** Sources are always read in this order, whatever the configuration order. */
export const ADDRESS_SOURCE_ORDER: ReadonlyArray<AddressSource> = [
  'interface_addresses',
  'sending_ips',
  'snmp_ip',
];

export interface AddressSelection {
  readonly family: AddressFamily;
  readonly publicOnly: boolean;
}

export const DEFAULT_ADDRESS_SELECTION: AddressSelection = Object.freeze({
  family: 'dual',
  publicOnly: false,
});

export type AddressSources = Partial<Record<AddressSource, AddressSelection>>;

// ---------------------------------------------------------------------------
// Attribute paths
// ---------------------------------------------------------------------------

const INTERFACE_IP = [attributePath('ip_address'), attributePath('interface_ip')];
const SECONDARY_IPS = attributePath('secondary_ips');
const SENDING_IPS = attributePath('sending_ips');
const SNMP_IP = [attributePath('snmp_ip'), attributePath('device_snmp_ip')];

// ---------------------------------------------------------------------------
// Derivation
// ---------------------------------------------------------------------------

/**
 * Derive target addresses from matched devices.
 *
 * Each candidate is normalized; candidates that are not IP literals are
 * skipped. A candidate is kept when the source's family admits it and, for
 * public-only sources, when it is globally routable. The union across
 * sources keeps the first occurrence of each address.
 *
 * @throws {ConfigurationError} when no address source is configured
 */
export function deriveAddresses(
  devices: ReadonlyArray<MatchedDevice>,
  sources: AddressSources,
): string[] {
  const configured = ADDRESS_SOURCE_ORDER.filter((name) => sources[name] !== undefined);
  if (configured.length === 0) {
    throw new ConfigurationError(
      `no address source configured (expected one of ${ADDRESS_SOURCE_ORDER.join(', ')})`,
      'targets',
    );
  }

  const seen = new Set<string>();
  const addresses: string[] = [];

  for (const name of configured) {
    const selection = sources[name] ?? DEFAULT_ADDRESS_SELECTION;
    for (const matched of devices) {
      for (const raw of collectCandidates(name, matched)) {
        const ip = normalizeAddress(raw);
        if (ip === undefined || seen.has(ip)) {
          continue;
        }
        if (!acceptsFamily(selection.family, ip)) {
          continue;
        }
        if (selection.publicOnly && !isPublicAddress(ip)) {
          continue;
        }
        seen.add(ip);
        addresses.push(ip);
      }
    }
  }

  return addresses;
}

/** Raw candidate strings a source yields for one device, in attribute order. */
export function collectCandidates(source: AddressSource, matched: MatchedDevice): string[] {
  switch (source) {
    case 'interface_addresses':
      return matched.interfaces.flatMap((iface) => [
        ...addressesOf(firstPresent(iface, INTERFACE_IP)),
        ...addressesOf(resolved(iface, SECONDARY_IPS)),
      ]);
    case 'sending_ips':
      return addressesOf(resolved(matched.device, SENDING_IPS));
    case 'snmp_ip':
      return addressesOf(firstPresent(matched.device, SNMP_IP));
  }
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

function resolved(object: InventoryObject, path: AttributePath): AttributeValue {
  const result = resolveAttribute(object, path);
  return result.present ? result.value : undefined;
}

function firstPresent(object: InventoryObject, paths: ReadonlyArray<AttributePath>): AttributeValue {
  for (const path of paths) {
    const value = resolved(object, path);
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return undefined;
}

/**
 * Address strings held by an attribute value: a string, a mapping with an
 * `address` key, or a sequence of either.
 */
function addressesOf(value: AttributeValue): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (isSequence(value)) {
    return value.flatMap((entry) => (isSequence(entry) ? [] : addressesOf(entry)));
  }
  if (isMapping(value)) {
    const address = value['address'];
    return typeof address === 'string' ? [address] : [];
  }
  return [];
}

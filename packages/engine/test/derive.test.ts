/**
 * synthctl Engine — Target Address Derivation Tests
 *
 *   DRV-U1: union and deduplication keep first-seen order
 *   DRV-U2: family and public-only filtering per source
 *   DRV-U3: at least one source must be configured
 *   DRV-U4: attribute shapes and fallbacks
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@synthctl/match-dsl';
import type { InventoryObject } from '@synthctl/match-dsl';
import { collectCandidates, DEFAULT_ADDRESS_SELECTION, deriveAddresses } from '../src/index.js';
import type { MatchedDevice } from '../src/index.js';

const DUAL = DEFAULT_ADDRESS_SELECTION;

function matched(device: InventoryObject, interfaces: InventoryObject[] = []): MatchedDevice {
  return { device, interfaces };
}

// ---------------------------------------------------------------------------
// DRV-U1
// ---------------------------------------------------------------------------

describe('deriveAddresses — DRV-U1: union and dedup', () => {
  it('an address listed as primary and secondary appears once', () => {
    const devices = [
      matched({ id: 1 }, [{ ip_address: '10.0.0.1', secondary_ips: ['10.0.0.1', '10.0.0.2'] }]),
    ];
    expect(deriveAddresses(devices, { interface_addresses: DUAL })).toEqual(['10.0.0.1', '10.0.0.2']);
  });

  it('reads sources in fixed order regardless of configuration order', () => {
    const devices = [
      matched({ snmp_ip: '192.0.2.9', sending_ips: ['192.0.2.8'] }, [{ ip_address: '192.0.2.7' }]),
    ];
    const sources = { snmp_ip: DUAL, sending_ips: DUAL, interface_addresses: DUAL };
    expect(deriveAddresses(devices, sources)).toEqual(['192.0.2.7', '192.0.2.8', '192.0.2.9']);
  });

  it('walks every device within a source before the next source', () => {
    const devices = [
      matched({ snmp_ip: '192.0.2.1', sending_ips: ['192.0.2.2'] }),
      matched({ snmp_ip: '192.0.2.3', sending_ips: ['192.0.2.4'] }),
    ];
    expect(deriveAddresses(devices, { sending_ips: DUAL, snmp_ip: DUAL })).toEqual([
      '192.0.2.2',
      '192.0.2.4',
      '192.0.2.1',
      '192.0.2.3',
    ]);
  });

  it('deduplicates after normalization', () => {
    const devices = [matched({ snmp_ip: '2001:DB8::1', sending_ips: ['2001:db8:0::1/128'] })];
    expect(deriveAddresses(devices, { sending_ips: DUAL, snmp_ip: DUAL })).toEqual(['2001:db8::1']);
  });

  it('returns an empty list when nothing is found', () => {
    expect(deriveAddresses([matched({ id: 1 })], { snmp_ip: DUAL })).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// DRV-U2
// ---------------------------------------------------------------------------

describe('deriveAddresses — DRV-U2: zone-scoped interface addresses', () => {
  const devices = [
    matched({ id: 1 }, [{ ip_address: 'FE80::1%eth0', secondary_ips: ['2001:4860::1%2'] }]),
  ];

  it('keeps them without their zone index', () => {
    expect(deriveAddresses(devices, { interface_addresses: DUAL })).toEqual(['fe80::1', '2001:4860::1']);
  });

  it('drops the link-local one under public-only', () => {
    expect(
      deriveAddresses(devices, { interface_addresses: { family: 'dual', publicOnly: true } }),
    ).toEqual(['2001:4860::1']);
  });
});

describe('deriveAddresses — DRV-U2: filtering', () => {
  const device = matched({
    sending_ips: ['169.254.0.1', '224.0.0.1', '8.8.8.8', '2001:4860::1'],
  });

  it('public-only ipv4 keeps 8.8.8.8 and drops link-local and multicast', () => {
    expect(deriveAddresses([device], { sending_ips: { family: 'v4', publicOnly: true } })).toEqual([
      '8.8.8.8',
    ]);
  });

  it('v6 keeps only IPv6 addresses', () => {
    expect(deriveAddresses([device], { sending_ips: { family: 'v6', publicOnly: false } })).toEqual([
      '2001:4860::1',
    ]);
  });

  it('dual without public filtering keeps everything', () => {
    expect(deriveAddresses([device], { sending_ips: DUAL })).toHaveLength(4);
  });

  it('an address one source filters out may still come from another', () => {
    const d = matched({ snmp_ip: '10.0.0.5' }, [{ ip_address: '10.0.0.5' }]);
    const sources = {
      interface_addresses: { family: 'dual' as const, publicOnly: true },
      snmp_ip: DUAL,
    };
    expect(deriveAddresses([d], sources)).toEqual(['10.0.0.5']);
  });
});

// ---------------------------------------------------------------------------
// DRV-U3
// ---------------------------------------------------------------------------

describe('deriveAddresses — DRV-U3: sources required', () => {
  it('zero configured sources is a configuration error, not an empty result', () => {
    expect(() => deriveAddresses([matched({ snmp_ip: '192.0.2.1' })], {})).toThrow(ConfigurationError);
    expect(() => deriveAddresses([], {})).toThrow(
      'targets: no address source configured (expected one of interface_addresses, sending_ips, snmp_ip)',
    );
  });
});

// ---------------------------------------------------------------------------
// DRV-U4
// ---------------------------------------------------------------------------

describe('collectCandidates — DRV-U4: attribute shapes', () => {
  it('reads secondary addresses given as mappings', () => {
    const d = matched({}, [
      { ip_address: '10.0.0.1', secondary_ips: [{ address: '10.0.0.2', netmask: '255.255.255.0' }] },
    ]);
    expect(collectCandidates('interface_addresses', d)).toEqual(['10.0.0.1', '10.0.0.2']);
  });

  it('falls back to interface_ip when ip_address is missing or empty', () => {
    const d = matched({}, [{ ip_address: '', interface_ip: '10.0.0.3' }, { interface_ip: '10.0.0.4' }]);
    expect(collectCandidates('interface_addresses', d)).toEqual(['10.0.0.3', '10.0.0.4']);
  });

  it('falls back to device_snmp_ip', () => {
    expect(collectCandidates('snmp_ip', matched({ device_snmp_ip: '192.0.2.1' }))).toEqual(['192.0.2.1']);
  });

  it('accepts a single sending address given as a string', () => {
    expect(collectCandidates('sending_ips', matched({ sending_ips: '192.0.2.1' }))).toEqual(['192.0.2.1']);
  });

  it('skips candidates that are not IP literals', () => {
    const d = matched({ sending_ips: ['not-an-ip', '192.0.2.1', 17] });
    expect(deriveAddresses([d], { sending_ips: DUAL })).toEqual(['192.0.2.1']);
  });
});

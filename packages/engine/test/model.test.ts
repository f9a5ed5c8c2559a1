/**
 * synthctl Engine — Test Model Tests
 *
 *   MDL-U1: per-type target blocks and tasks
 *   MDL-U2: defaults
 *   MDL-U3: period and timeout updates
 *   MDL-U4: rejected constructions
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@synthctl/match-dsl';
import { buildTest, maxPeriod, setPeriod, setTimeout } from '../src/index.js';
import type { TestSpec } from '../src/index.js';

const AGENTS = ['101', '102'];

function spec(overrides: Partial<TestSpec> & Pick<TestSpec, 'type'>): TestSpec {
  return { name: 'edge-monitor', ...overrides };
}

// ---------------------------------------------------------------------------
// MDL-U1
// ---------------------------------------------------------------------------

describe('buildTest — MDL-U1: target blocks', () => {
  it('ip tests carry every target', () => {
    const test = buildTest(spec({ type: 'ip' }), ['192.0.2.1', '192.0.2.2'], AGENTS);
    expect(test.settings.ip).toEqual({ targets: ['192.0.2.1', '192.0.2.2'] });
    expect(test.settings.tasks).toEqual(['ping', 'traceroute']);
    expect(test.settings.agentIds).toEqual(AGENTS);
  });

  it('network_grid tests carry every target', () => {
    const test = buildTest(spec({ type: 'network_grid' }), ['192.0.2.1', '192.0.2.2'], AGENTS);
    expect(test.settings.networkGrid).toEqual({ targets: ['192.0.2.1', '192.0.2.2'] });
  });

  it('single-target types take the first target', () => {
    const test = buildTest(spec({ type: 'hostname' }), ['a.example.com', 'b.example.com'], AGENTS);
    expect(test.settings.hostname).toEqual({ target: 'a.example.com' });
    expect(test.settings.ip).toBeUndefined();
  });

  it('agent tests target an agent id', () => {
    const test = buildTest(spec({ type: 'agent' }), ['200'], AGENTS);
    expect(test.settings.agent).toEqual({ target: '200' });
  });

  it('mesh tests need no targets', () => {
    const test = buildTest(spec({ type: 'mesh' }), [], AGENTS);
    expect(test.type).toBe('mesh');
    expect(test.settings.ping).toBeDefined();
  });

  it('dns tests use the dns task on port 53', () => {
    const test = buildTest(spec({ type: 'dns', servers: ['192.0.2.53'] }), ['example.com'], AGENTS);
    expect(test.settings.tasks).toEqual(['dns']);
    expect(test.settings.port).toBe(53);
    expect(test.settings.servers).toEqual(['192.0.2.53']);
    expect(test.settings.dns).toEqual({ target: 'example.com' });
    expect(test.settings.ping).toBeUndefined();
  });

  it('dns_grid tests carry every target', () => {
    const test = buildTest(
      spec({ type: 'dns_grid', servers: ['192.0.2.53'] }),
      ['example.com', 'example.org'],
      AGENTS,
    );
    expect(test.settings.dnsGrid).toEqual({ targets: ['example.com', 'example.org'] });
  });

  it('url tests run http and optionally ping and traceroute', () => {
    const plain = buildTest(spec({ type: 'url' }), ['https://example.com/'], AGENTS);
    expect(plain.settings.tasks).toEqual(['http']);
    expect(plain.settings.url).toEqual({ target: 'https://example.com/' });

    const withTasks = buildTest(spec({ type: 'url', ping: true, traceroute: true }), ['https://example.com/'], AGENTS);
    expect(withTasks.settings.tasks).toEqual(['http', 'ping', 'traceroute']);
  });

  it('url tests take http options', () => {
    const test = buildTest(
      spec({ type: 'url', http: { method: 'POST', headers: { 'x-monitor': '1' }, ignoreTlsErrors: true } }),
      ['https://example.com/'],
      AGENTS,
    );
    expect(test.settings.http).toMatchObject({
      method: 'POST',
      headers: { 'x-monitor': '1' },
      body: '',
      ignoreTlsErrors: true,
    });
  });

  it('page_load tests run the page-load task', () => {
    const test = buildTest(spec({ type: 'page_load' }), ['https://example.com/'], AGENTS);
    expect(test.settings.tasks).toEqual(['page-load']);
    expect(test.settings.pageLoad).toEqual({ target: 'https://example.com/' });
    expect(test.settings.http?.method).toBe('GET');
  });
});

// ---------------------------------------------------------------------------
// MDL-U2
// ---------------------------------------------------------------------------

describe('buildTest — MDL-U2: defaults', () => {
  const test = buildTest(spec({ type: 'ip' }), ['192.0.2.1'], AGENTS);

  it('is active, undeployed and dual-stack', () => {
    expect(test.status).toBe('TEST_STATUS_ACTIVE');
    expect(test.deviceId).toBe('0');
    expect(test.settings.family).toBe('IP_FAMILY_DUAL');
  });

  it('uses a 60 s period and 5000 ms expiry', () => {
    expect(test.settings.period).toBe(60);
    expect(test.settings.expiry).toBe(5000);
  });

  it('uses the default ping and traceroute tasks', () => {
    expect(test.settings.ping).toEqual({ period: 60, count: 5, expiry: 3000 });
    expect(test.settings.trace).toEqual({
      period: 60,
      count: 3,
      protocol: 'icmp',
      port: 0,
      expiry: 22500,
      limit: 30,
    });
  });

  it('uses the default monitoring settings', () => {
    expect(test.settings.monitoringSettings).toEqual({
      activationGracePeriod: '2',
      activationTimeUnit: 'm',
      activationTimeWindow: '5',
      activationTimes: '3',
      notificationChannels: [],
    });
  });

  it('applies family, protocol, status and health overrides', () => {
    const custom = buildTest(
      spec({
        type: 'ip',
        family: 'v6',
        protocol: 'tcp',
        status: 'TEST_STATUS_PAUSED',
        healthSettings: { latencyCritical: 200 },
      }),
      ['2001:db8::1'],
      AGENTS,
    );
    expect(custom.settings.family).toBe('IP_FAMILY_V6');
    expect(custom.settings.trace?.protocol).toBe('tcp');
    expect(custom.status).toBe('TEST_STATUS_PAUSED');
    expect(custom.settings.healthSettings.latencyCritical).toBe(200);
    expect(custom.settings.healthSettings.latencyWarning).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// MDL-U3
// ---------------------------------------------------------------------------

describe('setPeriod / setTimeout / maxPeriod — MDL-U3', () => {
  const base = buildTest(spec({ type: 'ip' }), ['192.0.2.1'], AGENTS);

  it('a configured period applies to the test and its tasks', () => {
    const test = buildTest(spec({ type: 'ip', period: 120 }), ['192.0.2.1'], AGENTS);
    expect(test.settings.period).toBe(120);
    expect(test.settings.ping?.period).toBe(120);
    expect(test.settings.trace?.period).toBe(120);
  });

  it('a configured timeout is converted to milliseconds', () => {
    const test = buildTest(spec({ type: 'ip', timeout: 2.5 }), ['192.0.2.1'], AGENTS);
    expect(test.settings.expiry).toBe(2500);
    expect(test.settings.ping?.expiry).toBe(2500);
    expect(test.settings.trace?.expiry).toBe(2500);
  });

  it('named tasks change only those tasks', () => {
    const test = setPeriod(base, 30, ['ping']);
    expect(test.settings.ping?.period).toBe(30);
    expect(test.settings.trace?.period).toBe(60);
    expect(test.settings.period).toBe(60);
  });

  it('traceroute maps to the trace block', () => {
    const test = setTimeout(base, 10, ['traceroute']);
    expect(test.settings.trace?.expiry).toBe(10000);
    expect(test.settings.ping?.expiry).toBe(3000);
  });

  it('does not modify its input', () => {
    setPeriod(base, 300);
    expect(base.settings.period).toBe(60);
    expect(base.settings.ping?.period).toBe(60);
  });

  it('maxPeriod is the longest period across test and tasks', () => {
    expect(maxPeriod(base)).toBe(60);
    expect(maxPeriod(setPeriod(base, 300, ['traceroute']))).toBe(300);
  });

  it('maxPeriod of a dns test is the test period', () => {
    const dns = buildTest(spec({ type: 'dns', servers: ['192.0.2.53'], period: 90 }), ['example.com'], AGENTS);
    expect(maxPeriod(dns)).toBe(90);
  });

  it('http timeouts on url tests', () => {
    const url = buildTest(spec({ type: 'url' }), ['https://example.com/'], AGENTS);
    expect(setTimeout(url, 1, ['http']).settings.http?.expiry).toBe(1000);
  });

  it('naming a task the test does not run is a configuration error', () => {
    const dns = buildTest(spec({ type: 'dns', servers: ['192.0.2.53'] }), ['example.com'], AGENTS);
    expect(() => setPeriod(dns, 30, ['ping'])).toThrow('tasks "ping" not present in test "edge-monitor"');
    expect(() => setTimeout(dns, 1, ['ping'])).toThrow(ConfigurationError);
  });
});

// ---------------------------------------------------------------------------
// MDL-U4
// ---------------------------------------------------------------------------

describe('buildTest — MDL-U4: rejection', () => {
  it('a target-bearing type without targets is rejected', () => {
    expect(() => buildTest(spec({ type: 'ip' }), [], AGENTS)).toThrow(
      'targets: "ip" tests need at least one target',
    );
  });

  it('a dns test without servers is rejected', () => {
    expect(() => buildTest(spec({ type: 'dns' }), ['example.com'], AGENTS)).toThrow(
      'test.servers: "dns" tests need at least one DNS server',
    );
  });
});

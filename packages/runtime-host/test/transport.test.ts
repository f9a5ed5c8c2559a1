/**
 * synthctl Runtime Host — Synthetics Transport Tests
 *
 *   TR-U1: operations map to method, path and response key
 *   TR-U2: argument errors are raised before any request is made
 *   TR-U3: non-success statuses raise ApiRequestError
 *
 * HTTP is answered in process by FakeApi.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ApiRequestError, UnexpectedResponseError } from '../src/api/errors.js';
import { createHttpClient } from '../src/api/http-client.js';
import { OPERATIONS, SynthHttpTransport } from '../src/api/transport.js';
import { FakeApi } from './fake-api.js';

const TESTS = '/synthetics/v202101beta1/tests';
const AGENTS = '/synthetics/v202101beta1/agents';

let api: FakeApi;
let transport: SynthHttpTransport;

beforeEach(() => {
  api = new FakeApi();
  transport = new SynthHttpTransport(
    createHttpClient(
      { email: 'ops@example.com', token: 'test-secret' },
      { baseURL: 'https://synthetics.example.com', adapter: api.adapter },
    ),
  );
});

// ---------------------------------------------------------------------------
// TR-U1
// ---------------------------------------------------------------------------

describe('SynthHttpTransport — TR-U1: operations', () => {
  it('lists agents and returns the response key', async () => {
    api.on('get', AGENTS, { status: 200, data: { agents: [{ id: '101' }] } });
    expect(await transport.request('AgentsList')).toEqual([{ id: '101' }]);
    expect(api.requests[0]).toMatchObject({ method: 'GET', url: AGENTS, data: undefined });
  });

  it('fills path parameters', async () => {
    api.on('get', `${TESTS}/42`, { status: 200, data: { test: { id: '42' } } });
    expect(await transport.request('TestGet', { params: { id: '42' } })).toEqual({ id: '42' });
  });

  it('encodes path parameters', async () => {
    api.on('delete', `${TESTS}/a%2Fb`, { status: 200, data: {} });
    await transport.request('TestDelete', { params: { id: 'a/b' } });
    expect(api.requests[0]?.url).toBe(`${TESTS}/a%2Fb`);
  });

  it('sends the body as given and accepts 201', async () => {
    api.on('post', TESTS, { status: 201, data: { test: { id: '9001' } } });
    const created = await transport.request('TestCreate', { body: { test: { name: 'edge-monitor' } } });
    expect(created).toEqual({ id: '9001' });
    expect(api.requests[0]?.data).toEqual({ test: { name: 'edge-monitor' } });
  });

  it('returns undefined for operations without a response key', async () => {
    api.on('put', `${TESTS}/42/status`, { status: 200, data: {} });
    const body = { id: '42', status: 'TEST_STATUS_PAUSED' };
    expect(await transport.request('TestStatusUpdate', { params: { id: '42' }, body })).toBeUndefined();
    expect(api.requests[0]).toMatchObject({ method: 'PUT', data: body });
  });

  it('authenticates every request', async () => {
    api.on('get', AGENTS, { status: 200, data: { agents: [] } });
    await transport.request('AgentsList');
    expect(api.requests[0]).toMatchObject({ email: 'ops@example.com', token: 'test-secret' });
  });

  it('covers the agent and test operations', () => {
    expect(Object.keys(OPERATIONS)).toEqual([
      'AgentsList',
      'AgentGet',
      'AgentPatch',
      'AgentDelete',
      'TestsList',
      'TestGet',
      'TestCreate',
      'TestDelete',
      'TestPatch',
      'TestStatusUpdate',
    ]);
  });
});

// ---------------------------------------------------------------------------
// TR-U2
// ---------------------------------------------------------------------------

describe('SynthHttpTransport — TR-U2: argument errors', () => {
  it('rejects an unknown operation', async () => {
    await expect(transport.request('TestRename')).rejects.toThrow("Invalid operation 'TestRename'");
  });

  it('rejects a missing path parameter', async () => {
    await expect(transport.request('TestGet')).rejects.toThrow(
      "Missing required parameter 'id' for operation 'TestGet'",
    );
  });

  it('rejects a missing body', async () => {
    await expect(transport.request('AgentPatch', { params: { id: '101' } })).rejects.toThrow(
      "'body' is required for 'AgentPatch'",
    );
  });

  it('makes no request when arguments are wrong', async () => {
    await transport.request('TestCreate').catch((err: unknown) => err);
    expect(api.requests).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// TR-U3
// ---------------------------------------------------------------------------

describe('SynthHttpTransport — TR-U3: failures', () => {
  it('raises ApiRequestError with status and body', async () => {
    const error = await transport.request('TestGet', { params: { id: '7' } }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ApiRequestError);
    expect(error).toMatchObject({
      status: 404,
      operation: 'TestGet',
      message: 'GET failed - status: 404 error: {"error":"not found"}',
      body: { error: 'not found' },
    });
  });

  it('describes an empty error body', async () => {
    api.on('delete', `${TESTS}/7`, { status: 500, data: '' });
    await expect(transport.request('TestDelete', { params: { id: '7' } })).rejects.toThrow(
      'DELETE failed - status: 500 error: (empty)',
    );
  });

  it('rejects a success response without the expected key', async () => {
    api.on('get', `${TESTS}/7`, { status: 200, data: { tests: [] } });
    const error = await transport.request('TestGet', { params: { id: '7' } }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(UnexpectedResponseError);
    expect(error).toMatchObject({ message: 'TestGet: response has no "test"' });
  });
});

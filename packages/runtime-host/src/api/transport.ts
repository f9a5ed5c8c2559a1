/**
 * synthctl Runtime Host — Synthetics HTTP Transport
 *
 * A table-driven transport for the synthetics API. Each named operation
 * maps to an endpoint, an HTTP method, an optional path-parameter
 * template, the request envelope it requires and the response key it
 * returns.
 *
 *   transport.request('TestGet', { params: { id: '42' } })
 *     → GET /synthetics/v202101beta1/tests/42 → response.test
 *
 * Request bodies are sent as given; `body` in the table names the
 * envelope the caller builds (e.g. `{ test: {...} }`) and marks the body
 * as required.
 */

import type { AxiosInstance } from 'axios';
import { isMapping } from '@synthctl/match-dsl';
import { successBody } from './http-client.js';
import { UnexpectedResponseError } from './errors.js';

// ---------------------------------------------------------------------------
// Operation table
// ---------------------------------------------------------------------------

export const ENDPOINTS = {
  agents: '/synthetics/v202101beta1/agents',
  tests: '/synthetics/v202101beta1/tests',
} as const;

export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

export interface Operation {
  readonly endpoint: keyof typeof ENDPOINTS;
  readonly method: HttpMethod;
  /** Appended to the endpoint, `{name}` placeholders filled from params. */
  readonly params?: string;
  readonly body?: string;
  readonly response?: string;
}

export const OPERATIONS = {
  AgentsList: { endpoint: 'agents', method: 'get', response: 'agents' },
  AgentGet: { endpoint: 'agents', method: 'get', params: '{id}', response: 'agent' },
  AgentPatch: { endpoint: 'agents', method: 'patch', params: '{id}', body: 'agent', response: 'agent' },
  AgentDelete: { endpoint: 'agents', method: 'delete', params: '{id}' },
  TestsList: { endpoint: 'tests', method: 'get', response: 'tests' },
  TestGet: { endpoint: 'tests', method: 'get', params: '{id}', response: 'test' },
  TestCreate: { endpoint: 'tests', method: 'post', body: 'test', response: 'test' },
  TestDelete: { endpoint: 'tests', method: 'delete', params: '{id}' },
  TestPatch: { endpoint: 'tests', method: 'patch', params: '{id}', body: 'test', response: 'test' },
  TestStatusUpdate: { endpoint: 'tests', method: 'put', params: '{id}/status', body: 'test_status' },
} as const satisfies Record<string, Operation>;

export type OperationName = keyof typeof OPERATIONS;

export interface RequestArgs {
  readonly params?: Readonly<Record<string, string>> | undefined;
  readonly body?: unknown;
}

/** Anything that can carry a synthetics API operation. */
export interface SynthTransport {
  request(operation: string, args?: RequestArgs): Promise<unknown>;
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export class SynthHttpTransport implements SynthTransport {
  constructor(private readonly http: AxiosInstance) {}

  /**
   * Perform an operation and return its response value (undefined for
   * operations without one).
   *
   * @throws {Error} for an unknown operation, a missing path parameter or
   *   a missing required body
   * @throws {ApiRequestError} when the API answers with a non-success status
   */
  async request(operation: string, args: RequestArgs = {}): Promise<unknown> {
    if (!isOperationName(operation)) {
      throw new Error(`Invalid operation '${operation}'`);
    }
    const op: Operation = OPERATIONS[operation];

    let url: string = ENDPOINTS[op.endpoint];
    if (op.params !== undefined) {
      url = `${url}/${fillParams(op.params, args.params ?? {}, operation)}`;
    }
    if (op.body !== undefined && args.body === undefined) {
      throw new Error(`'body' is required for '${operation}'`);
    }

    const response = await this.http.request<unknown>({
      method: op.method,
      url,
      data: op.body === undefined ? undefined : args.body,
    });
    const payload = successBody(response, operation);

    if (op.response === undefined) {
      return undefined;
    }
    if (!isMapping(payload) || !(op.response in payload)) {
      throw new UnexpectedResponseError(operation, `response has no "${op.response}"`);
    }
    return payload[op.response];
  }
}

export function isOperationName(name: string): name is OperationName {
  return Object.prototype.hasOwnProperty.call(OPERATIONS, name);
}

function fillParams(template: string, params: Readonly<Record<string, string>>, operation: string): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new Error(`Missing required parameter '${name}' for operation '${operation}'`);
    }
    return encodeURIComponent(value);
  });
}

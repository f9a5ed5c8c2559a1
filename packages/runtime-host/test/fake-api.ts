/**
 * synthctl Runtime Host — In-process API stand-in
 *
 * An axios adapter that answers from a route table and records every
 * request, so clients are exercised without a network.
 */

import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  readonly method: string;
  readonly baseURL: string | undefined;
  readonly url: string;
  readonly data: unknown;
  readonly email: string;
  readonly token: string;
}

export interface FakeReply {
  readonly status: number;
  readonly data?: unknown;
}

export class FakeApi {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, FakeReply>();

  /** Answer `METHOD url` with the given reply. */
  on(method: string, url: string, reply: FakeReply): this {
    this.routes.set(`${method.toUpperCase()} ${url}`, reply);
    return this;
  }

  readonly adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const method = (config.method ?? 'get').toUpperCase();
    const url = config.url ?? '';
    this.requests.push({
      method,
      baseURL: config.baseURL,
      url,
      data: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      email: String(config.headers.get('X-CH-Auth-Email')),
      token: String(config.headers.get('X-CH-Auth-API-Token')),
    });
    const reply = this.routes.get(`${method} ${url}`) ?? { status: 404, data: { error: 'not found' } };
    return {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
  };
}

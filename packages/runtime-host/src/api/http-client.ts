/**
 * synthctl Runtime Host — HTTP Client Factory
 *
 * Creates the axios instances the API clients share: authentication
 * headers, JSON content type and a default timeout. Status codes are
 * checked by the callers, so axios never rejects on status.
 */

import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { ApiRequestError } from './errors.js';

export const HTTP_TIMEOUT_MS = 30000;

export const HTTP_SUCCESS_CODES: ReadonlySet<number> = new Set([200, 201]);

export interface ApiCredentials {
  readonly email: string;
  readonly token: string;
}

export interface HttpClientOptions {
  readonly baseURL: string;
  readonly timeout?: number | undefined;
  /** Replaces the network adapter; tests answer requests in process. */
  readonly adapter?: AxiosAdapter | undefined;
}

export function createHttpClient(credentials: ApiCredentials, options: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeout ?? HTTP_TIMEOUT_MS,
    headers: {
      'Content-Type': 'application/json',
      'X-CH-Auth-Email': credentials.email,
      'X-CH-Auth-API-Token': credentials.token,
    },
    validateStatus: () => true,
    ...(options.adapter === undefined ? {} : { adapter: options.adapter }),
  });
}

/**
 * Return the response body of a successful response.
 *
 * @throws {ApiRequestError} for any status outside HTTP_SUCCESS_CODES
 */
export function successBody(response: AxiosResponse<unknown>, operation: string): unknown {
  if (!HTTP_SUCCESS_CODES.has(response.status)) {
    const method = (response.config.method ?? 'get').toUpperCase();
    throw new ApiRequestError(
      response.status,
      operation,
      `${method} failed - status: ${response.status} error: ${describeBody(response.data)}`,
      response.data,
    );
  }
  return response.data;
}

function describeBody(data: unknown): string {
  if (data === undefined || data === null || data === '') return '(empty)';
  return typeof data === 'string' ? data : JSON.stringify(data);
}

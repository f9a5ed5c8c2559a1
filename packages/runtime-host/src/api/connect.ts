/**
 * synthctl Runtime Host — Client Wiring
 *
 * Builds the API clients for a resolved profile.
 */

import type { AxiosAdapter } from 'axios';
import type { ResolvedProfile } from '../config/profile.js';
import { createHttpClient } from './http-client.js';
import { DeviceInventoryClient } from './inventory-client.js';
import { ApiInventorySource } from './inventory-source.js';
import { SynthClient } from './synth-client.js';
import { SynthHttpTransport } from './transport.js';

export interface ApiClients {
  readonly synth: SynthClient;
  readonly inventory: DeviceInventoryClient;
  readonly source: ApiInventorySource;
}

export interface ConnectOptions {
  readonly timeout?: number | undefined;
  readonly adapter?: AxiosAdapter | undefined;
}

export function connect(profile: ResolvedProfile, options: ConnectOptions = {}): ApiClients {
  const credentials = { email: profile.email, token: profile.token };
  const synth = new SynthClient(
    new SynthHttpTransport(createHttpClient(credentials, { ...options, baseURL: profile.apiUrl })),
  );
  const inventory = new DeviceInventoryClient(
    createHttpClient(credentials, { ...options, baseURL: profile.inventoryUrl }),
  );
  return { synth, inventory, source: new ApiInventorySource(inventory, synth) };
}

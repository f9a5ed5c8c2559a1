/**
 * synthctl Runtime Host — Device Inventory Client
 *
 * Reads devices and their interfaces from the device inventory API:
 *
 *   GET /devices                   → { devices: [...] }
 *   GET /device/{id}/interfaces    → [...]
 *
 * Records are returned as inventory objects for rule matching.
 */

import { isInventoryObject, isMapping } from '@synthctl/match-dsl';
import type { InventoryObject } from '@synthctl/match-dsl';
import type { AxiosInstance } from 'axios';
import { UnexpectedResponseError } from './errors.js';
import { successBody } from './http-client.js';

export class DeviceInventoryClient {
  constructor(private readonly http: AxiosInstance) {}

  async listDevices(): Promise<InventoryObject[]> {
    const operation = 'DevicesList';
    const body = successBody(await this.http.get<unknown>('/devices'), operation);
    const devices = isMapping(body) ? body['devices'] : undefined;
    if (!Array.isArray(devices)) {
      throw new UnexpectedResponseError(operation, 'response has no "devices" list');
    }
    return devices.filter(isInventoryObject);
  }

  async listInterfaces(deviceId: string): Promise<InventoryObject[]> {
    const operation = 'InterfacesList';
    const path = `/device/${encodeURIComponent(deviceId)}/interfaces`;
    const body = successBody(await this.http.get<unknown>(path), operation);
    if (!Array.isArray(body)) {
      throw new UnexpectedResponseError(operation, `expected a list of interfaces for device ${deviceId}`);
    }
    return body.filter(isInventoryObject);
  }
}

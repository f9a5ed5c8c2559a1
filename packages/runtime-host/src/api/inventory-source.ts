/**
 * synthctl Runtime Host — API-backed Inventory Source
 *
 * Adapts the device inventory and synthetics clients to the engine's
 * InventorySource. Each collection is fetched at most once per source,
 * so a plan and its preview share one round of requests. A failed fetch
 * is not kept: the next call asks again.
 */

import type { InventoryObject } from '@synthctl/match-dsl';
import type { InventorySource } from '@synthctl/engine';
import type { DeviceInventoryClient } from './inventory-client.js';
import type { SynthClient } from './synth-client.js';

export class ApiInventorySource implements InventorySource {
  private devices: Promise<InventoryObject[]> | undefined;
  private agents: Promise<InventoryObject[]> | undefined;
  private readonly interfaces = new Map<string, Promise<InventoryObject[]>>();

  constructor(
    private readonly inventory: DeviceInventoryClient,
    private readonly synth: SynthClient,
  ) {}

  listDevices(): Promise<ReadonlyArray<InventoryObject>> {
    this.devices ??= this.inventory.listDevices().catch((err: unknown) => {
      this.devices = undefined;
      throw err;
    });
    return this.devices;
  }

  listInterfaces(deviceId: string): Promise<ReadonlyArray<InventoryObject>> {
    let pending = this.interfaces.get(deviceId);
    if (pending === undefined) {
      pending = this.inventory.listInterfaces(deviceId).catch((err: unknown) => {
        this.interfaces.delete(deviceId);
        throw err;
      });
      this.interfaces.set(deviceId, pending);
    }
    return pending;
  }

  listAgents(): Promise<ReadonlyArray<InventoryObject>> {
    this.agents ??= this.synth.listAgents().catch((err: unknown) => {
      this.agents = undefined;
      throw err;
    });
    return this.agents;
  }
}

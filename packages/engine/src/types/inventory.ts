/**
 * synthctl Engine — Inventory Types
 *
 * The engine reads inventory objects but never fetches them. Fetching is
 * the job of an InventorySource supplied by the caller (the API client in
 * runtime-host, or an in-memory fake in tests).
 */

import type { InventoryObject } from '@synthctl/match-dsl';

/**
 * A matched device together with its interfaces.
 *
 * Interfaces are fetched only for devices that survived rule matching, and
 * only when interface addresses are a configured target source. In every
 * other case `interfaces` is empty.
 */
export interface MatchedDevice {
  readonly device: InventoryObject;
  readonly interfaces: ReadonlyArray<InventoryObject>;
}

/**
 * Supplier of inventory collections.
 *
 * Each call returns a complete, materialized collection. The engine never
 * evaluates a partial collection: one-of-each selection and limits need
 * every candidate to be visible.
 */
export interface InventorySource {
  listDevices(): Promise<ReadonlyArray<InventoryObject>>;
  listInterfaces(deviceId: string): Promise<ReadonlyArray<InventoryObject>>;
  listAgents(): Promise<ReadonlyArray<InventoryObject>>;
}

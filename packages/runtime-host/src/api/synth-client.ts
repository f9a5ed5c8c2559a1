/**
 * synthctl Runtime Host — Synthetics API Client
 *
 * Typed operations over a SynthTransport. Agents come back as inventory
 * objects, ready for rule matching; tests are validated into RemoteTest.
 */

import { isInventoryObject } from '@synthctl/match-dsl';
import type { InventoryObject } from '@synthctl/match-dsl';
import type { RemoteTest, SynTest, TestStatus } from '@synthctl/engine';
import { UnexpectedResponseError } from './errors.js';
import { parseRemoteTest } from './schemas.js';
import type { SynthTransport } from './transport.js';

export class SynthClient {
  constructor(private readonly transport: SynthTransport) {}

  async listAgents(): Promise<InventoryObject[]> {
    return inventoryList(await this.transport.request('AgentsList'), 'AgentsList');
  }

  async getAgent(id: string): Promise<InventoryObject> {
    const agent = await this.transport.request('AgentGet', { params: { id } });
    if (!isInventoryObject(agent)) {
      throw new UnexpectedResponseError('AgentGet', 'agent is not an object');
    }
    return agent;
  }

  async listTests(): Promise<RemoteTest[]> {
    const tests = await this.transport.request('TestsList');
    if (!Array.isArray(tests)) {
      throw new UnexpectedResponseError('TestsList', 'tests is not a list');
    }
    return tests.map((test: unknown) => parseRemoteTest(test, 'TestsList'));
  }

  async getTest(id: string): Promise<RemoteTest> {
    return parseRemoteTest(await this.transport.request('TestGet', { params: { id } }), 'TestGet');
  }

  /** Submit a new test; the returned test carries its assigned id. */
  async createTest(test: SynTest): Promise<RemoteTest> {
    return parseRemoteTest(await this.transport.request('TestCreate', { body: { test } }), 'TestCreate');
  }

  async deleteTest(id: string): Promise<void> {
    await this.transport.request('TestDelete', { params: { id } });
  }

  async setTestStatus(id: string, status: TestStatus): Promise<void> {
    await this.transport.request('TestStatusUpdate', { params: { id }, body: { id, status } });
  }
}

function inventoryList(value: unknown, operation: string): InventoryObject[] {
  if (!Array.isArray(value)) {
    throw new UnexpectedResponseError(operation, 'expected a list');
  }
  return value.filter(isInventoryObject);
}

/**
 * @module oauth/proxy/registry
 * @description Storage of registered proxy clients.
 */

import type { ProxyClientRecord } from './types';

/**
 * table of proxy clients keyed by their temporary identifier
 * implementations must hand out copies so callers never hold a live record
 */
export interface ProxyClientRegistry {
  /** finds a client by its temporary identifier */
  find(clientId: string): ProxyClientRecord | undefined;
  /** inserts or replaces a client */
  upsert(record: ProxyClientRecord): void;
  /** removes a client, returning whether it existed */
  remove(clientId: string): boolean;
  /** lists every client */
  list(): ProxyClientRecord[];
}

/**
 * in-process registry; proxy clients do not survive a restart
 */
export class MemoryProxyClientRegistry implements ProxyClientRegistry {
  #clients = new Map<string, ProxyClientRecord>();

  public find(clientId: string): ProxyClientRecord | undefined {
    const record = this.#clients.get(clientId);

    return record && structuredClone(record);
  }

  public upsert(record: ProxyClientRecord): void {
    this.#clients.set(record.clientId, structuredClone(record));
  }

  public remove(clientId: string): boolean {
    return this.#clients.delete(clientId);
  }

  public list(): ProxyClientRecord[] {
    return [...this.#clients.values()].map((record) => structuredClone(record));
  }
}

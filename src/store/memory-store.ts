/**
 * In-process entity store.
 *
 * @packageDocumentation
 */

import { ConflictError, NotFoundError } from '../errors.js';
import type { EntityStore, Versioned } from './types.js';

/**
 * Entity store backed by a Map.
 *
 * The version check and the write happen in one synchronous step, so a
 * read-modify-write per key is atomic within the process. Values are deep
 * copied on the way in and out; callers never share references with the
 * stored record.
 */
export class InMemoryEntityStore<T> implements EntityStore<T> {
  private readonly records = new Map<string, Versioned<T>>();

  load(id: string): Promise<Versioned<T>> {
    const record = this.records.get(id);
    if (record === undefined) {
      return Promise.reject(new NotFoundError(id));
    }
    return Promise.resolve({ value: structuredClone(record.value), version: record.version });
  }

  save(id: string, value: T, expectedVersion: number): Promise<number> {
    const current = this.records.get(id);
    const actualVersion = current?.version ?? 0;
    if (actualVersion !== expectedVersion) {
      return Promise.reject(new ConflictError(id, expectedVersion, actualVersion));
    }
    const version = actualVersion + 1;
    this.records.set(id, { value: structuredClone(value), version });
    return Promise.resolve(version);
  }

  list(): Promise<string[]> {
    return Promise.resolve([...this.records.keys()].sort());
  }
}

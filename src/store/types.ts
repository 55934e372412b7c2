/**
 * Entity store contract.
 *
 * Sessions and pipeline runs are each a single versioned record keyed by id.
 * Writers name the version they loaded; a save against a version that has
 * since advanced fails with a ConflictError.
 *
 * @packageDocumentation
 */

/**
 * A stored value together with its version.
 */
export interface Versioned<T> {
  /** The stored entity. */
  readonly value: T;
  /** Monotonic version, starting at 1 for a freshly created record. */
  readonly version: number;
}

/**
 * Version to pass to {@link EntityStore.save} when creating a new record.
 */
export const NEW_RECORD_VERSION = 0;

/**
 * Keyed store with optimistic concurrency.
 *
 * @typeParam T - The entity type.
 */
export interface EntityStore<T> {
  /**
   * Loads the record stored under `id`.
   *
   * @throws NotFoundError if nothing is stored under the id.
   */
  load(id: string): Promise<Versioned<T>>;

  /**
   * Replaces the record stored under `id`.
   *
   * @param expectedVersion - The version the caller loaded, or
   *   {@link NEW_RECORD_VERSION} to create.
   * @returns The new version.
   * @throws ConflictError if the stored version differs from `expectedVersion`.
   */
  save(id: string, value: T, expectedVersion: number): Promise<number>;

  /** Lists the ids currently stored. */
  list(): Promise<string[]>;
}

/**
 * JSON-file entity store.
 *
 * Each entity lives in `<directory>/<id>.json` as `{ version, savedAt, value }`.
 * Writes go through a temp file and an atomic rename so a crash never leaves a
 * half-written record behind.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { ConflictError, NotFoundError, VoicecraftError } from '../errors.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import {
  isNotFoundError,
  safeMkdir,
  safeReadFile,
  safeReaddir,
  safeWriteFileAtomic,
} from '../utils/safe-fs.js';
import type { EntityStore, Versioned } from './types.js';

/**
 * Validates a decoded record value, throwing if it has the wrong shape.
 */
export type RecordParser<T> = (raw: unknown) => T;

/**
 * Options for a FileEntityStore.
 */
export interface FileEntityStoreOptions<T> {
  /** Directory holding one JSON file per entity. */
  readonly directory: string;
  /** Shape check applied to every loaded value. */
  readonly parse: RecordParser<T>;
}

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;

interface StoredRecord {
  version: number;
  savedAt: string;
  value: unknown;
}

function isStoredRecord(raw: unknown): raw is StoredRecord {
  if (typeof raw !== 'object' || raw === null) {
    return false;
  }
  return (
    'version' in raw &&
    typeof raw.version === 'number' &&
    Number.isInteger(raw.version) &&
    raw.version > 0 &&
    'savedAt' in raw &&
    typeof raw.savedAt === 'string' &&
    'value' in raw
  );
}

/**
 * Entity store persisting each record as a versioned JSON file.
 *
 * Version check and write are serialized per id inside this process, which
 * gives atomic read-modify-write per key for a single writer process.
 */
export class FileEntityStore<T> implements EntityStore<T> {
  private readonly directory: string;
  private readonly parse: RecordParser<T>;
  private readonly mutex = new KeyedMutex();

  constructor(options: FileEntityStoreOptions<T>) {
    this.directory = options.directory;
    this.parse = options.parse;
  }

  async load(id: string): Promise<Versioned<T>> {
    const record = await this.readRecord(id);
    if (record === undefined) {
      throw new NotFoundError(id);
    }
    return { value: this.parse(record.value), version: record.version };
  }

  async save(id: string, value: T, expectedVersion: number): Promise<number> {
    return this.mutex.runExclusive(id, async () => {
      const current = await this.readRecord(id);
      const actualVersion = current?.version ?? 0;
      if (actualVersion !== expectedVersion) {
        throw new ConflictError(id, expectedVersion, actualVersion);
      }

      const version = actualVersion + 1;
      const record: StoredRecord = { version, savedAt: new Date().toISOString(), value };
      await safeMkdir(this.directory);
      await safeWriteFileAtomic(
        this.pathFor(id),
        JSON.stringify(record, null, 2) + '\n',
        randomUUID()
      );
      return version;
    });
  }

  async list(): Promise<string[]> {
    const entries = await safeReaddir(this.directory);
    return entries
      .filter((name) => name.endsWith('.json') && !name.startsWith('.'))
      .map((name) => name.slice(0, -'.json'.length))
      .sort();
  }

  private pathFor(id: string): string {
    if (!ID_PATTERN.test(id)) {
      throw new VoicecraftError(
        `Invalid record id '${id}': only letters, digits, '_' and '-' are allowed`,
        'INVALID_INPUT',
        { entityId: id }
      );
    }
    return join(this.directory, `${id}.json`);
  }

  private async readRecord(id: string): Promise<StoredRecord | undefined> {
    const filePath = this.pathFor(id);
    let content: string;
    try {
      content = await safeReadFile(filePath);
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new VoicecraftError(`Record '${id}' is not valid JSON`, 'SCHEMA_VIOLATION', {
        entityId: id,
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (!isStoredRecord(raw)) {
      throw new VoicecraftError(
        `Record '${id}' is missing its version envelope`,
        'SCHEMA_VIOLATION',
        { entityId: id }
      );
    }
    return raw;
  }
}

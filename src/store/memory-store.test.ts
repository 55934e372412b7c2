import { describe, expect, it } from 'vitest';
import { ConflictError, NotFoundError } from '../errors.js';
import { InMemoryEntityStore } from './memory-store.js';
import { NEW_RECORD_VERSION } from './types.js';

interface Note {
  text: string;
  tags: string[];
}

describe('InMemoryEntityStore', () => {
  it('should create with version 0 and bump the version on every save', async () => {
    const store = new InMemoryEntityStore<Note>();

    expect(await store.save('n1', { text: 'a', tags: [] }, NEW_RECORD_VERSION)).toBe(1);
    expect(await store.save('n1', { text: 'b', tags: [] }, 1)).toBe(2);
    expect(await store.load('n1')).toEqual({ value: { text: 'b', tags: [] }, version: 2 });
  });

  it('should reject a stale expected version and keep the stored value', async () => {
    const store = new InMemoryEntityStore<Note>();
    await store.save('n1', { text: 'a', tags: [] }, 0);

    const error = await store.save('n1', { text: 'stale', tags: [] }, 0).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ expectedVersion: 0, actualVersion: 1, entityId: 'n1' });
    expect((await store.load('n1')).value.text).toBe('a');
  });

  it('should reject creating an id that already exists', async () => {
    const store = new InMemoryEntityStore<Note>();
    await store.save('n1', { text: 'a', tags: [] }, 0);

    await expect(store.save('n1', { text: 'again', tags: [] }, 0)).rejects.toBeInstanceOf(ConflictError);
  });

  it('should report missing ids as not found', async () => {
    await expect(new InMemoryEntityStore<Note>().load('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should not share references with callers', async () => {
    const store = new InMemoryEntityStore<Note>();
    const note = { text: 'a', tags: ['x'] };
    await store.save('n1', note, 0);

    note.tags.push('mutated');
    const loaded = (await store.load('n1')).value;
    loaded.tags.push('also mutated');

    expect((await store.load('n1')).value.tags).toEqual(['x']);
  });

  it('should list ids in order', async () => {
    const store = new InMemoryEntityStore<Note>();
    await store.save('b', { text: 'b', tags: [] }, 0);
    await store.save('a', { text: 'a', tags: [] }, 0);

    expect(await store.list()).toEqual(['a', 'b']);
  });
});

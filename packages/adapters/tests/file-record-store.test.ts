import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { FileRecordStore } from '../src/index';

describe('FileRecordStore', () => {
  let directory: string;
  let store: FileRecordStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'helix-records-'));
    store = new FileRecordStore(join(directory, 'records'));
    await store.start();
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('round-trips records through one file per key', async () => {
    await store.put('session/1', { id: 'session/1', context: { last_sequence: 'ATGC' }, count: 2 });

    expect(await store.get('session/1')).toEqual({ id: 'session/1', context: { last_sequence: 'ATGC' }, count: 2 });
    expect(await readdir(join(directory, 'records'))).toEqual(['session%2F1.json']);
    expect(await store.list()).toEqual(['session/1']);
  });

  it('returns null for missing keys and ignores deletes of missing keys', async () => {
    expect(await store.get('missing')).toBeNull();
    await expect(store.delete('missing')).resolves.toBeUndefined();
  });

  it('overwrites records in place', async () => {
    await store.put('a', 1);
    await store.put('a', 2);

    expect(await store.get('a')).toBe(2);
    expect(await store.list()).toEqual(['a']);
  });

  it('rejects files that do not hold JSON', async () => {
    await writeFile(join(directory, 'records', 'broken.json'), '{not json', 'utf8');

    await expect(store.get('broken')).rejects.toThrow(SyntaxError);
  });

  it('lists nothing when the directory does not exist', async () => {
    const missing = new FileRecordStore(join(directory, 'never-created'));
    expect(await missing.list()).toEqual([]);
  });
});

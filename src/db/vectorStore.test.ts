import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { VectorDimensionError } from '../errors';
import { createSilentLogger } from '../logger';
import { FileVectorStore, INDEX_FILE, VECTORS_FILE } from './vectorStore';

const logger = createSilentLogger();

describe('FileVectorStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'vector-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function openStore(dimension = 3) {
    const store = new FileVectorStore(dir, dimension, logger);
    await store.setup();
    return store;
  }

  it('starts empty when nothing is persisted', async () => {
    const store = await openStore();
    expect(store.size).toBe(0);
    expect(store.get('missing')).toBeUndefined();
  });

  it('stores and returns a vector with its metadata', async () => {
    const store = await openStore();
    await store.put('jd-1', [0.5, 0.25, 1], { role: 'jd', name: 'jd.txt' });

    const record = store.get('jd-1');
    expect(record?.vector).toEqual([0.5, 0.25, 1]);
    expect(record?.metadata).toEqual({ role: 'jd', name: 'jd.txt' });
  });

  it('overwrites an existing id instead of duplicating it', async () => {
    const store = await openStore();
    await store.put('r-1', [1, 0, 0], { role: 'resume', name: 'a.txt' });
    await store.put('r-1', [0, 1, 0], { role: 'resume', name: 'a.txt' });

    expect(store.size).toBe(1);
    expect(store.get('r-1')?.vector).toEqual([0, 1, 0]);
  });

  it('rejects vectors of the wrong dimension', async () => {
    const store = await openStore();
    await expect(store.put('r-1', [1, 0], { role: 'resume', name: 'a.txt' })).rejects.toThrow(
      VectorDimensionError
    );
    expect(store.size).toBe(0);
  });

  it('persists a float32 array and a JSON index that reload', async () => {
    const store = await openStore();
    await store.put('jd-1', [0.5, 0.25, 1], { role: 'jd', name: 'jd.txt' });
    await store.put('r-1', [-1, 0, 2], { role: 'resume', name: 'a.pdf', format: 'pdf' });

    const bytes = await readFile(path.join(dir, VECTORS_FILE));
    expect(bytes.length).toBe(2 * 3 * 4);
    expect(bytes.readFloatLE(3 * 4)).toBe(-1);

    const index = JSON.parse(await readFile(path.join(dir, INDEX_FILE), 'utf-8'));
    expect(index.dimension).toBe(3);
    expect(index.records.map((r: { id: string; offset: number }) => [r.id, r.offset])).toEqual([
      ['jd-1', 0],
      ['r-1', 1],
    ]);

    const reopened = await openStore();
    expect(reopened.size).toBe(2);
    expect(reopened.get('r-1')?.vector).toEqual([-1, 0, 2]);
    expect(reopened.get('r-1')?.metadata).toEqual({ role: 'resume', name: 'a.pdf', format: 'pdf' });
  });

  it('discards persisted vectors of another dimension', async () => {
    const store = await openStore(3);
    await store.put('jd-1', [1, 2, 3], { role: 'jd', name: 'jd.txt' });

    const other = await openStore(4);
    expect(other.size).toBe(0);
  });

  it('starts fresh when the index is corrupt', async () => {
    const store = await openStore();
    await store.put('jd-1', [1, 2, 3], { role: 'jd', name: 'jd.txt' });
    await writeFile(path.join(dir, INDEX_FILE), '{"dimension": 3, "records": [', 'utf-8');

    const reopened = await openStore();
    expect(reopened.size).toBe(0);
  });

  it.each([
    ['an out-of-range offset', [{ id: 'a', offset: 7 }]],
    [
      'two records on one row',
      [
        { id: 'a', offset: 0 },
        { id: 'b', offset: 0 },
      ],
    ],
    [
      'a repeated id',
      [
        { id: 'a', offset: 0 },
        { id: 'a', offset: 1 },
      ],
    ],
  ])('starts fresh when the index has %s', async (_label, entries) => {
    const records = entries.map((e) => ({
      ...e,
      createdAt: '2024-01-01T00:00:00.000Z',
      metadata: { role: 'resume', name: `${e.id}.txt` },
    }));
    await writeFile(path.join(dir, INDEX_FILE), JSON.stringify({ dimension: 3, records }), 'utf-8');
    await writeFile(path.join(dir, VECTORS_FILE), Buffer.alloc(records.length * 3 * 4));

    const store = await openStore();
    expect(store.size).toBe(0);

    await store.put('c', [1, 0, 0], { role: 'resume', name: 'c.txt' });
    const reopened = await openStore();
    expect(reopened.get('c')?.vector).toEqual([1, 0, 0]);
  });

  it('ranks records by similarity', async () => {
    const store = await openStore();
    await store.put('a', [1, 0, 0], { role: 'resume', name: 'a.txt' });
    await store.put('b', [0, 1, 0], { role: 'resume', name: 'b.txt' });
    await store.put('c', [1, 1, 0], { role: 'resume', name: 'c.txt' });

    const hits = store.similaritySearch([1, 0, 0]);
    expect(hits.map((h) => h.record.documentId)).toEqual(['a', 'c', 'b']);
    expect(store.similaritySearch([1, 0, 0], 1)).toHaveLength(1);
    expect(store.similarity([1, 0, 0], [1, 0, 0])).toBeCloseTo(1, 10);
  });

  it('lists entries without vectors and can be cleared', async () => {
    const store = await openStore();
    await store.put('a', [1, 0, 0], { role: 'resume', name: 'a.txt' });

    const [entry] = store.getAllEntries();
    expect(entry.documentId).toBe('a');
    expect(entry).not.toHaveProperty('vector');

    await store.clear();
    expect(store.size).toBe(0);
    expect((await openStore()).size).toBe(0);
  });
});

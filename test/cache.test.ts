import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { HashCache } from '../src/cache';
import { createTempDir, cleanupTempDir, createTestFile } from './setup';

describe('HashCache', () => {
  let tempDir: string;
  let cacheFile: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    cacheFile = path.join(tempDir, 'cache.json');
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should return a hash only for the exact stored mtime', () => {
    const cache = new HashCache();
    cache.store('/data/a.txt', 1700000000123.5, 'aaaaaaaaaaaaaaaa');

    expect(cache.lookup('/data/a.txt', 1700000000123.5)).toBe('aaaaaaaaaaaaaaaa');
    expect(cache.lookup('/data/a.txt', 1700000000124)).toBeUndefined();
    expect(cache.lookup('/data/b.txt', 1700000000123.5)).toBeUndefined();
  });

  it('should replace an entry on store', () => {
    const cache = new HashCache();
    cache.store('/data/a.txt', 1, 'old');
    cache.store('/data/a.txt', 2, 'new');

    expect(cache.size).toBe(1);
    expect(cache.lookup('/data/a.txt', 1)).toBeUndefined();
    expect(cache.lookup('/data/a.txt', 2)).toBe('new');
  });

  it('should persist entries across instances', async () => {
    const first = new HashCache(cacheFile);
    first.store('/data/a.txt', 1700000000123.456, '0123456789abcdef');
    first.store('/data/b.txt', 42, 'fedcba9876543210');
    await first.flush();

    const second = new HashCache(cacheFile);
    await second.load();

    expect(second.size).toBe(2);
    expect(second.lookup('/data/a.txt', 1700000000123.456)).toBe('0123456789abcdef');
    expect(second.lookup('/data/b.txt', 42)).toBe('fedcba9876543210');
  });

  it('should write the versioned file format', async () => {
    const cache = new HashCache(cacheFile);
    cache.store('/data/a.txt', 5, 'abc');
    await cache.flush();

    const written = JSON.parse(await fs.promises.readFile(cacheFile, 'utf8'));
    expect(written).toEqual({ version: 1, entries: { '/data/a.txt': [5, 'abc'] } });
  });

  it('should start empty when the cache file is missing', async () => {
    const cache = new HashCache(cacheFile);
    await cache.load();

    expect(cache.size).toBe(0);
  });

  it('should treat a corrupt cache file as empty', async () => {
    await createTestFile(cacheFile, '{ not json');

    const cache = new HashCache(cacheFile);
    await cache.load();

    expect(cache.size).toBe(0);
  });

  it('should treat an unknown version as empty', async () => {
    await createTestFile(cacheFile, JSON.stringify({ version: 99, entries: { '/x': [1, 'h'] } }));

    const cache = new HashCache(cacheFile);
    await cache.load();

    expect(cache.size).toBe(0);
  });

  it('should treat malformed entries as corrupt', async () => {
    await createTestFile(cacheFile, JSON.stringify({ version: 1, entries: { '/x': ['1', 'h'] } }));

    const cache = new HashCache(cacheFile);
    await cache.load();

    expect(cache.size).toBe(0);
  });

  it('should keep working in memory when flush fails', async () => {
    const unwritable = path.join(tempDir, 'missing-dir', 'cache.json');
    const cache = new HashCache(unwritable);
    cache.store('/data/a.txt', 1, 'hash');

    await expect(cache.flush()).resolves.toBeUndefined();
    expect(cache.lookup('/data/a.txt', 1)).toBe('hash');
    expect(fs.existsSync(unwritable)).toBe(false);
  });

  it('should not touch the disk without a file path', async () => {
    const cache = new HashCache();
    cache.store('/data/a.txt', 1, 'hash');
    await cache.flush();

    expect(await fs.promises.readdir(tempDir)).toEqual([]);
  });

  it('should skip writing when nothing changed', async () => {
    const cache = new HashCache(cacheFile);
    await cache.flush();

    expect(fs.existsSync(cacheFile)).toBe(false);
  });
});

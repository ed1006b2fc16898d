/**
 * Tests for CacheManager.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import { CacheManager } from '../../../../src/core/cache/manager.js';
import type { CachedFileResult } from '../../../../src/core/cache/types.js';
import { createTestProject, type TestProject } from '../../../helpers/project.js';

function entry(checksum: string): CachedFileResult {
  return {
    checksum,
    cachedAt: '2026-01-01T00:00:00.000Z',
    references: [
      { name: 'Bar', moduleNesting: ['Foo'], location: { startRow: 2, startCol: 3, endRow: 2, endCol: 6 } },
    ],
    definitions: [{ fullyQualifiedName: 'Foo', location: { begin: 0, end: 20 } }],
  };
}

describe('CacheManager', () => {
  let project: TestProject;
  let cacheDirectory: string;

  beforeEach(() => {
    project = createTestProject();
    cacheDirectory = project.path('tmp/cache');
  });

  afterEach(() => {
    project.remove();
  });

  it('should start empty when no cache file exists', async () => {
    const manager = new CacheManager(cacheDirectory, 'cfg');
    await manager.load();

    expect(manager.lookup('a.rb', 'abc')).toBeNull();
    expect(manager.getStats()).toEqual({
      hits: 0,
      misses: 1,
      invalidated: 0,
      totalCached: 0,
      fullInvalidation: false,
    });
  });

  it('should return stored results for matching checksums only', async () => {
    const manager = new CacheManager(cacheDirectory, 'cfg');
    await manager.load();
    manager.set('a.rb', entry('abc'));

    expect(manager.lookup('a.rb', 'abc')).toEqual(entry('abc'));
    expect(manager.lookup('a.rb', 'changed')).toBeNull();
    expect(manager.getStats()).toMatchObject({ hits: 1, invalidated: 1, totalCached: 1 });
  });

  it('should persist entries between runs', async () => {
    const first = new CacheManager(cacheDirectory, 'cfg');
    await first.load();
    first.set('a.rb', entry('abc'));
    await first.save();

    const second = new CacheManager(cacheDirectory, 'cfg');
    await second.load();

    expect(second.lookup('a.rb', 'abc')).toEqual(entry('abc'));
    expect(JSON.parse(readFileSync(project.path('tmp/cache/references.json'), 'utf-8')).version).toBe('1.0');
  });

  it('should drop everything when the config changes', async () => {
    const first = new CacheManager(cacheDirectory, 'cfg');
    await first.load();
    first.set('a.rb', entry('abc'));
    await first.save();

    const second = new CacheManager(cacheDirectory, 'other-cfg');
    await second.load();

    expect(second.lookup('a.rb', 'abc')).toBeNull();
    expect(second.getStats().fullInvalidation).toBe(true);
  });

  it('should start fresh from a corrupt cache file', async () => {
    project.write('tmp/cache/references.json', '{not json');
    const manager = new CacheManager(cacheDirectory, 'cfg');

    await manager.load();

    expect(manager.getStats().totalCached).toBe(0);
  });

  it('should start fresh from a cache file of the wrong shape', async () => {
    project.write('tmp/cache/references.json', JSON.stringify({ version: '1.0', files: [] }));
    const manager = new CacheManager(cacheDirectory, 'cfg');

    await manager.load();

    expect(manager.getStats()).toMatchObject({ totalCached: 0, fullInvalidation: false });
  });

  it('should prune entries of files no longer analyzed', async () => {
    const manager = new CacheManager(cacheDirectory, 'cfg');
    await manager.load();
    manager.set('a.rb', entry('a'));
    manager.set('b.rb', entry('b'));

    expect(manager.prune(new Set(['b.rb']))).toBe(1);
    expect(manager.getStats().totalCached).toBe(1);
  });

  it('should forget everything on clear', async () => {
    const manager = new CacheManager(cacheDirectory, 'cfg');
    await manager.load();
    manager.set('a.rb', entry('a'));

    manager.clear();

    expect(manager.lookup('a.rb', 'a')).toBeNull();
  });
});

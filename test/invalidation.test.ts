import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';

import {CacheStore} from '../src/cache_store';
import {fingerprintRequirements} from '../src/fingerprint';
import {InvalidationEngine} from '../src/invalidation';

describe('InvalidationEngine', () => {
  let tempDir: string;
  let store: CacheStore;
  let engine: InvalidationEngine;
  const stored: string = fingerprintRequirements(['flask==2.0', 'requests']);

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pincache-invalidation-'));
    store = new CacheStore({cacheDir: tempDir, projectRoot: tempDir});
    await store.open();
    await store.put({
      moduleName: 'api',
      fingerprint: stored,
      resolvedPackages: ['flask==2.0.3', 'requests==2.31.0'],
      createdAt: '2024-01-01T00:00:00.000Z',
      resolverIdentity: 'resolver-1',
    });
    engine = new InvalidationEngine(store);
  });

  afterEach(async () => {
    await store.close();
    await fs.remove(tempDir);
  });

  it('reports a hit for the stored fingerprint', async () => {
    expect(await engine.check('api', stored)).toBe('HIT');
  });

  it('reports stale entries for any other fingerprint', async () => {
    expect(await engine.check('api', fingerprintRequirements(['flask==2.0', 'requests', 'click']))).toBe('STALE');
  });

  it('reports a miss for unknown modules', async () => {
    expect(await engine.check('worker', stored)).toBe('MISS');
  });

  it('reports stale entries when the resolver changed', async () => {
    expect(await engine.evaluate('api', stored, 'resolver-2')).toEqual({
      status: 'STALE',
      reason: 'resolver-changed',
      entry: await store.get('api'),
    });
    expect(await engine.check('api', stored, 'resolver-1')).toBe('HIT');
  });

  it('ignores file timestamps', async () => {
    const future: Date = new Date(Date.now() + 3600000);
    await fs.utimes(store.recordPath('api'), future, future);

    expect(await engine.check('api', stored)).toBe('HIT');
  });

  it('reports a miss after the entry was deleted', async () => {
    await store.deleteAll();

    expect(await engine.check('api', stored)).toBe('MISS');
  });
});

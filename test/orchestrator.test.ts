import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';

import {CacheStore} from '../src/cache_store';
import {
  MalformedRequirementError, PincacheError, ResolutionFailedError, VersionConflictError,
} from '../src/errors';
import {fingerprintRequirements} from '../src/fingerprint';
import {CanonicalRequirement, Project, ResolvedSet, ResolveRequest, Resolver} from '../src/interfaces';
import {
  OrchestratorSettings,
  ResolutionPlan,
  RunResult,
  createOrchestratorOptions,
  mergeResolvedPackages,
  resolveProject,
} from '../src/orchestrator';

interface FakeResolver {
  resolver: Resolver;
  calls: Array<ResolveRequest>;
}

function fakeResolver(versions: {[canonicalName: string]: string} = {}): FakeResolver {
  const calls: Array<ResolveRequest> = [];
  const resolver: Resolver = async (request: ResolveRequest): Promise<Array<string>> => {
    calls.push(request);

    return request.requirements.map((requirement: CanonicalRequirement) => {
      const extras: string = requirement.extras.length > 0 ? `[${requirement.extras.join(',')}]` : '';

      return `${requirement.canonicalName}${extras}==${versions[requirement.canonicalName] ?? '1.0.0'}`;
    });
  };

  return {resolver: resolver, calls: calls};
}

function project(modules: {[name: string]: Array<string>}): Project {
  return {
    root: '/project',
    modules: Object.keys(modules).map((name: string) => { return {name: name, requirements: modules[name]}; }),
  };
}

function calledModules(fake: FakeResolver): Array<string> {
  return fake.calls.map((request: ResolveRequest) => { return request.moduleName; });
}

describe('resolveProject', () => {
  let tempDir: string;
  let store: CacheStore;

  const run = (target: Project, settings: Omit<OrchestratorSettings, 'store'>): Promise<RunResult> => {
    return resolveProject(target, createOrchestratorOptions({
      store: store,
      resolverIdentity: 'test-resolver',
      now: (): Date => { return new Date('2024-01-01T00:00:00Z'); },
      ...settings,
    }));
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pincache-orchestrator-'));
    store = new CacheStore({cacheDir: tempDir, projectRoot: '/project'});
    await store.open();
  });

  afterEach(async () => {
    await store.close();
    await fs.remove(tempDir);
  });

  it('resolves on a miss and reuses the cache for equivalent requirements', async () => {
    const fake: FakeResolver = fakeResolver({flask: '2.0', requests: '2.31.0'});

    const first: RunResult = await run(project({api: ['Flask==2.0', 'requests']}), {resolver: fake.resolver});
    expect(first.modules[0].status).toBe('MISS');
    expect(fake.calls.length).toBe(1);
    expect(await store.get('api')).toEqual({
      moduleName: 'api',
      fingerprint: fingerprintRequirements(['Flask==2.0', 'requests']),
      resolvedPackages: ['flask==2.0', 'requests==2.31.0'],
      createdAt: '2024-01-01T00:00:00.000Z',
      resolverIdentity: 'test-resolver',
    });

    const second: RunResult = await run(project({api: ['flask==2.0', 'Requests']}), {resolver: fake.resolver});
    expect(second.modules[0].status).toBe('HIT');
    expect(second.reused).toEqual(['api']);
    expect(fake.calls.length).toBe(1);
    expect(second.resolvedSet).toEqual([
      {canonicalName: 'flask', name: 'flask', version: '2.0', extras: [], requiredBy: ['api']},
      {canonicalName: 'requests', name: 'requests', version: '2.31.0', extras: [], requiredBy: ['api']},
    ]);
  });

  it('re-resolves a module whose cached pins are unreadable', async () => {
    await fs.writeJson(store.recordPath('api'), {
      format_version: 1,
      module_name: 'api',
      fingerprint: fingerprintRequirements(['flask']),
      resolved_packages: ['flask>>garbage'],
      created_at: '2024-01-01T00:00:00.000Z',
      resolver_identity: 'test-resolver',
    });
    const fake: FakeResolver = fakeResolver({flask: '2.0'});

    const result: RunResult = await run(project({api: ['flask']}), {resolver: fake.resolver});

    expect(result.modules[0].status).toBe('MISS');
    expect(calledModules(fake)).toEqual(['api']);
    expect((await store.get('api'))?.resolvedPackages).toEqual(['flask==2.0']);
  });

  it('records the modules of the project it resolved', async () => {
    const fake: FakeResolver = fakeResolver();
    await run(project({worker: ['celery'], api: ['flask']}), {resolver: fake.resolver});
    expect(await store.getActiveModules()).toEqual(['api', 'worker']);

    await run(project({cli: ['click']}), {resolver: fake.resolver});
    expect(await store.getActiveModules()).toEqual(['cli']);
  });

  it('re-resolves a module whose requirements changed', async () => {
    const fake: FakeResolver = fakeResolver({flask: '2.0'});
    await run(project({api: ['Flask==2.0', 'requests']}), {resolver: fake.resolver});

    const result: RunResult = await run(project({api: ['Flask==2.0', 'requests', 'click']}), {resolver: fake.resolver});

    expect(result.modules[0].status).toBe('STALE');
    expect(result.modules[0].reason).toBe('requirements-changed');
    expect(fake.calls.length).toBe(2);
    expect((await store.get('api'))?.fingerprint).toBe(fingerprintRequirements(['Flask==2.0', 'requests', 'click']));
    expect((await store.get('api'))?.resolvedPackages).toEqual(['click==1.0.0', 'flask==2.0', 'requests==1.0.0']);
  });

  it('only resolves the modules that changed', async () => {
    const fake: FakeResolver = fakeResolver();
    const modules: {[name: string]: Array<string>} = {
      a: ['alpha'],
      b: ['beta'],
      c: ['gamma'],
      d: ['delta'],
      e: ['epsilon'],
    };
    await run(project(modules), {resolver: fake.resolver});
    expect(fake.calls.length).toBe(5);

    const result: RunResult = await run(project({...modules, c: ['gamma', 'zeta']}), {resolver: fake.resolver});

    expect(calledModules(fake).slice(5)).toEqual(['c']);
    expect(result.resolved).toEqual(['c']);
    expect(result.reused).toEqual(['a', 'b', 'd', 'e']);
  });

  it('misses every module after the cache was cleared', async () => {
    const fake: FakeResolver = fakeResolver();
    await run(project({a: ['alpha'], b: ['beta']}), {resolver: fake.resolver});
    await store.deleteAll();

    const result: RunResult = await run(project({a: ['alpha'], b: ['beta']}), {resolver: fake.resolver});

    expect(result.modules.map((module) => { return module.status; })).toEqual(['MISS', 'MISS']);
    expect(fake.calls.length).toBe(4);
  });

  it('re-resolves entries made by another resolver', async () => {
    const fake: FakeResolver = fakeResolver();
    await run(project({a: ['alpha']}), {resolver: fake.resolver});

    const result: RunResult = await run(project({a: ['alpha']}), {resolver: fake.resolver, resolverIdentity: 'other-resolver'});

    expect(result.modules[0].status).toBe('STALE');
    expect(result.modules[0].reason).toBe('resolver-changed');
    expect((await store.get('a'))?.resolverIdentity).toBe('other-resolver');
  });

  it('re-resolves everything when upgrading', async () => {
    const fake: FakeResolver = fakeResolver();
    await run(project({a: ['alpha'], b: ['beta']}), {resolver: fake.resolver});

    const result: RunResult = await run(project({a: ['alpha'], b: ['beta']}), {resolver: fake.resolver, upgrade: true});

    expect(result.resolved).toEqual(['a', 'b']);
    expect(fake.calls.slice(2).map((request: ResolveRequest) => { return request.upgrade; })).toEqual([true, true]);
    expect(result.modules.map((module) => { return module.status; })).toEqual(['HIT', 'HIT']);
  });

  it('fails loudly on cross-module version conflicts', async () => {
    const resolver: Resolver = async (request: ResolveRequest): Promise<Array<string>> => {
      return request.moduleName === 'a' ? ['shared==1.0', 'alpha==1.0'] : ['Shared==2.0'];
    };

    const failure: Promise<RunResult> = run(project({a: ['shared'], b: ['shared']}), {resolver: resolver});

    await expect(failure).rejects.toThrow(VersionConflictError);
    await expect(failure).rejects.toMatchObject({
      conflicts: [{
        canonicalName: 'shared',
        first: {moduleName: 'a', version: '1.0'},
        second: {moduleName: 'b', version: '2.0'},
      }],
    });
  });

  it('aborts on resolver failures but keeps the entries already written', async () => {
    const fake: FakeResolver = fakeResolver();
    const resolver: Resolver = async (request: ResolveRequest): Promise<Array<string>> => {
      if (request.moduleName === 'b') {
        throw new Error('index unreachable');
      }

      return fake.resolver(request);
    };

    const failure: Promise<RunResult> = run(project({a: ['alpha'], b: ['beta'], c: ['gamma']}), {resolver: resolver, concurrency: 1});

    await expect(failure).rejects.toThrow(ResolutionFailedError);
    await expect(failure).rejects.toMatchObject({moduleName: 'b'});
    expect(await store.get('a')).not.toBeNull();
    expect(await store.get('c')).toBeNull();
  });

  it('rejects resolver output that is not pinned', async () => {
    const resolver: Resolver = async (): Promise<Array<string>> => { return ['flask>=2']; };

    await expect(run(project({a: ['flask']}), {resolver: resolver})).rejects.toThrow(ResolutionFailedError);
    expect(await store.get('a')).toBeNull();
  });

  it('stops only the module with a malformed requirement and reports it', async () => {
    const fake: FakeResolver = fakeResolver();

    const failure: Promise<RunResult> = run(project({bad: ['flask>>2'], good: ['alpha']}), {resolver: fake.resolver});

    await expect(failure).rejects.toThrow(MalformedRequirementError);
    await expect(failure).rejects.toMatchObject({moduleName: 'bad', requirement: 'flask>>2'});
    expect(calledModules(fake)).toEqual(['good']);
    expect(await store.get('good')).not.toBeNull();
  });

  it('rejects projects that use a module name twice', async () => {
    const target: Project = {root: '/project', modules: [{name: 'a', requirements: []}, {name: 'a', requirements: []}]};

    await expect(run(target, {resolver: fakeResolver().resolver})).rejects.toThrow(PincacheError);
  });

  it('keeps at most `concurrency` resolutions in flight', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const resolver: Resolver = async (request: ResolveRequest): Promise<Array<string>> => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise<void>((resolve: () => void) => { setTimeout(resolve, 5); });
      inFlight--;

      return [`${request.moduleName}-pkg==1.0`];
    };

    const result: RunResult = await run(
      project({a: ['x'], b: ['x'], c: ['x'], d: ['x'], e: ['x'], f: ['x']}),
      {resolver: resolver, concurrency: 2},
    );

    expect(maxInFlight).toBe(2);
    expect(result.resolvedSet.length).toBe(6);
  });

  it('calls the hooks around resolution', async () => {
    const events: Array<string> = [];
    const fake: FakeResolver = fakeResolver();
    const resolver: Resolver = async (request: ResolveRequest): Promise<Array<string>> => {
      events.push(`resolve ${request.moduleName}`);

      return fake.resolver(request);
    };

    await run(project({a: ['alpha']}), {resolver: resolver});
    await run(project({a: ['alpha'], b: ['beta']}), {
      resolver: resolver,
      hooks: {
        beforeResolve: (plan: ResolutionPlan): void => {
          events.push(`before reuse=${plan.reuse.length} resolve=${plan.resolve.length}`);
        },
        afterResolve: (result: RunResult): void => {
          events.push(`after ${result.resolved.join(',')}`);
        },
        install: (resolvedSet: ResolvedSet): void => {
          events.push(`install ${resolvedSet.map((resolvedPackage) => { return resolvedPackage.canonicalName; }).join(',')}`);
        },
      },
    });

    expect(events).toEqual([
      'resolve a',
      'before reuse=1 resolve=1',
      'resolve b',
      'after b',
      'install alpha,beta',
    ]);
  });

  it('rejects a concurrency below one', () => {
    expect(() => {
      return createOrchestratorOptions({store: store, resolver: fakeResolver().resolver, concurrency: 0});
    }).toThrow(PincacheError);
  });
});

describe('mergeResolvedPackages', () => {
  it('merges equal pins of several modules', () => {
    expect(mergeResolvedPackages([
      {moduleName: 'worker', resolvedPackages: ['passlib[bcrypt]==1.7.0']},
      {moduleName: 'api', resolvedPackages: ['Passlib==1.7', 'flask==2.0.3']},
    ])).toEqual([
      {canonicalName: 'flask', name: 'flask', version: '2.0.3', extras: [], requiredBy: ['api']},
      {canonicalName: 'passlib', name: 'Passlib', version: '1.7', extras: ['bcrypt'], requiredBy: ['api', 'worker']},
    ]);
  });

  it('does not depend on module order', () => {
    const forward: ResolvedSet = mergeResolvedPackages([
      {moduleName: 'a', resolvedPackages: ['x==1.0']},
      {moduleName: 'b', resolvedPackages: ['x==1.0', 'y==2.0']},
    ]);
    const backward: ResolvedSet = mergeResolvedPackages([
      {moduleName: 'b', resolvedPackages: ['y==2.0', 'x==1.0']},
      {moduleName: 'a', resolvedPackages: ['x==1.0']},
    ]);

    expect(backward).toEqual(forward);
  });
});

import {canonicalizeRequirement, normalizeVersion, parsePinnedSpecifier} from './canonicalizer';
import {CacheStore} from './cache_store';
import {
  MalformedRequirementError, PinConflict, PincacheError, ResolutionFailedError, VersionConflictError,
} from './errors';
import {fingerprint, sortedRequirementSet} from './fingerprint';
import {
  CacheEntry,
  CacheStatus,
  CanonicalRequirement,
  Fingerprint,
  ModuleName,
  ModuleRequirements,
  PinnedPackage,
  Project,
  ResolvedPackage,
  ResolvedSet,
  Resolver,
} from './interfaces';
import {CheckResult, InvalidationEngine, StalenessReason} from './invalidation';
import {logger} from './logger';
import {SystemTools} from './systools';

export const DEFAULT_CONCURRENCY = 4;

export interface ModulePlan {
  moduleName: ModuleName;
  requirements: Array<CanonicalRequirement>;
  fingerprint: Fingerprint;
  status: CacheStatus;
  reason: StalenessReason;
}

export interface ReusedModule extends ModulePlan {
  entry: CacheEntry;
}

export interface ResolutionPlan {
  reuse: Array<ReusedModule>;
  resolve: Array<ModulePlan>;
  malformed: Array<MalformedRequirementError>;
}

export interface ModuleOutcome {
  moduleName: ModuleName;
  status: CacheStatus;
  reason: StalenessReason;
  resolved: boolean;
  fingerprint: Fingerprint;
  resolvedPackages: Array<string>;
}

export interface RunResult {
  resolvedSet: ResolvedSet;
  modules: Array<ModuleOutcome>;
  reused: Array<ModuleName>;
  resolved: Array<ModuleName>;
}

export interface ResolutionHooks {
  // called once the modules are partitioned, before the resolver runs
  beforeResolve?: (plan: ResolutionPlan) => Promise<void> | void;
  afterResolve?: (result: RunResult) => Promise<void> | void;
  // receives the merged set after a conflict-free merge
  install?: (resolvedSet: ResolvedSet) => Promise<void> | void;
}

export interface OrchestratorOptions {
  readonly store: CacheStore;
  readonly resolver: Resolver;
  // version/config tag of the resolver. Entries made by another resolver are stale
  readonly resolverIdentity: string;
  // how many modules may be resolved at the same time
  readonly concurrency: number;
  // re-resolve every module, ignoring the cache
  readonly upgrade: boolean;
  readonly hooks: Readonly<ResolutionHooks>;
  readonly now: () => Date;
}

export interface OrchestratorSettings {
  store: CacheStore;
  resolver: Resolver;
  resolverIdentity?: string;
  concurrency?: number;
  upgrade?: boolean;
  hooks?: ResolutionHooks;
  now?: () => Date;
}

export function createOrchestratorOptions(settings: OrchestratorSettings): Readonly<OrchestratorOptions> {
  const concurrency: number = settings.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new PincacheError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  return Object.freeze({
    store: settings.store,
    resolver: settings.resolver,
    resolverIdentity: settings.resolverIdentity ?? 'unknown',
    concurrency: concurrency,
    upgrade: settings.upgrade ?? false,
    hooks: Object.freeze({...settings.hooks}),
    now: settings.now ?? ((): Date => { return new Date(); }),
  });
}

function assertUniqueModuleNames(modules: Array<ModuleRequirements>): void {
  const seen: Set<ModuleName> = new Set();
  for (const module of modules) {
    if (seen.has(module.name)) {
      throw new PincacheError(`module name '${module.name}' is used more than once in the project`);
    }

    seen.add(module.name);
  }
}

export async function planResolution(
  project: Project,
  engine: InvalidationEngine,
  options: Readonly<OrchestratorOptions>,
): Promise<ResolutionPlan> {
  assertUniqueModuleNames(project.modules);
  const plan: ResolutionPlan = {reuse: [], resolve: [], malformed: []};

  for (const module of project.modules) {
    let requirements: Array<CanonicalRequirement>;
    try {
      requirements = sortedRequirementSet(module.requirements.map((raw: string) => {
        return canonicalizeRequirement(raw);
      }));
    } catch (error) {
      if (error instanceof MalformedRequirementError) {
        // a broken requirements file only stops its own module
        logger.error(error.inModule(module.name).message);
        plan.malformed.push(error);
        continue;
      }

      throw error;
    }

    const currentFingerprint: Fingerprint = fingerprint(requirements);
    const check: CheckResult = await engine.evaluate(module.name, currentFingerprint, options.resolverIdentity);
    const modulePlan: ModulePlan = {
      moduleName: module.name,
      requirements: requirements,
      fingerprint: currentFingerprint,
      status: check.status,
      reason: check.reason,
    };

    if (check.status === 'HIT' && check.entry !== null && !options.upgrade) {
      plan.reuse.push({...modulePlan, entry: check.entry});
    } else {
      plan.resolve.push(modulePlan);
    }
  }

  return plan;
}

async function resolveModule(modulePlan: ModulePlan, options: Readonly<OrchestratorOptions>): Promise<CacheEntry> {
  logger.verbose(`resolving ${modulePlan.moduleName} (${modulePlan.status}, ${modulePlan.reason})`);

  let resolvedPackages: Array<string>;
  try {
    const specifiers: Array<string> = await options.resolver({
      moduleName: modulePlan.moduleName,
      requirements: modulePlan.requirements,
      upgrade: options.upgrade,
    });

    // only pinned output is cacheable, anything else means the resolver misbehaved
    resolvedPackages = specifiers.map((specifier: string) => {
      return parsePinnedSpecifier(specifier).specifier;
    });
  } catch (error) {
    throw new ResolutionFailedError(modulePlan.moduleName, error);
  }

  const entry: CacheEntry = {
    moduleName: modulePlan.moduleName,
    fingerprint: modulePlan.fingerprint,
    resolvedPackages: resolvedPackages,
    createdAt: options.now().toISOString(),
    resolverIdentity: options.resolverIdentity,
  };

  await options.store.put(entry);

  return entry;
}

interface MergedPackage {
  package: ResolvedPackage;
  normalizedVersion: string;
  pinnedBy: ModuleName;
}

export interface ModulePackages {
  moduleName: ModuleName;
  resolvedPackages: Array<string>;
}

// Merges the pins of all modules into one set, ordered by canonical name.
// Two modules pinning one package to different versions is an error: picking
// one would make the installed environment depend on module order.
export function mergeResolvedPackages(modules: Array<ModulePackages>): ResolvedSet {
  const merged: Map<string, MergedPackage> = new Map();
  const conflicts: Array<PinConflict> = [];

  const sortedModules: Array<ModulePackages> = modules.slice().sort((first: ModulePackages, second: ModulePackages) => {
    return first.moduleName.localeCompare(second.moduleName);
  });

  for (const module of sortedModules) {
    for (const specifier of module.resolvedPackages) {
      let pinned: PinnedPackage;
      try {
        pinned = parsePinnedSpecifier(specifier);
      } catch (error) {
        if (error instanceof MalformedRequirementError) {
          throw error.inModule(module.moduleName);
        }

        throw error;
      }

      const existing: MergedPackage | undefined = merged.get(pinned.canonicalName);
      if (existing === undefined) {
        merged.set(pinned.canonicalName, {
          package: {
            canonicalName: pinned.canonicalName,
            name: pinned.name,
            version: pinned.version,
            extras: pinned.extras.slice(),
            requiredBy: [module.moduleName],
          },
          normalizedVersion: normalizeVersion(pinned.version),
          pinnedBy: module.moduleName,
        });
        continue;
      }

      if (existing.normalizedVersion !== normalizeVersion(pinned.version)) {
        conflicts.push({
          canonicalName: pinned.canonicalName,
          first: {moduleName: existing.pinnedBy, version: existing.package.version},
          second: {moduleName: module.moduleName, version: pinned.version},
        });
        continue;
      }

      const extras: Set<string> = new Set(existing.package.extras.concat(pinned.extras));
      existing.package.extras = Array.from(extras).sort();
      if (existing.package.requiredBy.indexOf(module.moduleName) < 0) {
        existing.package.requiredBy.push(module.moduleName);
      }
    }
  }

  if (conflicts.length > 0) {
    throw new VersionConflictError(conflicts);
  }

  return Array.from(merged.values())
    .map((mergedPackage: MergedPackage) => { return mergedPackage.package; })
    .sort((first: ResolvedPackage, second: ResolvedPackage) => {
      return first.canonicalName < second.canonicalName ? -1 : 1;
    });
}

export function formatResolvedPackage(resolvedPackage: ResolvedPackage): string {
  const extras: string = resolvedPackage.extras.length > 0 ? `[${resolvedPackage.extras.join(',')}]` : '';

  return `${resolvedPackage.name}${extras}==${resolvedPackage.version}`;
}

export async function resolveProject(project: Project, options: Readonly<OrchestratorOptions>): Promise<RunResult> {
  const engine: InvalidationEngine = new InvalidationEngine(options.store);
  const plan: ResolutionPlan = await planResolution(project, engine, options);

  logger.info(`${plan.reuse.length} module(s) up to date, ${plan.resolve.length} module(s) need resolution`);

  if (options.hooks.beforeResolve) {
    await options.hooks.beforeResolve(plan);
  }

  // entries of modules that resolved stay cached, even if a sibling fails
  const resolvedEntries: Array<CacheEntry> = await SystemTools.runWithConcurrency(
    plan.resolve,
    options.concurrency,
    (modulePlan: ModulePlan) => { return resolveModule(modulePlan, options); },
  );

  if (plan.malformed.length > 0) {
    throw plan.malformed[0];
  }

  const allEntries: Array<CacheEntry> = plan.reuse.map((reused: ReusedModule) => { return reused.entry; })
    .concat(resolvedEntries);
  const resolvedSet: ResolvedSet = mergeResolvedPackages(allEntries);
  // check and outdated only look at the modules of the latest project
  await options.store.setActiveModules(project.modules.map((module: ModuleRequirements) => { return module.name; }));

  const outcomes: Array<ModuleOutcome> = plan.reuse
    .map((reused: ReusedModule): ModuleOutcome => {
      return {
        moduleName: reused.moduleName,
        status: reused.status,
        reason: reused.reason,
        resolved: false,
        fingerprint: reused.fingerprint,
        resolvedPackages: reused.entry.resolvedPackages,
      };
    })
    .concat(plan.resolve.map((modulePlan: ModulePlan, index: number): ModuleOutcome => {
      return {
        moduleName: modulePlan.moduleName,
        status: modulePlan.status,
        reason: modulePlan.reason,
        resolved: true,
        fingerprint: modulePlan.fingerprint,
        resolvedPackages: resolvedEntries[index].resolvedPackages,
      };
    }))
    .sort((first: ModuleOutcome, second: ModuleOutcome) => {
      return first.moduleName.localeCompare(second.moduleName);
    });

  const result: RunResult = {
    resolvedSet: resolvedSet,
    modules: outcomes,
    reused: plan.reuse.map((reused: ReusedModule) => { return reused.moduleName; }),
    resolved: plan.resolve.map((modulePlan: ModulePlan) => { return modulePlan.moduleName; }),
  };

  if (options.hooks.afterResolve) {
    await options.hooks.afterResolve(result);
  }

  if (options.hooks.install) {
    await options.hooks.install(resolvedSet);
  }

  return result;
}

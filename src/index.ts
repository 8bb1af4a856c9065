export * from './interfaces';
export * from './errors';
export {
  UNCONSTRAINED,
  canonicalize,
  canonicalizeName,
  canonicalizeRequirement,
  formatRequirement,
  normalizeVersion,
  parsePinnedSpecifier,
  parseRequirement,
} from './canonicalizer';
export {fingerprint, fingerprintRequirements} from './fingerprint';
export {CacheStore} from './cache_store';
export type {CacheStoreOptions} from './cache_store';
export {InvalidationEngine} from './invalidation';
export type {CheckResult, StalenessReason} from './invalidation';
export {
  DEFAULT_CONCURRENCY,
  createOrchestratorOptions,
  formatResolvedPackage,
  mergeResolvedPackages,
  planResolution,
  resolveProject,
} from './orchestrator';
export type {
  ModuleOutcome,
  ModulePlan,
  OrchestratorOptions,
  OrchestratorSettings,
  ResolutionHooks,
  ResolutionPlan,
  RunResult,
} from './orchestrator';
export {validateInstalled} from './validator';
export type {InstalledPackage, ValidationReport, VersionMismatch} from './validator';
export {installResolvedSet} from './installation';
export type {InstallReport} from './installation';
export {findOutdated, isNewerVersion} from './outdated';
export type {OutdatedPackage} from './outdated';
export {ModuleTools} from './moduletools';
export type {DiscoveryOptions} from './moduletools';
export {ModuleInfo, parseRequirementsText} from './module_info';
export {createConfig} from './config';
export type {ConfigOverrides, PincacheConfig} from './config';
export {PipBackend, parseCompiledRequirements, parseOutdatedList, parsePipList} from './pip_backend';
export {logger, setLogLevel} from './logger';

export type ModuleName = string;
export type Fingerprint = string;

// a requirement as written, e.g. `Flask[async]>=2.0`
export interface RequirementSpec {
  readonly raw: string;
  readonly name: string;
  readonly extras: ReadonlyArray<string>;
  readonly constraint: string;
  readonly marker: string;
}

export interface CanonicalRequirement {
  readonly canonicalName: string;
  readonly extras: ReadonlyArray<string>;
  readonly constraint: string;
  readonly marker: string;
}

// a fully pinned `name[extras]==version` as produced by a resolver
export interface PinnedPackage {
  readonly canonicalName: string;
  readonly name: string;
  readonly extras: ReadonlyArray<string>;
  readonly version: string;
  readonly specifier: string;
}

export interface ModuleRequirements {
  name: ModuleName;
  requirements: Array<string>;
}

export interface Project {
  root: string;
  modules: Array<ModuleRequirements>;
}

export interface CacheEntry {
  moduleName: ModuleName;
  fingerprint: Fingerprint;
  resolvedPackages: Array<string>;
  createdAt: string;
  resolverIdentity: string;
}

export type CacheStatus = 'HIT' | 'MISS' | 'STALE';

export interface ResolvedPackage {
  canonicalName: string;
  name: string;
  version: string;
  extras: Array<string>;
  requiredBy: Array<ModuleName>;
}

export type ResolvedSet = Array<ResolvedPackage>;

export interface ResolveRequest {
  moduleName: ModuleName;
  requirements: ReadonlyArray<CanonicalRequirement>;
  // re-resolve to the newest versions instead of honouring previous pins
  upgrade: boolean;
}

export type Resolver = (request: ResolveRequest) => Promise<Array<string>>;

export interface InstallOutcome {
  specifier: string;
  success: boolean;
  message?: string;
}

export type Installer = (specifiers: Array<string>) => Promise<Array<InstallOutcome>>;

// package-name -> installed version, names as the environment reports them
export interface InstalledEnvironment {
  [packageName: string]: string;
}

export type EnvironmentQuery = () => Promise<InstalledEnvironment>;

export interface OutdatedListing {
  name: string;
  version: string;
  latestVersion: string;
}

export type OutdatedQuery = () => Promise<Array<OutdatedListing>>;

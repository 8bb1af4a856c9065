import * as path from 'path';

import {PincacheError} from './errors';
import {DEFAULT_REQUIREMENTS_PATTERN} from './moduletools';
import {DEFAULT_CONCURRENCY} from './orchestrator';

export const DEFAULT_CACHE_FOLDER = '.dependency_cache';

export interface PincacheConfig {
  // folder whose requirements files make up the project
  readonly projectRoot: string;
  // where cache entries are kept. Relative paths are relative to the project root
  readonly cacheDir: string;
  readonly pattern: string;
  readonly searchDirs: ReadonlyArray<string>;
  readonly concurrency: number;
  // python executable used by the pip backend
  readonly python: string;
  readonly logLevel: string;
}

export interface ConfigOverrides {
  projectRoot?: string;
  cacheDir?: string;
  pattern?: string;
  searchDirs?: Array<string>;
  concurrency?: number;
  python?: string;
  logLevel?: string;
}

function parseConcurrency(value: string, source: string): number {
  const concurrency: number = Number(value);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new PincacheError(`${source} must be a positive integer, got '${value}'`);
  }

  return concurrency;
}

// explicit overrides win over environment variables, which win over the defaults
export function createConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): Readonly<PincacheConfig> {
  const projectRoot: string = path.resolve(overrides.projectRoot ?? process.cwd());

  let concurrency: number = DEFAULT_CONCURRENCY;
  if (overrides.concurrency !== undefined) {
    concurrency = parseConcurrency(String(overrides.concurrency), 'concurrency');
  } else if (env.PINCACHE_CONCURRENCY !== undefined && env.PINCACHE_CONCURRENCY.length > 0) {
    concurrency = parseConcurrency(env.PINCACHE_CONCURRENCY, 'PINCACHE_CONCURRENCY');
  }

  const cacheDir: string = overrides.cacheDir ?? env.PINCACHE_CACHE_DIR ?? DEFAULT_CACHE_FOLDER;

  return Object.freeze({
    projectRoot: projectRoot,
    cacheDir: path.resolve(projectRoot, cacheDir),
    pattern: overrides.pattern ?? DEFAULT_REQUIREMENTS_PATTERN,
    searchDirs: Object.freeze((overrides.searchDirs ?? []).slice()),
    concurrency: concurrency,
    python: overrides.python ?? env.PINCACHE_PYTHON ?? 'python',
    logLevel: overrides.logLevel ?? 'info',
  });
}

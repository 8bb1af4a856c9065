import {createHash} from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';

import {parsePinnedSpecifier} from './canonicalizer';
import {CacheCorruptionError} from './errors';
import {CacheEntry, ModuleName} from './interfaces';
import {logger} from './logger';
import {isErrnoException, SystemTools} from './systools';

export const CACHE_FORMAT_VERSION = 1;

// the on-disk shape of one module's entry. snake_case, so the files read
// naturally next to the requirements files they describe
interface CacheRecord {
  format_version: number;
  module_name: string;
  fingerprint: string;
  resolved_packages: Array<string>;
  created_at: string;
  resolver_identity: string;
}

// modules of the last completed run. null until a run recorded them
interface ProjectRecord {
  project_root: string;
  modules: Array<string> | null;
}

export interface CacheStoreOptions {
  cacheDir: string;
  projectRoot: string;
}

function isCacheRecord(value: unknown): value is CacheRecord {
  return typeof value === 'object' && value !== null
    && 'format_version' in value && value.format_version === CACHE_FORMAT_VERSION
    && 'module_name' in value && typeof value.module_name === 'string'
    && 'fingerprint' in value && typeof value.fingerprint === 'string' && /^[0-9a-f]+$/.test(value.fingerprint)
    && 'resolved_packages' in value && Array.isArray(value.resolved_packages)
    && value.resolved_packages.every((specifier: unknown) => { return typeof specifier === 'string'; })
    && 'created_at' in value && typeof value.created_at === 'string'
    && 'resolver_identity' in value && typeof value.resolver_identity === 'string';
}

function isProjectRecord(value: unknown): value is ProjectRecord {
  return typeof value === 'object' && value !== null
    && 'project_root' in value && typeof value.project_root === 'string'
    && 'modules' in value && (value.modules === null || (Array.isArray(value.modules)
      && value.modules.every((moduleName: unknown) => { return typeof moduleName === 'string'; })));
}

function findUnpinned(specifiers: Array<string>): string | null {
  for (const specifier of specifiers) {
    try {
      parsePinnedSpecifier(specifier);
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }
  }

  return null;
}

function toRecord(entry: CacheEntry): CacheRecord {
  return {
    format_version: CACHE_FORMAT_VERSION,
    module_name: entry.moduleName,
    fingerprint: entry.fingerprint,
    resolved_packages: entry.resolvedPackages,
    created_at: entry.createdAt,
    resolver_identity: entry.resolverIdentity,
  };
}

function fromRecord(record: CacheRecord): CacheEntry {
  return {
    moduleName: record.module_name,
    fingerprint: record.fingerprint,
    resolvedPackages: record.resolved_packages,
    createdAt: record.created_at,
    resolverIdentity: record.resolver_identity,
  };
}

// module names are relative paths, so they can't be used as file names directly
function encodeModuleName(moduleName: ModuleName): string {
  return encodeURIComponent(moduleName).replace(/\*/g, '%2A');
}

export class CacheStore {

  private _cacheDir: string;
  private _projectRoot: string;
  private _projectDir: string;
  private _isOpen = false;
  private _pendingWrites: Set<Promise<void>> = new Set();

  constructor(options: CacheStoreOptions) {
    this._cacheDir = path.resolve(options.cacheDir);
    this._projectRoot = path.resolve(options.projectRoot);

    // several projects may share one cache-dir, so every project gets its own folder
    const projectKey: string = createHash('sha256').update(this._projectRoot)
      .digest('hex')
      .substring(0, 16);
    this._projectDir = path.join(this._cacheDir, projectKey);
  }

  public get cacheDir(): string {
    return this._cacheDir;
  }

  public get projectRoot(): string {
    return this._projectRoot;
  }

  public get projectDir(): string {
    return this._projectDir;
  }

  public get isOpen(): boolean {
    return this._isOpen;
  }

  private get modulesDir(): string {
    return path.join(this._projectDir, 'modules');
  }

  private get projectRecordPath(): string {
    return path.join(this._projectDir, 'project.json');
  }

  public recordPath(moduleName: ModuleName): string {
    return path.join(this.modulesDir, `${encodeModuleName(moduleName)}.json`);
  }

  public async open(): Promise<void> {
    if (this._isOpen) {
      return;
    }

    await fs.ensureDir(this.modulesDir);
    const record: ProjectRecord | null = await this._readProjectRecord();
    if (record === null || record.project_root !== this._projectRoot) {
      await this._writeProjectRecord({project_root: this._projectRoot, modules: null});
    }
    this._isOpen = true;
    logger.debug('opened cache store', this._projectDir);
  }

  public async close(): Promise<void> {
    await Promise.all(Array.from(this._pendingWrites));
    this._isOpen = false;
  }

  public async get(moduleName: ModuleName): Promise<CacheEntry | null> {
    this._assertOpen();

    return this._readEntry(moduleName, this.recordPath(moduleName));
  }

  public async put(entry: CacheEntry): Promise<void> {
    this._assertOpen();
    if (entry.moduleName.length === 0) {
      throw new Error('cache entries need a module name');
    }

    const write: Promise<void> = SystemTools.writeFileAtomic(
      this.recordPath(entry.moduleName),
      `${JSON.stringify(toRecord(entry), null, 2)}\n`,
    );

    this._pendingWrites.add(write);
    try {
      await write;
    } finally {
      this._pendingWrites.delete(write);
    }

    logger.debug(`cached ${entry.resolvedPackages.length} packages for ${entry.moduleName}`);
  }

  public async delete(moduleName: ModuleName): Promise<void> {
    this._assertOpen();
    await fs.remove(this.recordPath(moduleName));
  }

  public async deleteAll(): Promise<void> {
    this._assertOpen();
    await fs.remove(this.modulesDir);
    await fs.ensureDir(this.modulesDir);
  }

  // the module names of the project the last run resolved, or null if no run recorded any
  public async getActiveModules(): Promise<Array<ModuleName> | null> {
    this._assertOpen();
    const record: ProjectRecord | null = await this._readProjectRecord();

    return record === null ? null : record.modules;
  }

  public async setActiveModules(moduleNames: Array<ModuleName>): Promise<void> {
    this._assertOpen();
    await this._writeProjectRecord({project_root: this._projectRoot, modules: moduleNames.slice().sort()});
  }

  public async list(): Promise<Array<CacheEntry>> {
    this._assertOpen();

    let fileNames: Array<string>;
    try {
      fileNames = await fs.readdir(this.modulesDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }

      throw error;
    }

    const recordNames: Array<string> = fileNames.filter((fileName: string) => {
      return path.extname(fileName) === '.json';
    });

    const entries: Array<CacheEntry | null> = await Promise.all(recordNames.map(async (fileName: string) => {
      const recordPath: string = path.join(this.modulesDir, fileName);

      let moduleName: string;
      try {
        moduleName = decodeURIComponent(path.basename(fileName, '.json'));
      } catch (error) {
        const reason: string = error instanceof Error ? error.message : String(error);
        logger.warn(new CacheCorruptionError(fileName, recordPath, `file name is no encoded module name (${reason})`).message);

        return null;
      }

      return this._readEntry(moduleName, recordPath);
    }));

    return entries
      .filter((entry: CacheEntry | null): entry is CacheEntry => {
        return entry !== null;
      })
      .sort((first: CacheEntry, second: CacheEntry) => {
        return first.moduleName.localeCompare(second.moduleName);
      });
  }

  private async _readProjectRecord(): Promise<ProjectRecord | null> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(this.projectRecordPath, 'utf8'));
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        const reason: string = error instanceof Error ? error.message : String(error);
        logger.warn(`ignoring unreadable project record at '${this.projectRecordPath}': ${reason}`);
      }

      return null;
    }

    return isProjectRecord(parsed) ? parsed : null;
  }

  private _writeProjectRecord(record: ProjectRecord): Promise<void> {
    return SystemTools.writeFileAtomic(this.projectRecordPath, `${JSON.stringify(record, null, 2)}\n`);
  }

  private _assertOpen(): void {
    if (!this._isOpen) {
      throw new Error(`the cache store at '${this._projectDir}' is not open`);
    }
  }

  // a record that can't be used is reported and treated like a missing one.
  // The cache only saves work, it is never the source of truth
  private async _readEntry(moduleName: ModuleName, recordPath: string): Promise<CacheEntry | null> {
    let content: string;
    try {
      content = await fs.readFile(recordPath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }

      const reason: string = error instanceof Error ? error.message : String(error);
      logger.warn(new CacheCorruptionError(moduleName, recordPath, reason).message);

      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (parseError) {
      const reason: string = parseError instanceof Error ? parseError.message : String(parseError);
      logger.warn(new CacheCorruptionError(moduleName, recordPath, `invalid JSON (${reason})`).message);

      return null;
    }

    if (!isCacheRecord(parsed)) {
      logger.warn(new CacheCorruptionError(moduleName, recordPath, 'unexpected record structure').message);

      return null;
    }

    if (parsed.module_name !== moduleName) {
      logger.warn(new CacheCorruptionError(moduleName, recordPath, `record belongs to module '${parsed.module_name}'`).message);

      return null;
    }

    const unpinned: string | null = findUnpinned(parsed.resolved_packages);
    if (unpinned !== null) {
      logger.warn(new CacheCorruptionError(moduleName, recordPath, unpinned).message);

      return null;
    }

    return fromRecord(parsed);
  }
}

import {CacheStore} from './cache_store';
import {CacheEntry, CacheStatus, Fingerprint, ModuleName} from './interfaces';
import {logger} from './logger';

export type StalenessReason = 'no-entry' | 'requirements-changed' | 'resolver-changed' | 'up-to-date';

export interface CheckResult {
  status: CacheStatus;
  reason: StalenessReason;
  entry: CacheEntry | null;
}

// Decides per module whether its cached resolution can be reused. Only the
// content fingerprint (and optionally the resolver identity) count, never
// timestamps, so touching or moving a requirements file costs nothing.
export class InvalidationEngine {

  private _store: CacheStore;

  constructor(store: CacheStore) {
    this._store = store;
  }

  public async evaluate(
    moduleName: ModuleName,
    currentFingerprint: Fingerprint,
    resolverIdentity?: string,
  ): Promise<CheckResult> {
    const entry: CacheEntry | null = await this._store.get(moduleName);

    let result: CheckResult;
    if (entry === null) {
      result = {status: 'MISS', reason: 'no-entry', entry: null};
    } else if (entry.fingerprint !== currentFingerprint) {
      result = {status: 'STALE', reason: 'requirements-changed', entry: entry};
    } else if (resolverIdentity !== undefined && entry.resolverIdentity !== resolverIdentity) {
      result = {status: 'STALE', reason: 'resolver-changed', entry: entry};
    } else {
      result = {status: 'HIT', reason: 'up-to-date', entry: entry};
    }

    logger.debug(`${moduleName}: ${result.status} (${result.reason})`);

    return result;
  }

  public async check(moduleName: ModuleName, currentFingerprint: Fingerprint, resolverIdentity?: string): Promise<CacheStatus> {
    const result: CheckResult = await this.evaluate(moduleName, currentFingerprint, resolverIdentity);

    return result.status;
  }
}

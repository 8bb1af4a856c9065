import * as semver from 'semver';

import {canonicalizeName, normalizeVersion} from './canonicalizer';
import {OutdatedListing, ResolvedPackage, ResolvedSet} from './interfaces';

export interface OutdatedPackage {
  name: string;
  current: string;
  latest: string;
  requiredBy: Array<string>;
}

export function isNewerVersion(current: string, latest: string): boolean {
  const currentVersion: semver.SemVer | null = semver.coerce(current);
  const latestVersion: semver.SemVer | null = semver.coerce(latest);

  // coercion drops pre-release tags and can't read every scheme. When it
  // can't tell the two apart, any difference counts as newer
  if (currentVersion === null || latestVersion === null || semver.eq(currentVersion, latestVersion)) {
    return normalizeVersion(current) !== normalizeVersion(latest);
  }

  return semver.gt(latestVersion, currentVersion);
}

// narrows an environment's outdated-listing to the packages pincache manages
export function findOutdated(resolvedSet: ResolvedSet, listing: Array<OutdatedListing>): Array<OutdatedPackage> {
  const managed: Map<string, ResolvedPackage> = new Map();
  for (const resolvedPackage of resolvedSet) {
    managed.set(resolvedPackage.canonicalName, resolvedPackage);
  }

  const outdated: Array<OutdatedPackage> = [];
  for (const entry of listing) {
    const resolvedPackage: ResolvedPackage | undefined = managed.get(canonicalizeName(entry.name));
    if (resolvedPackage === undefined || !isNewerVersion(entry.version, entry.latestVersion)) {
      continue;
    }

    outdated.push({
      name: entry.name,
      current: entry.version,
      latest: entry.latestVersion,
      requiredBy: resolvedPackage.requiredBy,
    });
  }

  return outdated;
}

import {canonicalizeName, normalizeVersion} from './canonicalizer';
import {InstalledEnvironment, ResolvedPackage, ResolvedSet} from './interfaces';

export interface VersionMismatch {
  package: ResolvedPackage;
  installedVersion: string;
}

export interface InstalledPackage {
  canonicalName: string;
  name: string;
  version: string;
}

export interface ValidationReport {
  present: Array<ResolvedPackage>;
  missing: Array<ResolvedPackage>;
  versionMismatch: Array<VersionMismatch>;
  // installed, but not part of the resolved set
  extraneous: Array<InstalledPackage>;
  ok: boolean;
}

function canonicalizeEnvironment(installed: InstalledEnvironment): Map<string, InstalledPackage> {
  const packages: Map<string, InstalledPackage> = new Map();
  for (const [name, version] of Object.entries(installed)) {
    const canonicalName: string = canonicalizeName(name);
    packages.set(canonicalName, {canonicalName: canonicalName, name: name, version: version});
  }

  return packages;
}

// Compares what the cache says should be installed with what is. Extras are
// not part of an installed package's identity: `passlib[bcrypt]==1.7` is
// satisfied by an installed `passlib 1.7`.
export function validateInstalled(resolvedSet: ResolvedSet, installed: InstalledEnvironment): ValidationReport {
  const installedPackages: Map<string, InstalledPackage> = canonicalizeEnvironment(installed);
  const report: ValidationReport = {
    present: [],
    missing: [],
    versionMismatch: [],
    extraneous: [],
    ok: true,
  };

  const expectedNames: Set<string> = new Set();
  for (const resolvedPackage of resolvedSet) {
    const canonicalName: string = canonicalizeName(resolvedPackage.canonicalName);
    expectedNames.add(canonicalName);

    const installedPackage: InstalledPackage | undefined = installedPackages.get(canonicalName);
    if (installedPackage === undefined) {
      report.missing.push(resolvedPackage);
      continue;
    }

    if (normalizeVersion(installedPackage.version) !== normalizeVersion(resolvedPackage.version)) {
      report.versionMismatch.push({package: resolvedPackage, installedVersion: installedPackage.version});
      continue;
    }

    report.present.push(resolvedPackage);
  }

  for (const installedPackage of installedPackages.values()) {
    if (!expectedNames.has(installedPackage.canonicalName)) {
      report.extraneous.push(installedPackage);
    }
  }

  report.extraneous.sort((first: InstalledPackage, second: InstalledPackage) => {
    return first.canonicalName < second.canonicalName ? -1 : 1;
  });
  report.ok = report.missing.length === 0 && report.versionMismatch.length === 0;

  return report;
}

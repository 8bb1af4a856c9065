/* eslint-disable no-console */
import {CacheEntry} from './interfaces';
import {InstallReport} from './installation';
import {formatResolvedPackage, RunResult} from './orchestrator';
import {OutdatedPackage} from './outdated';
import {InstalledPackage, ValidationReport, VersionMismatch} from './validator';

const SHORT_FINGERPRINT_LENGTH = 12;

export function printRunSummary(result: RunResult): void {
  console.log('┌---------------------------------------');
  for (const module of result.modules) {
    const action: string = module.resolved ? 'resolved' : 'reused';
    console.log(`| ${module.status.padEnd(5)} ${module.moduleName}: ${action} ${module.resolvedPackages.length} packages`);
  }
  console.log('└---------------------------------------');
  console.log(`${result.resolved.length} module(s) resolved, ${result.reused.length} reused from cache, `
    + `${result.resolvedSet.length} packages in total`);
}

export function printResolvedSet(result: RunResult): void {
  for (const resolvedPackage of result.resolvedSet) {
    console.log(`${formatResolvedPackage(resolvedPackage)}  # ${resolvedPackage.requiredBy.join(', ')}`);
  }
}

export function printInstallReport(report: InstallReport): void {
  if (report.ok) {
    console.log(`✅ Installed ${report.installed.length} packages`);

    return;
  }

  console.log(`❌ ${report.failed.length} packages failed to install:`);
  for (const failure of report.failed) {
    console.log(`   • ${failure.message}`);
  }
}

export function printValidationReport(report: ValidationReport, showExtraneous: boolean): void {
  if (report.ok) {
    console.log('✅ All cached packages are properly installed');
  }

  if (report.missing.length > 0) {
    console.log(`❌ ${report.missing.length} cached packages are missing:`);
    for (const resolvedPackage of report.missing) {
      console.log(`   • ${formatResolvedPackage(resolvedPackage)}`);
    }
  }

  if (report.versionMismatch.length > 0) {
    console.log(`⚠️  ${report.versionMismatch.length} version mismatches found:`);
    for (const mismatch of report.versionMismatch) {
      describeMismatch(mismatch);
    }
  }

  if (!showExtraneous || report.extraneous.length === 0) {
    return;
  }

  console.log(`ℹ️  ${report.extraneous.length} additional packages installed but not in cache:`);
  for (const installedPackage of report.extraneous) {
    describeExtraneous(installedPackage);
  }
}

function describeMismatch(mismatch: VersionMismatch): void {
  console.log(`   • ${mismatch.package.name}: cached ${mismatch.package.version}, installed ${mismatch.installedVersion}`);
}

function describeExtraneous(installedPackage: InstalledPackage): void {
  console.log(`   • ${installedPackage.name}==${installedPackage.version}`);
}

export function printCacheInfo(projectDir: string, entries: Array<CacheEntry>): void {
  const specifiers: Set<string> = new Set();
  for (const entry of entries) {
    entry.resolvedPackages.forEach((specifier: string) => { specifiers.add(specifier); });
  }

  console.log(`Cache directory: ${projectDir}`);
  console.log(`Module caches: ${entries.length}`);
  console.log(`Resolved packages: ${specifiers.size}`);

  for (const entry of entries) {
    console.log(`| ${entry.moduleName}`);
    console.log(`|   fingerprint: ${entry.fingerprint.substring(0, SHORT_FINGERPRINT_LENGTH)}`);
    console.log(`|   created:     ${entry.createdAt}`);
    console.log(`|   resolver:    ${entry.resolverIdentity}`);
    console.log(`|   packages:    ${entry.resolvedPackages.join(', ')}`);
  }
}

export function printOutdated(outdated: Array<OutdatedPackage>): void {
  if (outdated.length === 0) {
    console.log('✅ All cached packages are up-to-date');

    return;
  }

  console.log(`📦 ${outdated.length} packages have newer versions available:`);
  for (const outdatedPackage of outdated) {
    console.log(`   • ${outdatedPackage.name}: ${outdatedPackage.current} → ${outdatedPackage.latest}`);
  }
}

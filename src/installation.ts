import {InstallFailedError} from './errors';
import {InstallOutcome, Installer, ResolvedPackage, ResolvedSet} from './interfaces';
import {logger} from './logger';
import {formatResolvedPackage} from './orchestrator';

export interface InstallReport {
  installed: Array<string>;
  failed: Array<InstallFailedError>;
  ok: boolean;
}

// Hands the merged set to the installer. A failing package is reported but
// doesn't keep the others from being installed; the report is only ok when
// every specifier made it.
export async function installResolvedSet(resolvedSet: ResolvedSet, installer: Installer): Promise<InstallReport> {
  const specifiers: Array<string> = resolvedSet.map((resolvedPackage: ResolvedPackage) => {
    return formatResolvedPackage(resolvedPackage);
  });
  const report: InstallReport = {installed: [], failed: [], ok: true};

  if (specifiers.length === 0) {
    return report;
  }

  let outcomes: Array<InstallOutcome>;
  try {
    outcomes = await installer(specifiers);
  } catch (error) {
    const reason: string = error instanceof Error ? error.message : String(error);
    logger.error(`the installer failed: ${reason}`);
    report.failed = specifiers.map((specifier: string) => { return new InstallFailedError(specifier, reason); });
    report.ok = false;

    return report;
  }

  for (const specifier of specifiers) {
    const outcome: InstallOutcome | undefined = outcomes.find((candidate: InstallOutcome) => {
      return candidate.specifier === specifier;
    });

    if (outcome === undefined) {
      report.failed.push(new InstallFailedError(specifier, 'the installer reported no outcome'));
    } else if (outcome.success) {
      report.installed.push(specifier);
    } else {
      report.failed.push(new InstallFailedError(specifier, outcome.message ?? 'unknown error'));
    }
  }

  for (const failure of report.failed) {
    logger.error(failure.message);
  }

  report.ok = report.failed.length === 0;

  return report;
}

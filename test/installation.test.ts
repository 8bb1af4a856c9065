import {describe, expect, it, vi} from 'vitest';

import {InstallFailedError} from '../src/errors';
import {InstallOutcome, Installer, ResolvedPackage} from '../src/interfaces';
import {InstallReport, installResolvedSet} from '../src/installation';

const resolvedSet: Array<ResolvedPackage> = [
  {canonicalName: 'flask', name: 'Flask', version: '2.0', extras: [], requiredBy: ['api']},
  {canonicalName: 'passlib', name: 'passlib', version: '1.7', extras: ['bcrypt'], requiredBy: ['api', 'worker']},
];

function failureMessages(report: InstallReport): Array<string> {
  return report.failed.map((failure: InstallFailedError) => { return failure.message; });
}

describe('installResolvedSet', () => {
  it('hands pinned specifiers to the installer', async () => {
    const installer = vi.fn(async (specifiers: Array<string>): Promise<Array<InstallOutcome>> => {
      return specifiers.map((specifier: string) => { return {specifier: specifier, success: true}; });
    });

    const report: InstallReport = await installResolvedSet(resolvedSet, installer);

    expect(installer).toHaveBeenCalledWith(['Flask==2.0', 'passlib[bcrypt]==1.7']);
    expect(report).toEqual({installed: ['Flask==2.0', 'passlib[bcrypt]==1.7'], failed: [], ok: true});
  });

  it('reports failing packages without dropping the others', async () => {
    const installer: Installer = async (): Promise<Array<InstallOutcome>> => {
      return [
        {specifier: 'Flask==2.0', success: true},
        {specifier: 'passlib[bcrypt]==1.7', success: false, message: 'no matching distribution'},
      ];
    };

    const report: InstallReport = await installResolvedSet(resolvedSet, installer);

    expect(report.installed).toEqual(['Flask==2.0']);
    expect(failureMessages(report)).toEqual(['installing passlib[bcrypt]==1.7 failed: no matching distribution']);
    expect(report.ok).toBe(false);
  });

  it('fails specifiers the installer is silent about', async () => {
    const installer: Installer = async (): Promise<Array<InstallOutcome>> => {
      return [{specifier: 'Flask==2.0', success: false}];
    };

    const report: InstallReport = await installResolvedSet(resolvedSet, installer);

    expect(failureMessages(report)).toEqual([
      'installing Flask==2.0 failed: unknown error',
      'installing passlib[bcrypt]==1.7 failed: the installer reported no outcome',
    ]);
  });

  it('fails every specifier when the installer throws', async () => {
    const installer: Installer = async (): Promise<Array<InstallOutcome>> => {
      throw new Error('pip not found');
    };

    const report: InstallReport = await installResolvedSet(resolvedSet, installer);

    expect(report.installed).toEqual([]);
    expect(failureMessages(report)).toEqual([
      'installing Flask==2.0 failed: pip not found',
      'installing passlib[bcrypt]==1.7 failed: pip not found',
    ]);
    expect(report.ok).toBe(false);
  });

  it('does not call the installer for an empty set', async () => {
    const installer = vi.fn(async (): Promise<Array<InstallOutcome>> => { return []; });

    expect(await installResolvedSet([], installer)).toEqual({installed: [], failed: [], ok: true});
    expect(installer).not.toHaveBeenCalled();
  });
});

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';

import {formatRequirement} from './canonicalizer';
import {
  CanonicalRequirement,
  InstalledEnvironment,
  InstallOutcome,
  OutdatedListing,
  ResolveRequest,
} from './interfaces';
import {logger} from './logger';
import {parseRequirementsText} from './module_info';
import {CommandError, RunCommandOptions, SystemTools} from './systools';

export type CommandRunner = (command: string, options: RunCommandOptions) => Promise<string>;

export interface PipBackendOptions {
  python: string;
  runCommand?: CommandRunner;
}

// pip-compile output: pins, `# via` annotations and hash continuation lines
export function parseCompiledRequirements(output: string): Array<string> {
  const withoutHashes: string = output.replace(/[ \t]*\\\r?\n[ \t]*--hash=\S+/g, '')
    .replace(/[ \t]+--hash=\S+/g, '');

  return parseRequirementsText(withoutHashes);
}

function isNameVersionRecord(value: unknown): value is {name: string; version: string} {
  return typeof value === 'object' && value !== null
    && 'name' in value && typeof value.name === 'string'
    && 'version' in value && typeof value.version === 'string';
}

function parseJsonArray(output: string, what: string): Array<unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch (error) {
    const reason: string = error instanceof Error ? error.message : String(error);
    throw new Error(`couldn't parse ${what}: ${reason}`);
  }

  if (!Array.isArray(parsed)) {
    throw new Error(`couldn't parse ${what}: expected a list`);
  }

  return parsed;
}

// `pip list --format=json`
export function parsePipList(output: string): InstalledEnvironment {
  const installed: InstalledEnvironment = {};
  for (const item of parseJsonArray(output, 'pip list output')) {
    if (!isNameVersionRecord(item)) {
      throw new Error('couldn\'t parse pip list output: entries need a name and a version');
    }

    installed[item.name] = item.version;
  }

  return installed;
}

// `pip list --outdated --format=json`
export function parseOutdatedList(output: string): Array<OutdatedListing> {
  return parseJsonArray(output, 'pip list --outdated output').map((item: unknown) => {
    if (!isNameVersionRecord(item) || !('latest_version' in item) || typeof item.latest_version !== 'string') {
      throw new Error('couldn\'t parse pip list --outdated output: entries need a name, a version and a latest_version');
    }

    return {name: item.name, version: item.version, latestVersion: item.latest_version};
  });
}

function describeCommandError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const commandError: CommandError = error;
  const stderrLines: Array<string> = (commandError.stderr ?? '').trim().split(/\r?\n/)
    .filter((line: string) => { return line.trim().length > 0; });

  return stderrLines.length > 0 ? stderrLines[stderrLines.length - 1].trim() : commandError.message;
}

// The default collaborators of the cli: resolution through pip-tools, installation
// and environment queries through pip. The core only sees the functions.
export class PipBackend {

  private _python: string;
  private _runCommand: CommandRunner;
  private _identity: Promise<string> | null = null;

  constructor(options: PipBackendOptions) {
    this._python = options.python;
    this._runCommand = options.runCommand ?? SystemTools.runCommand;
  }

  private _pip(args: string): Promise<string> {
    return this._runCommand(`${this._python} -m pip ${args} --disable-pip-version-check`, {silent: true, allowStderr: true});
  }

  public identity(): Promise<string> {
    if (this._identity === null) {
      this._identity = Promise.all([
        this._runCommand(`${this._python} --version`, {silent: true, allowStderr: true}),
        this._runCommand(`${this._python} -m piptools --version`, {silent: true, allowStderr: true}),
      ]).then(([pythonVersion, pipToolsVersion]: Array<string>) => {
        return `${pipToolsVersion.trim()}; ${pythonVersion.trim()}; ${process.platform}-${process.arch}`;
      }, (error: unknown) => {
        // a failed query is retried on the next call
        this._identity = null;
        throw error;
      });
    }

    return this._identity;
  }

  public async resolve(request: ResolveRequest): Promise<Array<string>> {
    const workDir: string = await fs.mkdtemp(path.join(os.tmpdir(), 'pincache-'));
    const inputFile: string = path.join(workDir, 'requirements.in');

    try {
      const lines: Array<string> = request.requirements.map((requirement: CanonicalRequirement) => {
        return formatRequirement(requirement);
      });
      await fs.writeFile(inputFile, `${lines.join('\n')}\n`, 'utf8');

      const upgrade: string = request.upgrade ? ' --upgrade' : '';
      const output: string = await this._runCommand(
        `${this._python} -m piptools compile --quiet --no-header --no-annotate${upgrade} --output-file - ${SystemTools.quoteArgument(inputFile)}`,
        {silent: true, allowStderr: true},
      );

      return parseCompiledRequirements(output);
    } catch (error) {
      throw new Error(`pip-compile failed for ${request.moduleName}: ${describeCommandError(error)}`);
    } finally {
      await fs.remove(workDir);
    }
  }

  // one pip call per package, so one broken package doesn't take the others down
  public async install(specifiers: Array<string>): Promise<Array<InstallOutcome>> {
    const outcomes: Array<InstallOutcome> = [];
    for (const specifier of specifiers) {
      try {
        await this._pip(`install --no-deps ${SystemTools.quoteArgument(specifier)}`);
        outcomes.push({specifier: specifier, success: true});
      } catch (error) {
        logger.debug(`pip install ${specifier} failed`, error);
        outcomes.push({specifier: specifier, success: false, message: describeCommandError(error)});
      }
    }

    return outcomes;
  }

  public async installedPackages(): Promise<InstalledEnvironment> {
    return parsePipList(await this._pip('list --format=json'));
  }

  public async outdatedPackages(): Promise<Array<OutdatedListing>> {
    return parseOutdatedList(await this._pip('list --outdated --format=json'));
  }
}

#!/usr/bin/env node
/* eslint-disable no-console */
import * as fs from 'fs-extra';
import * as path from 'path';

import {CacheStore} from './cache_store';
import {ConfigOverrides, createConfig, PincacheConfig} from './config';
import {PincacheError, UncriticalError} from './errors';
import {
  CacheEntry,
  EnvironmentQuery,
  InstalledEnvironment,
  Installer,
  OutdatedQuery,
  Project,
  ResolvedSet,
  Resolver,
  ResolveRequest,
} from './interfaces';
import {installResolvedSet, InstallReport} from './installation';
import {logger, logVerbose, setLogLevel} from './logger';
import {ModuleTools} from './moduletools';
import {createOrchestratorOptions, mergeResolvedPackages, resolveProject, RunResult} from './orchestrator';
import {findOutdated} from './outdated';
import {PipBackend} from './pip_backend';
import {
  printCacheInfo, printInstallReport, printOutdated, printResolvedSet, printRunSummary, printValidationReport,
} from './reporting';
import {SystemTools} from './systools';
import {validateInstalled, ValidationReport} from './validator';

export type CliCommand = 'resolve' | 'install' | 'upgrade' | 'invalidate' | 'check' | 'inspect' | 'outdated';

const cliCommands: Array<CliCommand> = ['resolve', 'install', 'upgrade', 'invalidate', 'check', 'inspect', 'outdated'];

export interface CliOptions {
  command: CliCommand | null;
  packages: Array<string>;
  requirementsFile: string | null;
  module: string | null;
  showAll: boolean;
  help: boolean;
  config: ConfigOverrides;
}

// everything the cli needs from the outside world. PipBackend is the default
export interface CliBackend {
  identity(): Promise<string>;
  resolve: Resolver;
  install: Installer;
  installedPackages: EnvironmentQuery;
  outdatedPackages: OutdatedQuery;
}

export interface CliDependencies {
  backend?: CliBackend;
  env?: NodeJS.ProcessEnv;
}

interface CommandContext {
  options: CliOptions;
  config: Readonly<PincacheConfig>;
  store: CacheStore;
  backend: CliBackend;
}

const usage = `usage: pincache <command> [options]

commands:
  resolve                      resolve all modules, reusing cached results
  install [packages...]        resolve and install
  upgrade [packages...]        re-resolve every module to the newest versions and install
  invalidate [--module <name>] drop the whole cache or the entry of one module
  check [--all]                compare the cached packages with the installed ones
  inspect                      show the cache entries
  outdated                     show cached packages with newer versions available

options:
  -r, --requirements <file>    use this requirements file instead of discovering modules
  -p, --pattern <glob>         requirements file pattern (default: requirements.txt)
  --search-dir <dir>           folder to search for requirements files (repeatable)
  --project-root <dir>         project root (default: current folder)
  --cache-dir <dir>            cache folder (default: .dependency_cache)
  --concurrency <n>            modules resolved in parallel (default: 4)
  --python <executable>        python used for pip and pip-tools (default: python)
  --loglevel <level>           error, warn, info, verbose, debug or silly
  -v, --verbose                same as --loglevel debug
`;

function isCliCommand(value: string): value is CliCommand {
  return cliCommands.some((command: CliCommand) => { return command === value; });
}

export function parseArguments(argv: Array<string>): CliOptions {
  const options: CliOptions = {
    command: null,
    packages: [],
    requirementsFile: null,
    module: null,
    showAll: false,
    help: false,
    config: {},
  };

  const valueOf = (index: number): string => {
    const value: string | undefined = argv[index + 1];
    if (value === undefined || value.indexOf('-') === 0) {
      throw new PincacheError(`option ${argv[index]} needs a value`);
    }

    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const argument: string = argv[i];

    if (argument.indexOf('-') !== 0) {
      if (options.command === null) {
        if (!isCliCommand(argument)) {
          throw new PincacheError(`unknown command '${argument}'`);
        }

        options.command = argument;
      } else {
        options.packages.push(argument);
      }
    } else if (argument === '-h' || argument === '--help') {
      options.help = true;
    } else if (argument === '-v' || argument === '--verbose') {
      options.config.logLevel = 'debug';
    } else if (argument === '--all') {
      options.showAll = true;
    } else if (argument === '--loglevel') {
      options.config.logLevel = valueOf(i);
      i++;
    } else if (argument === '-r' || argument === '--requirements') {
      options.requirementsFile = valueOf(i);
      i++;
    } else if (argument === '-p' || argument === '--pattern') {
      options.config.pattern = valueOf(i);
      i++;
    } else if (argument === '--search-dir') {
      options.config.searchDirs = (options.config.searchDirs ?? []).concat(valueOf(i));
      i++;
    } else if (argument === '--project-root') {
      options.config.projectRoot = valueOf(i);
      i++;
    } else if (argument === '--cache-dir') {
      options.config.cacheDir = valueOf(i);
      i++;
    } else if (argument === '--python') {
      options.config.python = valueOf(i);
      i++;
    } else if (argument === '--module') {
      options.module = valueOf(i);
      i++;
    } else if (argument === '--concurrency') {
      const concurrency: number = Number(valueOf(i));
      if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new PincacheError(`--concurrency needs a positive integer, got '${argv[i + 1]}'`);
      }

      options.config.concurrency = concurrency;
      i++;
    } else {
      throw new PincacheError(`unknown option '${argument}'`);
    }
  }

  if (options.packages.length > 0 && options.command !== 'install' && options.command !== 'upgrade') {
    throw new PincacheError(`${options.command ?? 'pincache'} takes no package arguments`);
  }

  return options;
}

async function loadProject(context: CommandContext): Promise<Project> {
  const {options, config} = context;

  if (options.requirementsFile !== null) {
    const filePath: string = path.resolve(config.projectRoot, options.requirementsFile);
    const moduleName: string = path.relative(config.projectRoot, filePath).split(path.sep)
      .join('/');

    console.log(`Using requirements from ${moduleName}...`);

    return ModuleTools.projectFromRequirements(config.projectRoot, {[moduleName]: await fs.readFile(filePath, 'utf8')});
  }

  if (options.packages.length > 0) {
    console.log(`Using packages: ${options.packages.join(', ')}...`);

    return ModuleTools.projectFromRequirements(config.projectRoot, {cli: options.packages.join('\n')});
  }

  const project: Project = await ModuleTools.discoverProject({
    projectRoot: config.projectRoot,
    searchDirs: config.searchDirs.slice(),
    pattern: config.pattern,
  });

  if (project.modules.length === 0) {
    throw new UncriticalError(`No ${config.pattern} found below ${config.projectRoot}, nothing to resolve.`);
  }

  return project;
}

// entries of modules the latest run no longer had (renamed or removed modules) are left out
async function loadCachedSet(store: CacheStore): Promise<{entries: Array<CacheEntry>; resolvedSet: ResolvedSet}> {
  const activeModules: Array<string> | null = await store.getActiveModules();
  const entries: Array<CacheEntry> = (await store.list()).filter((entry: CacheEntry) => {
    return activeModules === null || activeModules.indexOf(entry.moduleName) >= 0;
  });
  if (entries.length === 0) {
    throw new UncriticalError('❌ No cached packages found. Run \'pincache install\' first.');
  }

  return {entries: entries, resolvedSet: mergeResolvedPackages(entries)};
}

async function runResolution(context: CommandContext, install: boolean, upgrade: boolean): Promise<number> {
  const {config, store, backend} = context;
  const project: Project = await loadProject(context);
  const installation: {report: InstallReport | null} = {report: null};

  const orchestratorOptions = createOrchestratorOptions({
    store: store,
    resolver: (request: ResolveRequest) => { return backend.resolve(request); },
    resolverIdentity: await backend.identity(),
    concurrency: config.concurrency,
    upgrade: upgrade,
    hooks: install ? {
      install: async (resolvedSet: ResolvedSet): Promise<void> => {
        installation.report = await installResolvedSet(resolvedSet, (specifiers: Array<string>) => {
          return backend.install(specifiers);
        });
      },
    } : {},
  });

  const result: RunResult = await resolveProject(project, orchestratorOptions);
  printRunSummary(result);

  if (!install) {
    printResolvedSet(result);
    console.log('✅ Dependencies resolved');

    return 0;
  }

  if (installation.report !== null) {
    printInstallReport(installation.report);

    return installation.report.ok ? 0 : 1;
  }

  return 0;
}

async function invalidate(context: CommandContext): Promise<number> {
  const {options, store} = context;

  if (options.module !== null) {
    await store.delete(options.module);
    console.log(`✅ Cleared cache for module: ${options.module}`);
  } else {
    await store.deleteAll();
    console.log('✅ Cleared entire dependency cache');
  }

  return 0;
}

async function inspect(context: CommandContext): Promise<number> {
  const entries: Array<CacheEntry> = await context.store.list();
  printCacheInfo(context.store.projectDir, entries);

  return 0;
}

async function check(context: CommandContext): Promise<number> {
  const {resolvedSet} = await loadCachedSet(context.store);
  const installed: InstalledEnvironment = await context.backend.installedPackages();

  console.log(`Checking ${resolvedSet.length} cached packages against ${Object.keys(installed).length} installed packages...`);
  const report: ValidationReport = validateInstalled(resolvedSet, installed);
  printValidationReport(report, context.options.showAll);

  return report.ok ? 0 : 1;
}

async function outdated(context: CommandContext): Promise<number> {
  const {resolvedSet} = await loadCachedSet(context.store);

  console.log(`Checking ${resolvedSet.length} packages for available updates...`);
  printOutdated(findOutdated(resolvedSet, await context.backend.outdatedPackages()));

  return 0;
}

function dispatchCommand(command: CliCommand, context: CommandContext): Promise<number> {
  switch (command) {
    case 'resolve':
      return runResolution(context, false, false);
    case 'install':
      return runResolution(context, true, false);
    case 'upgrade':
      return runResolution(context, true, true);
    case 'invalidate':
      return invalidate(context);
    case 'check':
      return check(context);
    case 'inspect':
      return inspect(context);
    case 'outdated':
      return outdated(context);
  }
}

export async function runCli(argv: Array<string>, dependencies: CliDependencies = {}): Promise<number> {
  const startTime: number = Date.now();

  let options: CliOptions;
  try {
    options = parseArguments(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(usage);

    return 1;
  }

  if (options.help || options.command === null) {
    console.log(usage);

    return options.help ? 0 : 1;
  }

  const command: CliCommand = options.command;

  try {
    const config: Readonly<PincacheConfig> = createConfig(options.config, dependencies.env ?? process.env);
    setLogLevel(config.logLevel);
    logger.silly('process arguments:', argv);
    logger.debug('configuration:', config);

    const store: CacheStore = new CacheStore({cacheDir: config.cacheDir, projectRoot: config.projectRoot});
    await store.open();

    try {
      const exitCode: number = await dispatchCommand(command, {
        options: options,
        config: config,
        store: store,
        backend: dependencies.backend ?? new PipBackend({python: config.python}),
      });
      logger.verbose(`pincache finished in ${SystemTools.formatDuration(Date.now() - startTime)}`);

      return exitCode;
    } finally {
      await store.close();
    }
  } catch (error) {
    if (error instanceof UncriticalError) {
      console.log(error.message);

      return 0;
    }

    if (error instanceof PincacheError || !(error instanceof Error)) {
      logger.error(error instanceof Error ? error.message : String(error));
    } else {
      logger.error(logVerbose() && error.stack !== undefined ? error.stack : error.message);
    }

    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (exitCode: number) => { process.exitCode = exitCode; },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}

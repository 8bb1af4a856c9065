import * as fs from 'fs-extra';
import {minimatch} from 'minimatch';
import * as path from 'path';

import {ModuleRequirements, Project} from './interfaces';
import {logger} from './logger';
import {ModuleInfo, parseRequirementsText} from './module_info';
import {isErrnoException, SystemTools} from './systools';

export const DEFAULT_REQUIREMENTS_PATTERN = 'requirements.txt';

export interface DiscoveryOptions {
  projectRoot: string;
  // folders to search, relative to the project root. Defaults to the root itself
  searchDirs?: Array<string>;
  // minimatch-pattern for requirements files. Without a slash it matches file names
  pattern?: string;
}

async function getFileNames(folderPath: string): Promise<Array<string>> {
  let entries: Array<string>;
  try {
    entries = await fs.readdir(folderPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }

    throw error;
  }

  const fileNames: Array<string | null> = await Promise.all(entries.map(async (entry: string) => {
    try {
      const stats: fs.Stats = await fs.stat(path.join(folderPath, entry));

      return stats.isFile() ? entry : null;
    } catch (error) {
      // dangling symlinks
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }

      throw error;
    }
  }));

  return fileNames.filter((fileName: string | null): fileName is string => {
    return fileName !== null;
  });
}

export const ModuleTools = {

  matchesPattern: (relativePath: string, pattern: string): boolean => {
    const posixPath: string = relativePath.split(path.sep).join('/');

    return minimatch(posixPath, pattern, {matchBase: true});
  },

  findRequirementFiles: async (
    projectRoot: string,
    folder: string,
    pattern: string,
  ): Promise<Array<string>> => {
    const [fileNames, folderNames] = await Promise.all([
      getFileNames(folder),
      SystemTools.getFolderNames(folder),
    ]);

    const result: Array<string> = fileNames
      .map((fileName: string) => { return path.relative(projectRoot, path.join(folder, fileName)); })
      .filter((relativePath: string) => { return ModuleTools.matchesPattern(relativePath, pattern); });

    // walk the subfolders one after another, we can't open too many files at once
    for (const folderName of folderNames) {
      const nested: Array<string> = await ModuleTools.findRequirementFiles(projectRoot, path.join(folder, folderName), pattern);
      result.push(...nested);
    }

    return result;
  },

  discoverModules: async (options: DiscoveryOptions): Promise<Array<ModuleInfo>> => {
    const projectRoot: string = path.resolve(options.projectRoot);
    const pattern: string = options.pattern ?? DEFAULT_REQUIREMENTS_PATTERN;
    const searchDirs: Array<string> = options.searchDirs && options.searchDirs.length > 0 ? options.searchDirs : ['.'];

    const relativePaths: Set<string> = new Set();
    for (const searchDir of searchDirs) {
      const folder: string = path.resolve(projectRoot, searchDir);
      logger.debug(`searching ${folder} for ${pattern}`);

      for (const relativePath of await ModuleTools.findRequirementFiles(projectRoot, folder, pattern)) {
        relativePaths.add(relativePath);
      }
    }

    const modules: Array<ModuleInfo> = [];
    for (const relativePath of Array.from(relativePaths).sort()) {
      modules.push(await ModuleInfo.loadFromFile(projectRoot, relativePath));
    }

    logger.verbose(`found ${modules.length} modules`, modules.map((module: ModuleInfo) => { return module.name; }));

    return modules;
  },

  discoverProject: async (options: DiscoveryOptions): Promise<Project> => {
    const modules: Array<ModuleInfo> = await ModuleTools.discoverModules(options);

    return {
      root: path.resolve(options.projectRoot),
      modules: modules.map((module: ModuleInfo) => { return module.toModuleRequirements(); }),
    };
  },

  // builds a project from requirements that didn't come from discovery,
  // e.g. a single file or packages named on the command-line
  projectFromRequirements: (projectRoot: string, requirementsByModule: {[moduleName: string]: string}): Project => {
    const modules: Array<ModuleRequirements> = Object.keys(requirementsByModule).sort()
      .map((moduleName: string) => {
        return {name: moduleName, requirements: parseRequirementsText(requirementsByModule[moduleName])};
      });

    return {root: path.resolve(projectRoot), modules: modules};
  },
};

import * as fs from 'fs-extra';
import * as path from 'path';

import {ModuleRequirements} from './interfaces';
import {logger} from './logger';

// Keeps the requirement lines of a requirements file. Comments, blank lines
// and pip options (`-r`, `--index-url`, ...) are dropped, continuation lines
// are joined.
export function parseRequirementsText(text: string): Array<string> {
  const requirements: Array<string> = [];
  const joinedText: string = text.replace(/\\\r?\n/g, '');

  for (const rawLine of joinedText.split(/\r?\n/)) {
    const commentIndex: number = rawLine.search(/(^|\s)#/);
    const line: string = (commentIndex >= 0 ? rawLine.substring(0, commentIndex) : rawLine).trim();

    if (line.length === 0) {
      continue;
    }

    if (line.indexOf('-') === 0) {
      logger.debug(`ignoring option line '${line}'`);
      continue;
    }

    requirements.push(line);
  }

  return requirements;
}

export class ModuleInfo {

  private _projectRoot: string;
  private _relativePath: string;
  private _name: string;
  private _requirements: Array<string>;

  constructor(projectRoot: string, relativePath: string, requirements: Array<string>) {
    this._projectRoot = projectRoot;
    this._relativePath = relativePath;
    // module names are posix paths, so the same project gets the same cache-keys on every os
    this._name = relativePath.split(path.sep).join('/');
    this._requirements = requirements;
  }

  public get projectRoot(): string {
    return this._projectRoot;
  }

  public get name(): string {
    return this._name;
  }

  public get location(): string {
    return path.dirname(this.fullFilePath);
  }

  public get fullFilePath(): string {
    return path.join(this._projectRoot, this._relativePath);
  }

  public get requirements(): Array<string> {
    return this._requirements;
  }

  public toModuleRequirements(): ModuleRequirements {
    return {
      name: this._name,
      requirements: this._requirements.slice(),
    };
  }

  public static async loadFromFile(projectRoot: string, relativePath: string): Promise<ModuleInfo> {
    const filePath: string = path.join(projectRoot, relativePath);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      const reason: string = error instanceof Error ? error.message : String(error);
      throw new Error(`couldn't read requirements at '${filePath}': ${reason}`);
    }

    return new ModuleInfo(projectRoot, relativePath, parseRequirementsText(content));
  }
}

import {exec} from 'child_process';
import {randomBytes} from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';

import {logger, logVerbose} from './logger';

export interface RunCommandOptions {
  cwd?: string;
  // don't echo stdout of the command
  silent?: boolean;
  // pip and friends print warnings to stderr even on success
  allowStderr?: boolean;
}

export interface CommandError extends Error {
  code?: number | string;
  stdout?: string;
  stderr?: string;
}

const ignoredFolderNames: Array<string> = ['node_modules', '__pycache__'];

export const SystemTools = {

  runCommand: function runCommand(command: string, options: RunCommandOptions = {}): Promise<string> {
    logger.verbose('running command', command);

    return new Promise<string>((resolve: (stdout: string) => void, reject: (error: CommandError) => void): void => {
      exec(command, {maxBuffer: 2097152, cwd: options.cwd}, (error: Error | null, stdout: string, stderr: string) => {
        if (error !== null) {
          logger.debug('command failed', command, error.message);
          const commandError: CommandError = error;
          commandError.stdout = stdout;
          commandError.stderr = stderr;

          return reject(commandError);
        }

        if (stderr && !options.allowStderr) {
          // eslint-disable-next-line max-len
          return reject(new Error(`\nA command from within pincache produced a warning or an error:\ncommand: ${command}\nlog-output:\n${stdout}\n\nmessage:\n${stderr}\n`));
        }

        if (stderr) {
          logger.verbose(`stderr:\n${stderr}`);
        }

        if (stdout.length > 0 && !options.silent && logVerbose()) {
          process.stdout.write(`\n${stdout}`);
        }

        return resolve(stdout);
      });
    });
  },

  // requirement strings contain <, > and ; which the shell would interpret
  quoteArgument: function quoteArgument(argument: string): string {
    return `"${argument.replace(/(["\\$`])/g, '\\$1')}"`;
  },

  // writes to a sibling temp-file and renames it over the target, so readers
  // see either the old or the new content, never a partial file
  writeFileAtomic: async function writeFileAtomic(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
    await fs.writeFile(tempPath, content, 'utf8');

    try {
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.remove(tempPath);
      throw error;
    }
  },

  getFolderNames: async function getFolderNames(folderPath: string): Promise<Array<string>> {
    let entries: Array<string>;
    try {
      entries = await fs.readdir(folderPath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }

      throw error;
    }

    const folderNames: Array<string | null> = await Promise.all(entries.map((entry: string) => {
      return SystemTools.verifyFolderName(folderPath, entry);
    }));

    return folderNames.filter((folderName: string | null): folderName is string => {
      return folderName !== null;
    });
  },

  verifyFolderName: async function verifyFolderName(folderPath: string, folderName: string): Promise<string | null> {
    if (folderName.indexOf('.') === 0 || ignoredFolderNames.indexOf(folderName) >= 0) {
      return null;
    }

    try {
      const stats: fs.Stats = await fs.stat(path.join(folderPath, folderName));

      return stats.isDirectory() ? folderName : null;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }

      throw error;
    }
  },

  // runs the tasks with at most `limit` of them in flight. After the first
  // rejection no new task is started; the running ones are awaited, then the
  // first error is rethrown
  runWithConcurrency: async function runWithConcurrency<T, R>(
    items: ReadonlyArray<T>,
    limit: number,
    run: (item: T, index: number) => Promise<R>,
  ): Promise<Array<R>> {
    const results: Array<R> = [];
    let nextIndex = 0;
    const failures: Array<unknown> = [];

    const worker = async (): Promise<void> => {
      while (failures.length === 0 && nextIndex < items.length) {
        const index: number = nextIndex;
        nextIndex++;

        try {
          results[index] = await run(items[index], index);
        } catch (error) {
          failures.push(error);
        }
      }
    };

    const workerCount: number = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({length: workerCount}, () => { return worker(); }));

    if (failures.length > 0) {
      throw failures[0];
    }

    return results;
  },

  // `850ms`, `12.3s`, `2m 05s`
  formatDuration: function formatDuration(milliseconds: number): string {
    if (milliseconds < 1000) {
      return `${Math.round(milliseconds)}ms`;
    }

    const seconds: number = milliseconds / 1000;
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    }

    const minutes: number = Math.floor(seconds / 60);
    const remainingSeconds: number = Math.floor(seconds % 60);

    return `${minutes}m ${String(remainingSeconds).padStart(2, '0')}s`;
  },
};

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

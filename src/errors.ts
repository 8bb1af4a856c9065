export class PincacheError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// conditions that end a command early but are not failures of pincache itself,
// e.g. checking an empty cache. The cli prints their message and nothing else.
export class UncriticalError extends PincacheError {}

export class MalformedRequirementError extends PincacheError {
  public readonly requirement: string;
  public readonly position: number | null;
  public readonly reason: string;
  public moduleName: string | null = null;

  constructor(requirement: string, reason: string, position: number | null = null) {
    const at: string = position === null ? '' : ` at position ${position}`;
    super(`malformed requirement '${requirement}'${at}: ${reason}`);
    this.requirement = requirement;
    this.reason = reason;
    this.position = position;
  }

  public inModule(moduleName: string): this {
    this.moduleName = moduleName;
    this.message = `${this.message} (module ${moduleName})`;

    return this;
  }
}

export class ResolutionFailedError extends PincacheError {
  public readonly moduleName: string;

  constructor(moduleName: string, cause: unknown) {
    const reason: string = cause instanceof Error ? cause.message : String(cause);
    super(`resolution failed for module '${moduleName}': ${reason}`, {cause: cause});
    this.moduleName = moduleName;
  }
}

export interface PinConflict {
  canonicalName: string;
  first: {moduleName: string; version: string};
  second: {moduleName: string; version: string};
}

export class VersionConflictError extends PincacheError {
  public readonly conflicts: Array<PinConflict>;

  constructor(conflicts: Array<PinConflict>) {
    const lines: Array<string> = conflicts.map((conflict: PinConflict) => {
      return `  ${conflict.canonicalName}: ${conflict.first.moduleName} pins ${conflict.first.version}, `
        + `${conflict.second.moduleName} pins ${conflict.second.version}`;
    });
    super(`${conflicts.length} cross-module version conflict(s):\n${lines.join('\n')}`);
    this.conflicts = conflicts;
  }
}

export class CacheCorruptionError extends PincacheError {
  public readonly moduleName: string;
  public readonly recordPath: string;

  constructor(moduleName: string, recordPath: string, reason: string) {
    super(`cache record for module '${moduleName}' at '${recordPath}' is unusable: ${reason}`);
    this.moduleName = moduleName;
    this.recordPath = recordPath;
  }
}

export class InstallFailedError extends PincacheError {
  public readonly specifier: string;

  constructor(specifier: string, reason: string) {
    super(`installing ${specifier} failed: ${reason}`);
    this.specifier = specifier;
  }
}

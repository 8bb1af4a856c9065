import {MalformedRequirementError} from './errors';
import {CanonicalRequirement, PinnedPackage, RequirementSpec} from './interfaces';

// stands in for "no constraint", so an unconstrained requirement still hashes to a defined value
export const UNCONSTRAINED = '*';

const namePattern = /[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?/y;
const fullNamePattern = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?$/;
// whitespace is allowed around a clause and between operator and version, never inside the version
const clausePattern = /^\s*(===|==|!=|<=|>=|~=|<|>|=)\s*([A-Za-z0-9.*+!_-]+)\s*$/;

function stripComment(line: string): string {
  for (let index = 0; index < line.length; index++) {
    if (line.charAt(index) === '#' && (index === 0 || /\s/.test(line.charAt(index - 1)))) {
      return line.substring(0, index);
    }
  }

  return line;
}

function skipWhitespace(text: string, index: number): number {
  let position: number = index;
  while (position < text.length && /\s/.test(text.charAt(position))) {
    position++;
  }

  return position;
}

function collapseWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

export function canonicalizeName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

function requirementBody(raw: string): string {
  const line: string = stripComment(raw);
  const markerIndex: number = line.indexOf(';');

  return markerIndex >= 0 ? line.substring(0, markerIndex) : line;
}

function parseExtras(raw: string, extrasText: string, offset: number): Array<string> {
  const extras: Array<string> = [];
  let clauseOffset: number = offset;

  for (const part of extrasText.split(',')) {
    const extra: string = part.trim();
    if (extra.length === 0) {
      clauseOffset += part.length + 1;
      continue;
    }

    if (!fullNamePattern.test(extra)) {
      throw new MalformedRequirementError(raw, `invalid extra '${extra}'`, clauseOffset + part.indexOf(extra));
    }

    extras.push(extra);
    clauseOffset += part.length + 1;
  }

  return extras;
}

export function parseRequirement(raw: string): RequirementSpec {
  const line: string = stripComment(raw);
  const markerIndex: number = line.indexOf(';');
  const body: string = requirementBody(raw);
  const marker: string = markerIndex >= 0 ? collapseWhitespace(line.substring(markerIndex + 1)) : '';

  let position: number = skipWhitespace(body, 0);
  if (position >= body.length) {
    throw new MalformedRequirementError(raw, 'expected a package name', position);
  }

  namePattern.lastIndex = position;
  const nameMatch: RegExpExecArray | null = namePattern.exec(body);
  if (nameMatch === null) {
    throw new MalformedRequirementError(raw, 'expected a package name', position);
  }

  const name: string = nameMatch[0];
  position = skipWhitespace(body, position + name.length);

  let extras: Array<string> = [];
  if (body.charAt(position) === '[') {
    const closingIndex: number = body.indexOf(']', position);
    if (closingIndex < 0) {
      throw new MalformedRequirementError(raw, 'unterminated extras', position);
    }

    extras = parseExtras(raw, body.substring(position + 1, closingIndex), position + 1);
    position = closingIndex + 1;
  }

  if (markerIndex >= 0 && marker.length === 0) {
    throw new MalformedRequirementError(raw, 'empty environment marker', markerIndex);
  }

  return {
    raw: raw,
    name: name,
    extras: extras,
    constraint: body.substring(position).trim(),
    marker: marker,
  };
}

function canonicalizeConstraint(spec: RequirementSpec): string {
  const compact: string = spec.constraint.replace(/\s+/g, '');
  if (compact.length === 0 || compact === UNCONSTRAINED) {
    return UNCONSTRAINED;
  }

  // the constraint is the tail of the requirement body
  const constraintOffset: number = Math.max(0, requirementBody(spec.raw).trimEnd().length - spec.constraint.length);
  const clauses: Array<string> = [];
  let clauseOffset: number = constraintOffset;

  for (const part of spec.constraint.split(',')) {
    const clause: string = part.trim();
    const match: RegExpExecArray | null = clausePattern.exec(part);
    if (match === null) {
      const position: number = clauseOffset + (part.length - part.trimStart().length);
      const reason: string = clause.length === 0 ? 'empty version clause' : `invalid version clause '${clause}'`;
      throw new MalformedRequirementError(spec.raw, reason, position);
    }

    const operator: string = match[1] === '=' ? '==' : match[1];
    clauses.push(`${operator}${match[2].toLowerCase()}`);
    clauseOffset += part.length + 1;
  }

  return Array.from(new Set(clauses)).sort()
    .join(',');
}

export function canonicalize(spec: RequirementSpec): CanonicalRequirement {
  if (!fullNamePattern.test(spec.name)) {
    throw new MalformedRequirementError(spec.raw, `invalid package name '${spec.name}'`, 0);
  }

  const extras: Set<string> = new Set(spec.extras.map((extra: string) => {
    return canonicalizeName(extra);
  }));

  return {
    canonicalName: canonicalizeName(spec.name),
    extras: Array.from(extras).sort(),
    constraint: canonicalizeConstraint(spec),
    marker: collapseWhitespace(spec.marker),
  };
}

export function canonicalizeRequirement(raw: string): CanonicalRequirement {
  return canonicalize(parseRequirement(raw));
}

function formatExtras(extras: ReadonlyArray<string>): string {
  return extras.length > 0 ? `[${extras.join(',')}]` : '';
}

// renders a canonical requirement in the textual form resolvers understand.
// Parsing the result again canonicalizes to the same requirement
export function formatRequirement(requirement: CanonicalRequirement): string {
  const constraint: string = requirement.constraint === UNCONSTRAINED ? '' : requirement.constraint;
  const marker: string = requirement.marker.length > 0 ? `; ${requirement.marker}` : '';

  return `${requirement.canonicalName}${formatExtras(requirement.extras)}${constraint}${marker}`;
}

// like formatRequirement, but keeps the sentinel so every field has a visible value
export function serializeRequirement(requirement: CanonicalRequirement): string {
  const marker: string = requirement.marker.length > 0 ? `;${requirement.marker}` : '';

  return `${requirement.canonicalName}${formatExtras(requirement.extras)}${requirement.constraint}${marker}`;
}

export function compareRequirements(first: CanonicalRequirement, second: CanonicalRequirement): number {
  const firstKey: Array<string> = [first.canonicalName, first.extras.join(','), first.constraint, first.marker];
  const secondKey: Array<string> = [second.canonicalName, second.extras.join(','), second.constraint, second.marker];

  for (let index = 0; index < firstKey.length; index++) {
    if (firstKey[index] < secondKey[index]) {
      return -1;
    }

    if (firstKey[index] > secondKey[index]) {
      return 1;
    }
  }

  return 0;
}

export function parsePinnedSpecifier(specifier: string): PinnedPackage {
  const spec: RequirementSpec = parseRequirement(specifier);
  const canonical: CanonicalRequirement = canonicalize(spec);
  const match: RegExpExecArray | null = /^(===|==)([^,*]+)$/.exec(canonical.constraint);

  if (match === null) {
    throw new MalformedRequirementError(specifier, 'expected a pinned version (name==version)');
  }

  return {
    canonicalName: canonical.canonicalName,
    name: spec.name,
    extras: canonical.extras,
    version: spec.constraint.replace(/\s+/g, '').replace(/^={2,3}/, ''),
    specifier: specifier.trim(),
  };
}

// version equality the way installers report versions: `1.7`, `1.7.0` and `v1.7` are the same
export function normalizeVersion(version: string): string {
  let normalized: string = version.trim().toLowerCase();
  if (normalized.indexOf('v') === 0) {
    normalized = normalized.substring(1);
  }

  const match: RegExpExecArray | null = /^(\d+(?:\.\d+)*)(.*)$/.exec(normalized);
  if (match === null) {
    return normalized;
  }

  const release: Array<string> = match[1].split('.').map((segment: string) => {
    return String(Number(segment));
  });
  while (release.length > 1 && release[release.length - 1] === '0') {
    release.pop();
  }

  return release.join('.') + match[2];
}

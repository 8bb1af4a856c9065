import {createHash} from 'crypto';

import {canonicalizeRequirement, compareRequirements, serializeRequirement} from './canonicalizer';
import {CanonicalRequirement, Fingerprint} from './interfaces';

// bump when the serialization below changes, so old cache entries turn stale
const FINGERPRINT_FORMAT = 'pincache-fingerprint-v1';

export function sortedRequirementSet(requirements: ReadonlyArray<CanonicalRequirement>): Array<CanonicalRequirement> {
  const unique: Map<string, CanonicalRequirement> = new Map();
  for (const requirement of requirements) {
    unique.set(serializeRequirement(requirement), requirement);
  }

  return Array.from(unique.values()).sort(compareRequirements);
}

export function fingerprint(requirements: ReadonlyArray<CanonicalRequirement>): Fingerprint {
  const lines: Array<string> = sortedRequirementSet(requirements).map(serializeRequirement);

  return createHash('sha256')
    .update([FINGERPRINT_FORMAT, ...lines].join('\n'), 'utf8')
    .digest('hex');
}

export function fingerprintRequirements(rawRequirements: ReadonlyArray<string>): Fingerprint {
  return fingerprint(rawRequirements.map((raw: string) => {
    return canonicalizeRequirement(raw);
  }));
}

/**
 * Config fingerprint
 *
 * A stable digest over the inputs that shape a node's registration with the
 * panel. Two specs with equal fingerprints need no replacement.
 */

import { createHash } from 'node:crypto';
import type { NodeSpec } from '../../registry/types.js';

export const FINGERPRINT_PREFIX = 'sha256:';

/**
 * JSON with object keys sorted at every depth
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
}

/**
 * Fingerprint of the registration-relevant parts of a spec
 *
 * The node name is not an input: renaming a node is a destroy plus a create.
 */
export function fingerprint(spec: Pick<NodeSpec, 'region' | 'plan' | 'tags' | 'registration'>): string {
  const material = canonicalJson({
    region: spec.region,
    plan: spec.plan,
    tags: [...new Set(spec.tags)].sort(),
    registration: spec.registration,
  });
  return FINGERPRINT_PREFIX + createHash('sha256').update(material, 'utf8').digest('hex');
}

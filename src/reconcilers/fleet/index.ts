/**
 * Fleet reconciler: desired vs. recorded fleet
 */

export * from './types.js';
export { canonicalJson, fingerprint, FINGERPRINT_PREFIX } from './fingerprint.js';
export {
  diffFleet,
  isDeltaEmpty,
  needsProvisioning,
  summarizeDelta,
  formatDeltaSummary,
  applyDeltaToState,
} from './diff.js';

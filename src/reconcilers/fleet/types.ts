/**
 * Fleet reconciliation types
 */

import type { NodeSpec } from '../../registry/types.js';
import type { NodeState } from '../../state/types.js';

/**
 * Minimal set of actions that moves the current fleet to the desired one.
 * Every list is sorted by node name.
 */
export interface Delta {
  /** Declared but not recorded */
  toCreate: NodeSpec[];
  /** Recorded but no longer declared */
  toDestroy: NodeState[];
  /** On both sides with a fingerprint mismatch */
  toReplaceRegistration: string[];
  /** On both sides, matching and configured */
  unchanged: string[];
  /** On both sides, matching, but never successfully configured */
  toConfigure: string[];
}

/**
 * Counts per action, as shown by `diff` and in run reports
 */
export interface DeltaSummary {
  toCreate: number;
  toDestroy: number;
  toReplaceRegistration: number;
  toConfigure: number;
  unchanged: number;
  total: number;
}

/**
 * State changes confirmed during a pass
 */
export interface StateChanges {
  /** Records to insert or overwrite */
  upsert: NodeState[];
  /** Names whose records are dropped */
  remove: string[];
  /** Names whose configuration succeeded */
  configured: string[];
  /** ISO 8601 timestamp stamped on the state and on `configured` */
  at: string;
}

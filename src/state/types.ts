/**
 * Persisted fleet state
 *
 * One JSON document per fleet, written once at the end of each
 * reconciliation pass.
 */

/** Format version written by this build */
export const STATE_VERSION = 1;

/**
 * Last-known state of one node
 */
export interface NodeState {
  name: string;
  publicAddress: string;
  /** ISO 8601 timestamp the instance was (re)provisioned */
  provisionedAt: string;
  /** Fingerprint of the spec the node was provisioned/registered with */
  configFingerprint: string;
  /** ISO 8601 timestamp of the last successful configuration, null while pending */
  configuredAt: string | null;
  providerId?: string;
  region?: string;
  plan?: string;
  /** Fields this build does not know, written back unchanged */
  extra?: Record<string, unknown>;
}

/**
 * Persisted state of a whole fleet
 */
export interface FleetState {
  version: number;
  fleet: string;
  /** ISO 8601 timestamp of the last write */
  updatedAt: string | null;
  nodes: Record<string, NodeState>;
  /** Top-level fields this build does not know, written back unchanged */
  extra?: Record<string, unknown>;
}

export function emptyFleetState(fleet: string): FleetState {
  return { version: STATE_VERSION, fleet, updatedAt: null, nodes: {} };
}

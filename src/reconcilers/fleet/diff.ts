/**
 * Fleet diff algorithm
 *
 * Compares the desired fleet (from the fleet file) with the last-known fleet
 * state and produces a {@link Delta}. Pure: no I/O, no clock.
 */

import type { NodeSpec } from '../../registry/types.js';
import type { FleetState, NodeState } from '../../state/types.js';
import type { Delta, DeltaSummary, StateChanges } from './types.js';
import { fingerprint } from './fingerprint.js';

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Main diff function
 *
 * - desired only: create
 * - recorded only: destroy
 * - both, fingerprint differs: replace registration
 * - both, fingerprint equal: unchanged, or toConfigure while still pending
 */
export function diffFleet(
  desired: Record<string, NodeSpec>,
  current: Record<string, NodeState>
): Delta {
  const delta: Delta = {
    toCreate: [],
    toDestroy: [],
    toReplaceRegistration: [],
    unchanged: [],
    toConfigure: [],
  };

  for (const name of Object.keys(desired).sort(byName)) {
    const spec = desired[name];
    const recorded = Object.hasOwn(current, name) ? current[name] : undefined;

    if (!recorded) {
      delta.toCreate.push(spec);
    } else if (fingerprint(spec) !== recorded.configFingerprint) {
      delta.toReplaceRegistration.push(name);
    } else if (recorded.configuredAt === null) {
      delta.toConfigure.push(name);
    } else {
      delta.unchanged.push(name);
    }
  }

  for (const name of Object.keys(current).sort(byName)) {
    if (!Object.hasOwn(desired, name)) {
      delta.toDestroy.push(current[name]);
    }
  }

  return delta;
}

/**
 * True when the pass has nothing to provision, destroy or configure
 */
export function isDeltaEmpty(delta: Delta): boolean {
  return delta.toCreate.length === 0
    && delta.toDestroy.length === 0
    && delta.toReplaceRegistration.length === 0
    && delta.toConfigure.length === 0;
}

/**
 * True when the provisioning backend has work to do
 */
export function needsProvisioning(delta: Delta): boolean {
  return delta.toCreate.length > 0
    || delta.toDestroy.length > 0
    || delta.toReplaceRegistration.length > 0;
}

export function summarizeDelta(delta: Delta): DeltaSummary {
  const summary = {
    toCreate: delta.toCreate.length,
    toDestroy: delta.toDestroy.length,
    toReplaceRegistration: delta.toReplaceRegistration.length,
    toConfigure: delta.toConfigure.length,
    unchanged: delta.unchanged.length,
  };
  return {
    ...summary,
    total: summary.toCreate + summary.toDestroy + summary.toReplaceRegistration
      + summary.toConfigure + summary.unchanged,
  };
}

/**
 * Format a delta as a human-readable summary
 */
export function formatDeltaSummary(delta: Delta, fleet?: string): string {
  const lines: string[] = [];
  const summary = summarizeDelta(delta);

  lines.push('Fleet Diff Summary');
  lines.push('==================');
  if (fleet) lines.push(`Fleet: ${fleet}`);
  lines.push('');

  lines.push('Actions:');
  for (const spec of delta.toCreate) {
    lines.push(`  + ${spec.name} (${spec.region}, ${spec.plan})`);
  }
  for (const name of delta.toReplaceRegistration) {
    lines.push(`  ~ ${name} (registration replaced)`);
  }
  for (const name of delta.toConfigure) {
    lines.push(`  > ${name} (pending configuration)`);
  }
  for (const node of delta.toDestroy) {
    lines.push(`  - ${node.name} (${node.publicAddress})`);
  }
  if (summary.unchanged > 0) lines.push(`  = Unchanged: ${summary.unchanged}`);
  lines.push(`  Total: ${summary.total}`);
  lines.push('');

  lines.push(isDeltaEmpty(delta) ? 'Status: IN SYNC' : 'Status: CHANGES NEEDED');
  return lines.join('\n');
}

/**
 * Fold confirmed changes into a fleet state, returning a new state
 *
 * Removals apply first, then upserts, then configuration stamps. A stamp
 * for a name with no record is ignored.
 */
export function applyDeltaToState(state: FleetState, changes: StateChanges): FleetState {
  const nodes: Record<string, NodeState> = { ...state.nodes };

  for (const name of changes.remove) {
    delete nodes[name];
  }
  for (const node of changes.upsert) {
    nodes[node.name] = { ...node };
  }
  for (const name of changes.configured) {
    const node = Object.hasOwn(nodes, name) ? nodes[name] : undefined;
    if (node) {
      nodes[name] = { ...node, configuredAt: changes.at };
    }
  }

  const sorted: Record<string, NodeState> = {};
  for (const name of Object.keys(nodes).sort(byName)) {
    sorted[name] = nodes[name];
  }

  return { ...state, updatedAt: changes.at, nodes: sorted };
}

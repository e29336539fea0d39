/**
 * status command - Show the recorded fleet, optionally checked against the backend
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { FleetState } from '../state/types.js';
import type { StateStore } from '../state/store.js';
import { FleetStateStore } from '../state/store.js';
import type { ProvisionDriver } from '../drivers/provision/types.js';
import type { ProvisionedNode } from '../errors.js';
import { printFleetStatus, warn, verbose, type NodeStatusRow } from '../utils/output.js';
import { createProvisionDriver } from './runtime.js';

export interface StatusOptions {
  /** Compare recorded addresses with what the backend reports */
  live?: boolean;
}

export interface StatusResult {
  fleet: string;
  updatedAt: string | null;
  nodes: NodeStatusRow[];
  /** Backend instances with no record; only with `live` */
  untracked?: string[];
}

export interface StatusSources {
  store?: Pick<StateStore, 'load'>;
  provision?: Pick<ProvisionDriver, 'read'>;
}

/**
 * Build status rows from recorded state and, when given, backend output
 */
export function buildStatusRows(
  state: FleetState,
  live?: Record<string, ProvisionedNode>
): NodeStatusRow[] {
  return Object.values(state.nodes)
    .sort((a, b) => a.name.localeCompare(b.name))
    .map((node) => {
      const row: NodeStatusRow = {
        name: node.name,
        address: node.publicAddress,
        configured: node.configuredAt !== null,
      };
      if (live) {
        const found = Object.hasOwn(live, node.name) ? live[node.name] : undefined;
        if (!found) {
          row.backend = 'missing';
        } else if (found.publicAddress !== node.publicAddress) {
          row.backend = 'address-changed';
          row.liveAddress = found.publicAddress;
        } else {
          row.backend = 'present';
        }
      }
      return row;
    });
}

/**
 * Execute the status command
 */
export async function statusCommand(
  ctx: CommandContext,
  options: StatusOptions = {},
  sources: StatusSources = {}
): Promise<CommandResult<StatusResult>> {
  const { settings, outputFormat } = ctx;
  verbose(`State file: ${settings.statePath}`, settings.verbose);

  const store = sources.store ?? new FleetStateStore(settings.stateDir, settings.fleet);
  const state = await store.load();

  let live: Record<string, ProvisionedNode> | undefined;
  if (options.live) {
    const provision = sources.provision ?? createProvisionDriver(settings, ctx.logger, ctx.env);
    live = await provision.read();
  }

  const nodes = buildStatusRows(state, live);
  const data: StatusResult = { fleet: state.fleet, updatedAt: state.updatedAt, nodes };
  if (live) {
    data.untracked = Object.keys(live).filter(name => !Object.hasOwn(state.nodes, name)).sort();
  }

  const drifted = nodes.filter(n => n.backend === 'missing' || n.backend === 'address-changed');
  const pending = nodes.filter(n => !n.configured);

  if (outputFormat === 'human') {
    printFleetStatus(state.fleet, nodes, state.updatedAt);
    if (data.untracked && data.untracked.length > 0) {
      warn(`Backend has instances with no record: ${data.untracked.join(', ')}`);
    }
  }

  const parts = [`${nodes.length} node(s) recorded`];
  if (pending.length > 0) parts.push(`${pending.length} pending configuration`);
  if (drifted.length > 0) parts.push(`${drifted.length} drifted`);

  return {
    success: true,
    message: `Fleet "${state.fleet}": ${parts.join(', ')}`,
    data,
  };
}

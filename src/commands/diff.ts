/**
 * diff command - Show what a deploy would change, without changing anything
 *
 * Reads the fleet definition and the recorded state only; no lock is taken
 * and no backend is contacted.
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { DesiredFleet } from '../registry/types.js';
import { loadFleet } from '../registry/loader.js';
import type { StateStore } from '../state/store.js';
import { FleetStateStore } from '../state/store.js';
import { diffFleet, isDeltaEmpty, summarizeDelta, type Delta, type DeltaSummary } from '../reconcilers/fleet/index.js';
import { printDelta, info, verbose } from '../utils/output.js';

/**
 * Result of diff command
 */
export interface DiffResult {
  fleet: string;
  inSync: boolean;
  delta: Delta;
  summary: DeltaSummary;
}

export interface DiffSources {
  loadDesired?: () => Promise<DesiredFleet>;
  store?: Pick<StateStore, 'load'>;
}

/**
 * Execute the diff command
 */
export async function diffCommand(
  ctx: CommandContext,
  sources: DiffSources = {}
): Promise<CommandResult<DiffResult>> {
  const { settings, outputFormat } = ctx;

  verbose(`Fleet file: ${settings.fleetFile}`, settings.verbose);
  verbose(`State file: ${settings.statePath}`, settings.verbose);

  const desired = await (sources.loadDesired ?? (() => loadFleet(settings.fleetFile, settings.fleet, { logger: ctx.logger })))();
  const store = sources.store ?? new FleetStateStore(settings.stateDir, settings.fleet);
  const current = await store.load();

  const delta = diffFleet(desired.nodes, current.nodes);
  const summary = summarizeDelta(delta);
  const inSync = isDeltaEmpty(delta);
  const changes = summary.total - summary.unchanged;

  if (outputFormat === 'human') {
    printDelta(delta, outputFormat, desired.name);
    if (!inSync) {
      info('Run `fleet-sync deploy` to apply these changes');
    }
  }

  return {
    success: true,
    message: inSync
      ? `Fleet "${desired.name}" is in sync`
      : `${changes} change(s) pending for fleet "${desired.name}"`,
    data: { fleet: desired.name, inSync, delta, summary },
  };
}

/**
 * Reconciliation orchestrator
 *
 * Drives one pass: load desired fleet, diff against recorded state, gate on
 * confirmation, provision, wait for reachability, configure, persist.
 *
 * Drivers throw typed errors; every step here turns them into an explicit
 * {@link Outcome} and the pass ends in `Failed` with the error on the report.
 * State is written at most once per pass and only ever records what a
 * backend confirmed:
 * - provisioning failure: confirmed creates/replacements are recorded as
 *   pending configuration, confirmed destroys are removed
 * - probe or configuration failure: new and replaced nodes are not
 *   recorded, confirmed destroys are removed
 */

import type { DesiredFleet } from '../registry/types.js';
import type { FleetState, NodeState } from '../state/types.js';
import type { StateStore } from '../state/store.js';
import { acquireLock, type RunLock } from '../state/lock.js';
import type { PlanHandle, ProvisionDriver } from '../drivers/provision/types.js';
import type { ConfigDriver, ConfigTarget } from '../drivers/configure/types.js';
import type { ProbeTarget } from '../probe/connectivity.js';
import {
  applyDeltaToState,
  diffFleet,
  fingerprint,
  needsProvisioning,
  summarizeDelta,
  type Delta,
  type DeltaSummary,
  type StateChanges,
} from '../reconcilers/fleet/index.js';
import { ProvisionError, toError, type ProvisionedNode } from '../errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { RunStateMachine, isTerminal, type RunState, type Transition } from './machine.js';
import { selectConfigureTargets, type ConfigureTargetPolicy } from './policy.js';
import type { ConfirmationRequest, Confirmer } from './confirm.js';

// =============================================================================
// Types
// =============================================================================

/**
 * - deploy: provision, probe, configure
 * - apply: provision only; new nodes are recorded as pending configuration
 * - reboot: run the reboot playbook against every recorded node
 * - destroy: tear down every recorded node and every instance the backend still holds
 */
export type RunMode = 'deploy' | 'apply' | 'reboot' | 'destroy';

export type RunOutcome = 'success' | 'no-changes' | 'cancelled' | 'failed';

export interface FleetProbe {
  probeAll(targets: ProbeTarget[]): Promise<void>;
}

export interface OrchestratorDeps {
  loadDesired(): Promise<DesiredFleet>;
  store: StateStore;
  provision: ProvisionDriver;
  probe: FleetProbe;
  configure: ConfigDriver;
  confirmer: Confirmer;
  logger?: Logger;
  now?: () => Date;
  lock?: (statePath: string) => Promise<RunLock>;
}

export interface RunOptions {
  mode: RunMode;
  /** Skip the confirmation prompt */
  autoApprove?: boolean;
  /** deploy only: configure the full fleet */
  configureAll?: boolean;
  policy?: ConfigureTargetPolicy;
}

export interface RunReport {
  fleet?: string;
  mode: RunMode;
  outcome: RunOutcome;
  finalState: RunState;
  transitions: Transition[];
  delta?: Delta;
  summary?: DeltaSummary;
  created: string[];
  replaced: string[];
  destroyed: string[];
  configured: string[];
  /** Nodes recorded at the end of the pass */
  hosts: ConfigTarget[];
  error?: { name: string; code?: string; message: string };
  startedAt: string;
  finishedAt: string;
}

type Outcome<T> = { ok: true; value: T } | { ok: false; error: Error };

/** Outcome of a step that can also stop at the confirmation gate */
type GatedOutcome<T> = Outcome<T> | { ok: false; cancelled: true };

interface PassContext {
  options: Required<RunOptions>;
  machine: RunStateMachine;
  startedAt: string;
  fleet?: string;
  delta?: Delta;
  created: string[];
  replaced: string[];
  destroyed: string[];
  configured: string[];
  hosts: ConfigTarget[];
}

/**
 * What provisioning produced, handed on to probing/configuring
 */
interface Provisioned {
  /** Records for created and replaced nodes, not yet configured */
  upsert: NodeState[];
  /** Recorded nodes that still need their first configuration */
  pending: string[];
}

async function attempt<T>(fn: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    return { ok: false, error: toError(err) };
  }
}

function hostsOf(state: FleetState): ConfigTarget[] {
  return Object.values(state.nodes).map(n => ({ name: n.name, address: n.publicAddress }));
}

/**
 * Lines shown at the confirmation prompt
 */
export function describeDelta(delta: Delta): string[] {
  return [
    ...delta.toCreate.map(s => `+ ${s.name} (${s.region}, ${s.plan})`),
    ...delta.toReplaceRegistration.map(n => `~ ${n} (registration replaced)`),
    ...delta.toDestroy.map(n => `- ${n.name} (${n.publicAddress})`),
  ];
}

// =============================================================================
// Orchestrator
// =============================================================================

export class Orchestrator {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.log = deps.logger ?? silentLogger();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run one reconciliation pass. Never throws for operational failures;
   * inspect `outcome` on the report.
   */
  async run(options: RunOptions): Promise<RunReport> {
    const ctx: PassContext = {
      options: {
        mode: options.mode,
        autoApprove: options.autoApprove ?? false,
        configureAll: options.configureAll ?? false,
        policy: options.policy ?? 'conservative',
      },
      machine: new RunStateMachine(this.now),
      startedAt: this.now().toISOString(),
      created: [],
      replaced: [],
      destroyed: [],
      configured: [],
      hosts: [],
    };

    let lock: RunLock | undefined;
    try {
      const desired = await attempt(() => this.deps.loadDesired());
      if (!desired.ok) return this.fail(ctx, desired.error);
      ctx.fleet = desired.value.name;
      ctx.machine.to('DesiredLoaded', `${Object.keys(desired.value.nodes).length} node(s) declared`);

      const takeLock = this.deps.lock ?? acquireLock;
      const locked = await attempt(() => takeLock(this.deps.store.statePath));
      if (!locked.ok) return this.fail(ctx, locked.error);
      lock = locked.value;

      const current = await attempt(() => this.deps.store.load());
      if (!current.ok) return this.fail(ctx, current.error);

      switch (ctx.options.mode) {
        case 'destroy':
          return await this.runDestroy(ctx, current.value);
        case 'reboot':
          return await this.runReboot(ctx, desired.value, current.value);
        default:
          return await this.runConverge(ctx, desired.value, current.value);
      }
    } finally {
      if (lock) {
        await lock.release().catch((err: unknown) => {
          this.log.warn('Failed to release run lock', { error: toError(err).message });
        });
      }
    }
  }

  // ===========================================================================
  // Modes
  // ===========================================================================

  private async runDestroy(ctx: PassContext, current: FleetState): Promise<RunReport> {
    const delta = diffFleet({}, current.nodes);
    ctx.delta = delta;

    // Instances a failed pass left unrecorded are torn down too
    const live = await attempt(() => this.deps.provision.read());
    if (!live.ok) return this.fail(ctx, live.error);
    const untracked = Object.values(live.value)
      .filter(node => !Object.hasOwn(current.nodes, node.name))
      .sort((a, b) => a.name.localeCompare(b.name));
    const names = [...delta.toDestroy.map(n => n.name), ...untracked.map(n => n.name)].sort();

    if (names.length === 0) {
      ctx.machine.to('NoChanges', 'nothing recorded or live');
      return this.finish(ctx, 'no-changes');
    }
    if (untracked.length > 0) {
      this.log.warn(`Backend holds ${untracked.length} unrecorded node(s)`, { nodes: untracked.map(n => n.name) });
    }

    ctx.machine.to('AwaitingDestroyConfirmation');
    const approved = await this.confirm(ctx, {
      kind: 'destroy',
      message: `Destroy all ${names.length} node(s) of fleet "${current.fleet}"`,
      details: [
        ...describeDelta(delta),
        ...untracked.map(n => `- ${n.name} (${n.publicAddress}, untracked)`),
      ],
    });
    if (!approved.ok) return this.fail(ctx, approved.error);
    if (!approved.value) return this.cancel(ctx);

    ctx.machine.to('Provisioning', `destroy ${names.join(', ')}`);
    const destroyed = await attempt(() => this.deps.provision.destroy(names));
    if (!destroyed.ok) {
      ctx.destroyed = destroyed.error instanceof ProvisionError ? destroyed.error.destroyed : [];
      await this.persistAfterFailure(ctx, current, { upsert: [], remove: ctx.destroyed, configured: [] });
      return this.fail(ctx, destroyed.error);
    }
    ctx.destroyed = names;

    const persisted = await this.persist(ctx, current, { upsert: [], remove: names, configured: [] });
    if (!persisted.ok) return this.fail(ctx, persisted.error);
    ctx.machine.to('Persisted');
    return this.finish(ctx, 'success');
  }

  private async runReboot(ctx: PassContext, desired: DesiredFleet, current: FleetState): Promise<RunReport> {
    const targets = hostsOf(current);
    ctx.hosts = targets;
    if (targets.length === 0) {
      ctx.machine.to('NoChanges', 'nothing recorded');
      return this.finish(ctx, 'no-changes');
    }

    const playbook = desired.playbooks.reboot ?? desired.playbooks.configure;
    ctx.machine.to('Configuring', playbook);
    this.log.info(`Rebooting ${targets.length} node(s)`, { playbook });

    const result = await attempt(() =>
      this.deps.configure.apply({ playbook, targets, vars: { ...desired.vars, reboot_infra: true } })
    );
    if (!result.ok) return this.fail(ctx, result.error);

    ctx.configured = targets.map(t => t.name);
    return this.finish(ctx, 'success');
  }

  private async runConverge(ctx: PassContext, desired: DesiredFleet, current: FleetState): Promise<RunReport> {
    const delta = diffFleet(desired.nodes, current.nodes);
    ctx.delta = delta;
    const summary = summarizeDelta(delta);
    ctx.machine.to(
      'Diffed',
      `create=${summary.toCreate} replace=${summary.toReplaceRegistration} destroy=${summary.toDestroy} pending=${summary.toConfigure}`
    );

    const deploy = ctx.options.mode === 'deploy';
    const pending = deploy ? delta.toConfigure : [];

    if (!needsProvisioning(delta) && pending.length === 0) {
      ctx.machine.to('NoChanges');
      ctx.hosts = hostsOf(current);
      if (deploy && ctx.options.configureAll && ctx.hosts.length > 0) {
        return this.probeConfigurePersist(ctx, desired, current, { upsert: [], pending: [] });
      }
      this.log.info('Fleet is in sync');
      return this.finish(ctx, 'no-changes');
    }

    if (!needsProvisioning(delta)) {
      return this.probeConfigurePersist(ctx, desired, current, { upsert: [], pending });
    }

    const provisioned = await this.provision(ctx, desired, current, delta);
    if (!provisioned.ok) {
      return 'cancelled' in provisioned ? this.cancel(ctx) : this.fail(ctx, provisioned.error);
    }

    if (!deploy) {
      const persisted = await this.persist(ctx, current, {
        upsert: provisioned.value.upsert,
        remove: ctx.destroyed,
        configured: [],
      });
      if (!persisted.ok) return this.fail(ctx, persisted.error);
      ctx.machine.to('Persisted');
      return this.finish(ctx, 'success');
    }

    return this.probeConfigurePersist(ctx, desired, current, {
      upsert: provisioned.value.upsert,
      pending,
    });
  }

  // ===========================================================================
  // Steps
  // ===========================================================================

  /**
   * Plan, confirm, apply, destroy. On failure the confirmed part is already
   * persisted when this returns.
   */
  private async provision(
    ctx: PassContext,
    desired: DesiredFleet,
    current: FleetState,
    delta: Delta
  ): Promise<GatedOutcome<Provisioned>> {
    const request = {
      fleet: desired.name,
      create: delta.toCreate,
      replace: delta.toReplaceRegistration.map(name => desired.nodes[name]),
      retain: [...delta.unchanged, ...delta.toConfigure].sort().map(name => desired.nodes[name]),
    };

    const planned = await attempt(() => this.deps.provision.planCreate(request));
    if (!planned.ok) return planned;
    const plan = planned.value;
    if (plan.status === 'error') return { ok: false, error: plan.error };

    const gated = plan.status === 'changes-pending'
      || delta.toDestroy.length > 0
      || delta.toReplaceRegistration.length > 0;

    if (gated) {
      ctx.machine.to('AwaitingApplyConfirmation', plan.status === 'changes-pending' ? plan.summary : undefined);
      const approved = await this.confirm(ctx, {
        kind: 'apply',
        message: `Apply changes to fleet "${desired.name}"${plan.status === 'changes-pending' && plan.summary ? ` (${plan.summary})` : ''}`,
        details: describeDelta(delta),
      });
      if (!approved.ok || !approved.value) {
        await this.discard(plan.handle);
        return approved.ok ? { ok: false, cancelled: true } : approved;
      }
    }

    ctx.machine.to('Provisioning');
    const wanted = [...request.create, ...request.replace].map(s => s.name);
    let applied = await attempt(() => this.deps.provision.apply(plan.handle));
    if (applied.ok) {
      const nodes = applied.value;
      const missing = wanted.filter(name => !Object.hasOwn(nodes, name));
      if (missing.length > 0) {
        applied = {
          ok: false,
          error: new ProvisionError(`Backend reported no address for: ${missing.join(', ')}`, {
            succeeded: nodes,
            failed: missing,
          }),
        };
      }
    }

    if (!applied.ok) {
      const confirmed = applied.error instanceof ProvisionError ? applied.error.succeeded : {};
      const upsert = this.recordsFor(confirmed, desired, current, delta);
      this.noteProvisioned(ctx, upsert, delta);
      await this.persistAfterFailure(ctx, current, { upsert, remove: [], configured: [] });
      return applied;
    }

    const upsert = this.recordsFor(applied.value, desired, current, delta);
    this.noteProvisioned(ctx, upsert, delta);
    this.log.info(`Provisioned ${upsert.length} node(s)`, { nodes: upsert.map(n => n.name) });

    if (delta.toDestroy.length > 0) {
      const names = delta.toDestroy.map(n => n.name);
      const destroyed = await attempt(() => this.deps.provision.destroy(names));
      if (!destroyed.ok) {
        ctx.destroyed = destroyed.error instanceof ProvisionError ? destroyed.error.destroyed : [];
        await this.persistAfterFailure(ctx, current, { upsert, remove: ctx.destroyed, configured: [] });
        return destroyed;
      }
      ctx.destroyed = names;
      this.log.info(`Destroyed ${names.length} node(s)`, { nodes: names });
    }

    return { ok: true, value: { upsert, pending: [] } };
  }

  private async probeConfigurePersist(
    ctx: PassContext,
    desired: DesiredFleet,
    current: FleetState,
    provisioned: Provisioned
  ): Promise<RunReport> {
    const addresses = new Map<string, string>();
    for (const node of [...Object.values(current.nodes), ...provisioned.upsert]) {
      addresses.set(node.name, node.publicAddress);
    }

    const fresh = [...ctx.created, ...provisioned.pending].sort();
    if (fresh.length > 0) {
      ctx.machine.to('Probing', fresh.join(', '));
      const probed = await attempt(async () => this.deps.probe.probeAll(this.targetsFor(fresh, addresses)));
      if (!probed.ok) {
        await this.persistAfterFailure(ctx, current, { upsert: [], remove: ctx.destroyed, configured: [] });
        return this.fail(ctx, probed.error);
      }
    }

    const names = selectConfigureTargets({
      policy: ctx.options.policy,
      configureAll: ctx.options.configureAll,
      created: ctx.created,
      replaced: ctx.replaced,
      pending: provisioned.pending,
      fleet: Object.keys(desired.nodes).filter(name => addresses.has(name)),
    });

    if (names.length > 0) {
      ctx.machine.to('Configuring', desired.playbooks.configure);
      const configured = await attempt(async () =>
        this.deps.configure.apply({
          playbook: desired.playbooks.configure,
          targets: this.targetsFor(names, addresses),
          vars: { ...desired.vars, reboot_infra: ctx.created.length > 0 },
        })
      );
      if (!configured.ok) {
        await this.persistAfterFailure(ctx, current, { upsert: [], remove: ctx.destroyed, configured: [] });
        return this.fail(ctx, configured.error);
      }
      ctx.configured = names;
    }

    const persisted = await this.persist(ctx, current, {
      upsert: provisioned.upsert,
      remove: ctx.destroyed,
      configured: names,
    });
    if (!persisted.ok) return this.fail(ctx, persisted.error);
    ctx.machine.to('Persisted');
    return this.finish(ctx, 'success');
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async confirm(ctx: PassContext, request: ConfirmationRequest): Promise<Outcome<boolean>> {
    if (ctx.options.autoApprove) {
      this.log.info('Confirmation skipped (auto-approve)', { kind: request.kind });
      return { ok: true, value: true };
    }
    const answer = await attempt(() => this.deps.confirmer.confirm(request));
    if (answer.ok && !answer.value) {
      this.log.warn('Declined by operator; nothing was changed', { kind: request.kind });
    }
    return answer;
  }

  private async discard(handle: PlanHandle): Promise<void> {
    await this.deps.provision.discard(handle).catch((err: unknown) => {
      this.log.warn('Failed to discard plan', { error: toError(err).message });
    });
  }

  private targetsFor(names: string[], addresses: Map<string, string>): ConfigTarget[] {
    return names.map(name => {
      const address = addresses.get(name);
      if (!address) {
        throw new Error(`No known address for node "${name}"`);
      }
      return { name, address };
    });
  }

  /**
   * Records for the created/replaced nodes present in `provisioned`
   */
  private recordsFor(
    provisioned: Record<string, ProvisionedNode>,
    desired: DesiredFleet,
    current: FleetState,
    delta: Delta
  ): NodeState[] {
    const at = this.now().toISOString();
    const names = [...delta.toCreate.map(s => s.name), ...delta.toReplaceRegistration].sort();
    const records: NodeState[] = [];

    for (const name of names) {
      if (!Object.hasOwn(provisioned, name)) continue;
      const node = provisioned[name];
      const spec = desired.nodes[name];
      const previous = Object.hasOwn(current.nodes, name) ? current.nodes[name] : undefined;

      const record: NodeState = {
        name,
        publicAddress: node.publicAddress,
        provisionedAt: previous ? previous.provisionedAt : at,
        configFingerprint: fingerprint(spec),
        configuredAt: null,
        region: spec.region,
        plan: spec.plan,
      };
      const providerId = node.providerId ?? previous?.providerId;
      if (providerId) record.providerId = providerId;
      if (previous?.extra) record.extra = previous.extra;
      records.push(record);
    }
    return records;
  }

  private noteProvisioned(ctx: PassContext, upsert: NodeState[], delta: Delta): void {
    const created = new Set(delta.toCreate.map(s => s.name));
    ctx.created = upsert.filter(n => created.has(n.name)).map(n => n.name);
    ctx.replaced = upsert.filter(n => !created.has(n.name)).map(n => n.name);
  }

  private async persist(
    ctx: PassContext,
    current: FleetState,
    changes: Omit<StateChanges, 'at'>
  ): Promise<Outcome<FleetState>> {
    const next = applyDeltaToState(current, { ...changes, at: this.now().toISOString() });
    const written = await attempt(() => this.deps.store.persist(next));
    if (!written.ok) return written;
    ctx.hosts = hostsOf(next);
    this.log.debug('Fleet state written', { path: this.deps.store.statePath, nodes: Object.keys(next.nodes) });
    return { ok: true, value: next };
  }

  /**
   * Record what was confirmed before a failure. A write error here is logged;
   * the original failure is what the report carries.
   */
  private async persistAfterFailure(
    ctx: PassContext,
    current: FleetState,
    changes: Omit<StateChanges, 'at'>
  ): Promise<void> {
    if (changes.upsert.length === 0 && changes.remove.length === 0) {
      ctx.hosts = hostsOf(current);
      return;
    }
    const persisted = await this.persist(ctx, current, changes);
    if (!persisted.ok) {
      this.log.error('Failed to record confirmed changes', persisted.error, {
        upsert: changes.upsert.map(n => n.name),
        remove: changes.remove,
      });
    }
  }

  private report(ctx: PassContext, outcome: RunOutcome, error?: Error): RunReport {
    const report: RunReport = {
      fleet: ctx.fleet,
      mode: ctx.options.mode,
      outcome,
      finalState: ctx.machine.state,
      transitions: ctx.machine.transitions,
      created: ctx.created,
      replaced: ctx.replaced,
      destroyed: ctx.destroyed,
      configured: ctx.configured,
      hosts: ctx.hosts,
      startedAt: ctx.startedAt,
      finishedAt: this.now().toISOString(),
    };
    if (ctx.delta) {
      report.delta = ctx.delta;
      report.summary = summarizeDelta(ctx.delta);
    }
    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      report.error = { name: error.name, message: error.message, ...(code ? { code } : {}) };
    }
    return report;
  }

  private finish(ctx: PassContext, outcome: RunOutcome): RunReport {
    if (!isTerminal(ctx.machine.state)) ctx.machine.to('Done');
    this.log.info(`Run finished: ${outcome}`, { fleet: ctx.fleet, mode: ctx.options.mode });
    return this.report(ctx, outcome);
  }

  private cancel(ctx: PassContext): RunReport {
    ctx.machine.to('Done', 'declined');
    return this.report(ctx, 'cancelled');
  }

  private fail(ctx: PassContext, error: Error): RunReport {
    ctx.machine.to('Failed', error.message);
    this.log.error('Run failed', error, { fleet: ctx.fleet, state: ctx.machine.transitions.at(-1)?.from });
    return this.report(ctx, 'failed', error);
  }
}

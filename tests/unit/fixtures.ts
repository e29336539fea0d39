/**
 * Test fixtures and in-memory stand-ins for the orchestrator's collaborators
 */

import type { DesiredFleet, NodeSpec } from '../../src/registry/types.js';
import type { FleetState, NodeState } from '../../src/state/types.js';
import type { StateStore } from '../../src/state/store.js';
import type { RunLock } from '../../src/state/lock.js';
import type {
  PlanHandle,
  PlanRequest,
  PlanResult,
  ProvisionDriver,
} from '../../src/drivers/provision/types.js';
import type { ConfigDriver, ConfigRequest } from '../../src/drivers/configure/types.js';
import type { ProbeTarget } from '../../src/probe/connectivity.js';
import type { Confirmer, ConfirmationRequest } from '../../src/orchestrator/confirm.js';
import type { FleetProbe, OrchestratorDeps } from '../../src/orchestrator/orchestrator.js';
import { fingerprint } from '../../src/reconcilers/fleet/fingerprint.js';
import { ProvisionError, ConfigurationError, UnreachableError, type ProvisionedNode } from '../../src/errors.js';

export const T0 = '2026-01-01T00:00:00.000Z';
export const T1 = '2026-01-02T00:00:00.000Z';

// =============================================================================
// Factories
// =============================================================================

export function nodeSpec(name: string, overrides: Partial<NodeSpec> = {}): NodeSpec {
  return {
    name,
    region: 'nrt',
    plan: 'vc2-1c-1gb',
    tags: [],
    registration: { profile: 'default' },
    ...overrides,
  };
}

export function desiredFleet(specs: NodeSpec[], overrides: Partial<DesiredFleet> = {}): DesiredFleet {
  const nodes: Record<string, NodeSpec> = {};
  for (const spec of specs) nodes[spec.name] = spec;
  return {
    name: 'nodes',
    nodes,
    playbooks: { configure: 'node-configure.yml' },
    vars: {},
    sourcePath: '/tmp/fleet.yaml',
    ...overrides,
  };
}

/**
 * A configured record matching `spec`
 */
export function nodeState(spec: NodeSpec, address: string, overrides: Partial<NodeState> = {}): NodeState {
  return {
    name: spec.name,
    publicAddress: address,
    provisionedAt: T0,
    configFingerprint: fingerprint(spec),
    configuredAt: T0,
    region: spec.region,
    plan: spec.plan,
    ...overrides,
  };
}

export function fleetState(records: NodeState[], fleet = 'nodes'): FleetState {
  const nodes: Record<string, NodeState> = {};
  for (const record of records) nodes[record.name] = record;
  return { version: 1, fleet, updatedAt: records.length > 0 ? T0 : null, nodes };
}

// =============================================================================
// Fakes
// =============================================================================

export class MemoryStateStore implements StateStore {
  readonly statePath = '/tmp/fleet-state/nodes.json';
  writes: FleetState[] = [];
  failWrites = false;

  constructor(public state: FleetState = fleetState([])) {}

  async load(): Promise<FleetState> {
    return structuredClone(this.state);
  }

  async persist(state: FleetState): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    this.state = structuredClone(state);
    this.writes.push(structuredClone(state));
  }
}

/**
 * Provisioning backend that assigns addresses 10.0.0.1, 10.0.0.2, ... in
 * creation order and keeps its own view of live instances.
 */
export class FakeProvisionDriver implements ProvisionDriver {
  live: Record<string, ProvisionedNode> = {};
  plans: PlanRequest[] = [];
  applied: PlanHandle[] = [];
  discarded: PlanHandle[] = [];
  destroyed: string[][] = [];
  /** Names whose creation fails on apply */
  failOnApply = new Set<string>();
  /** Names whose destroy fails */
  failOnDestroy = new Set<string>();
  planError?: ProvisionError;
  private counter = 0;

  constructor(initial: Record<string, string> = {}) {
    for (const [name, address] of Object.entries(initial)) {
      this.live[name] = { name, publicAddress: address };
    }
  }

  async planCreate(request: PlanRequest): Promise<PlanResult> {
    this.plans.push(request);
    const handle: PlanHandle = { ref: `plan-${this.plans.length}`, request };
    if (this.planError) return { status: 'error', error: this.planError };
    const changes = request.create.length + request.replace.length;
    return changes > 0
      ? { status: 'changes-pending', handle, summary: `Plan: ${changes} to add` }
      : { status: 'no-changes', handle };
  }

  async apply(handle: PlanHandle): Promise<Record<string, ProvisionedNode>> {
    this.applied.push(handle);
    const result: Record<string, ProvisionedNode> = {};
    const failed: string[] = [];
    for (const spec of [...handle.request.create, ...handle.request.replace]) {
      if (this.failOnApply.has(spec.name)) {
        failed.push(spec.name);
        continue;
      }
      const existing = Object.hasOwn(this.live, spec.name) ? this.live[spec.name] : undefined;
      const node = existing ?? { name: spec.name, publicAddress: `10.0.0.${++this.counter}` };
      this.live[spec.name] = node;
      result[spec.name] = node;
    }
    if (failed.length > 0) {
      throw new ProvisionError(`apply failed for ${failed.join(', ')}`, { succeeded: result, failed });
    }
    return result;
  }

  async discard(handle: PlanHandle): Promise<void> {
    this.discarded.push(handle);
  }

  async destroy(names: string[]): Promise<void> {
    this.destroyed.push([...names]);
    const done: string[] = [];
    for (const name of names) {
      if (this.failOnDestroy.has(name)) continue;
      delete this.live[name];
      done.push(name);
    }
    const failed = names.filter(n => !done.includes(n));
    if (failed.length > 0) {
      throw new ProvisionError(`destroy failed for ${failed.join(', ')}`, { destroyed: done, failed });
    }
  }

  async read(names?: string[]): Promise<Record<string, ProvisionedNode>> {
    if (!names) return { ...this.live };
    const result: Record<string, ProvisionedNode> = {};
    for (const name of names) {
      if (Object.hasOwn(this.live, name)) result[name] = this.live[name];
    }
    return result;
  }
}

export class FakeProbe implements FleetProbe {
  calls: ProbeTarget[][] = [];
  unreachable = new Set<string>();

  async probeAll(targets: ProbeTarget[]): Promise<void> {
    this.calls.push(targets);
    const down = targets.filter(t => this.unreachable.has(t.name)).map(t => t.address);
    if (down.length > 0) throw new UnreachableError(down, 3);
  }
}

export class FakeConfigDriver implements ConfigDriver {
  requests: ConfigRequest[] = [];
  failHosts = new Set<string>();

  async apply(request: ConfigRequest): Promise<void> {
    this.requests.push(request);
    const failed = request.targets.filter(t => this.failHosts.has(t.name)).map(t => t.name);
    if (failed.length > 0) {
      throw new ConfigurationError(`${request.playbook} failed on ${failed.join(', ')}`, failed, 2);
    }
  }
}

export class ScriptedConfirmer implements Confirmer {
  requests: ConfirmationRequest[] = [];

  constructor(private readonly answer: boolean) {}

  async confirm(request: ConfirmationRequest): Promise<boolean> {
    this.requests.push(request);
    return this.answer;
  }
}

/**
 * Clock that advances one second per call, starting at T1
 */
export function steppingClock(): () => Date {
  let tick = 0;
  const base = Date.parse(T1);
  return () => new Date(base + 1000 * tick++);
}

export interface Harness {
  store: MemoryStateStore;
  provision: FakeProvisionDriver;
  probe: FakeProbe;
  configure: FakeConfigDriver;
  confirmer: ScriptedConfirmer;
  desired: DesiredFleet;
  deps: OrchestratorDeps;
  locks: string[];
}

/**
 * Wire fakes into orchestrator dependencies
 */
export function createHarness(options: {
  desired: DesiredFleet;
  state?: FleetState;
  live?: Record<string, string>;
  approve?: boolean;
}): Harness {
  const store = new MemoryStateStore(options.state ?? fleetState([]));
  const provision = new FakeProvisionDriver(options.live ?? {});
  const probe = new FakeProbe();
  const configure = new FakeConfigDriver();
  const confirmer = new ScriptedConfirmer(options.approve ?? true);
  const locks: string[] = [];

  const harness: Harness = {
    store,
    provision,
    probe,
    configure,
    confirmer,
    desired: options.desired,
    locks,
    deps: {
      loadDesired: async () => harness.desired,
      store,
      provision,
      probe,
      configure,
      confirmer,
      now: steppingClock(),
      lock: async (statePath: string): Promise<RunLock> => {
        locks.push(statePath);
        return { lockPath: `${statePath}.lock`, release: async () => undefined };
      },
    },
  };
  return harness;
}

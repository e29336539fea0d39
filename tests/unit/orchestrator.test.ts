/**
 * Unit Tests: Reconciliation Orchestrator
 *
 * Drives whole passes against in-memory backends:
 * - creation, no-op, destroy and probe-timeout scenarios
 * - partial provisioning failure and resumption
 * - confirmation gates and cancellation
 * - apply/reboot modes and configure target policies
 */

import { describe, it, expect } from 'vitest';
import { Orchestrator, type RunReport } from '../../src/orchestrator/orchestrator.js';
import { diffFleet, isDeltaEmpty } from '../../src/reconcilers/fleet/diff.js';
import { fingerprint } from '../../src/reconcilers/fleet/fingerprint.js';
import { ConcurrentRunError, ConfigError, ProvisionError } from '../../src/errors.js';
import {
  T0,
  createHarness,
  desiredFleet,
  fleetState,
  nodeSpec,
  nodeState,
} from './fixtures.js';

function path(report: RunReport): string[] {
  return report.transitions.map(t => t.to);
}

// =============================================================================
// Scenarios
// =============================================================================

describe('Orchestrator scenarios', () => {
  it('creates, probes and configures a newly declared node', async () => {
    const spec = nodeSpec('node-jp-0', { region: 'jp', plan: 'p1' });
    const h = createHarness({ desired: desiredFleet([spec]) });

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('success');
    expect(report.delta?.toCreate.map(s => s.name)).toEqual(['node-jp-0']);
    expect(report.delta?.toDestroy).toEqual([]);
    expect(report.delta?.toReplaceRegistration).toEqual([]);
    expect(path(report)).toEqual([
      'DesiredLoaded',
      'Diffed',
      'AwaitingApplyConfirmation',
      'Provisioning',
      'Probing',
      'Configuring',
      'Persisted',
      'Done',
    ]);

    expect(h.probe.calls).toEqual([[{ name: 'node-jp-0', address: '10.0.0.1' }]]);
    expect(h.configure.requests).toEqual([
      {
        playbook: 'node-configure.yml',
        targets: [{ name: 'node-jp-0', address: '10.0.0.1' }],
        vars: { reboot_infra: true },
      },
    ]);

    expect(h.store.writes).toHaveLength(1);
    const record = h.store.state.nodes['node-jp-0'];
    expect(record).toMatchObject({
      name: 'node-jp-0',
      publicAddress: '10.0.0.1',
      configFingerprint: fingerprint(spec),
      region: 'jp',
      plan: 'p1',
    });
    expect(record?.configuredAt).not.toBeNull();
    expect(report.created).toEqual(['node-jp-0']);
    expect(report.configured).toEqual(['node-jp-0']);
    expect(report.hosts).toEqual([{ name: 'node-jp-0', address: '10.0.0.1' }]);
  });

  it('ends in NoChanges without touching any backend when the fleet matches', async () => {
    const spec = nodeSpec('node-jp-0', { plan: 'p1' });
    const h = createHarness({
      desired: desiredFleet([spec]),
      state: fleetState([nodeState(spec, '10.0.0.9')]),
    });

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('no-changes');
    expect(report.delta?.unchanged).toEqual(['node-jp-0']);
    expect(path(report)).toEqual(['DesiredLoaded', 'Diffed', 'NoChanges', 'Done']);
    expect(h.provision.plans).toHaveLength(0);
    expect(h.confirmer.requests).toHaveLength(0);
    expect(h.probe.calls).toHaveLength(0);
    expect(h.configure.requests).toHaveLength(0);
    expect(h.store.writes).toHaveLength(0);
    expect(report.hosts).toEqual([{ name: 'node-jp-0', address: '10.0.0.9' }]);
  });

  it('destroys every recorded node and clears the state when confirmed', async () => {
    const spec = nodeSpec('node-jp-0');
    const h = createHarness({
      desired: desiredFleet([]),
      state: fleetState([nodeState(spec, '10.0.0.9')]),
      live: { 'node-jp-0': '10.0.0.9' },
    });

    const report = await new Orchestrator(h.deps).run({ mode: 'destroy' });

    expect(report.outcome).toBe('success');
    expect(report.delta?.toDestroy.map(n => n.name)).toEqual(['node-jp-0']);
    expect(path(report)).toEqual([
      'DesiredLoaded',
      'AwaitingDestroyConfirmation',
      'Provisioning',
      'Persisted',
      'Done',
    ]);
    expect(h.confirmer.requests.map(r => r.kind)).toEqual(['destroy']);
    expect(h.provision.destroyed).toEqual([['node-jp-0']]);
    expect(h.store.state.nodes).toEqual({});
    expect(report.destroyed).toEqual(['node-jp-0']);
    expect(report.hosts).toEqual([]);
  });

  it('records neither new node when one of two never becomes reachable', async () => {
    const h = createHarness({ desired: desiredFleet([nodeSpec('node-a'), nodeSpec('node-b')]) });
    h.probe.unreachable.add('node-b');

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('failed');
    expect(report.finalState).toBe('Failed');
    expect(report.error?.code).toBe('UNREACHABLE');
    expect(report.error?.message).toBe('Unreachable: 10.0.0.2 after 3 attempt(s)');
    expect(Object.keys(h.provision.live).sort()).toEqual(['node-a', 'node-b']);
    expect(h.configure.requests).toHaveLength(0);
    expect(h.store.writes).toHaveLength(0);
    expect(h.store.state.nodes).toEqual({});
  });

  it('destroys instances a failed pass left unrecorded', async () => {
    const h = createHarness({ desired: desiredFleet([nodeSpec('node-a'), nodeSpec('node-b')]) });
    h.probe.unreachable.add('node-b');
    await new Orchestrator(h.deps).run({ mode: 'deploy' });

    const report = await new Orchestrator(h.deps).run({ mode: 'destroy' });

    expect(report.outcome).toBe('success');
    expect(h.confirmer.requests.map(r => r.kind)).toEqual(['apply', 'destroy']);
    expect(h.confirmer.requests[1]?.message).toBe('Destroy all 2 node(s) of fleet "nodes"');
    expect(h.confirmer.requests[1]?.details).toEqual([
      '- node-a (10.0.0.1, untracked)',
      '- node-b (10.0.0.2, untracked)',
    ]);
    expect(h.provision.destroyed).toEqual([['node-a', 'node-b']]);
    expect(h.provision.live).toEqual({});
    expect(report.destroyed).toEqual(['node-a', 'node-b']);
  });

  it('lists recorded and unrecorded instances together at the destroy prompt', async () => {
    const spec = nodeSpec('node-b');
    const h = createHarness({
      desired: desiredFleet([]),
      state: fleetState([nodeState(spec, '10.0.0.2')]),
      live: { 'node-a': '10.0.0.1', 'node-b': '10.0.0.2' },
      approve: false,
    });

    const report = await new Orchestrator(h.deps).run({ mode: 'destroy' });

    expect(report.outcome).toBe('cancelled');
    expect(h.confirmer.requests[0]?.details).toEqual([
      '- node-b (10.0.0.2)',
      '- node-a (10.0.0.1, untracked)',
    ]);
    expect(h.provision.destroyed).toHaveLength(0);
  });

  it('ends in NoChanges when nothing is recorded or live', async () => {
    const h = createHarness({ desired: desiredFleet([]) });

    const report = await new Orchestrator(h.deps).run({ mode: 'destroy' });

    expect(report.outcome).toBe('no-changes');
    expect(path(report)).toEqual(['DesiredLoaded', 'NoChanges', 'Done']);
    expect(h.confirmer.requests).toHaveLength(0);
    expect(h.provision.destroyed).toHaveLength(0);
  });

  it('deploys a node named like a built-in object key', async () => {
    const h = createHarness({ desired: desiredFleet([nodeSpec('constructor')]) });

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('success');
    expect(report.created).toEqual(['constructor']);
    expect(h.store.state.nodes['constructor']?.publicAddress).toBe('10.0.0.1');
  });
});

// =============================================================================
// Partial failure and convergence
// =============================================================================

describe('Orchestrator partial failure', () => {
  it('records only the nodes the backend confirmed before failing', async () => {
    const desired = desiredFleet([nodeSpec('node-a'), nodeSpec('node-b'), nodeSpec('node-c')]);
    const h = createHarness({ desired });
    h.provision.failOnApply.add('node-b');

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('failed');
    expect(report.error?.code).toBe('PROVISION_ERROR');
    expect(Object.keys(h.store.state.nodes)).toEqual(['node-a', 'node-c']);
    expect(h.store.state.nodes['node-a']?.configuredAt).toBeNull();
    expect(h.store.state.nodes['node-c']?.configuredAt).toBeNull();
    expect(h.probe.calls).toHaveLength(0);

    const next = diffFleet(desired.nodes, h.store.state.nodes);
    expect(next.toCreate.map(s => s.name)).toEqual(['node-b']);
    expect(next.toConfigure).toEqual(['node-a', 'node-c']);
  });

  it('resumes on the next pass and converges', async () => {
    const desired = desiredFleet([nodeSpec('node-a'), nodeSpec('node-b'), nodeSpec('node-c')]);
    const h = createHarness({ desired });
    h.provision.failOnApply.add('node-b');
    await new Orchestrator(h.deps).run({ mode: 'deploy' });

    h.provision.failOnApply.clear();
    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('success');
    const lastPlan = h.provision.plans[h.provision.plans.length - 1];
    expect(lastPlan?.create.map(s => s.name)).toEqual(['node-b']);
    expect(lastPlan?.retain.map(s => s.name)).toEqual(['node-a', 'node-c']);
    expect(h.probe.calls[0]?.map(t => t.name)).toEqual(['node-a', 'node-b', 'node-c']);
    expect(h.configure.requests[0]?.targets.map(t => t.name)).toEqual(['node-a', 'node-b', 'node-c']);
    expect(isDeltaEmpty(diffFleet(desired.nodes, h.store.state.nodes))).toBe(true);

    const third = await new Orchestrator(h.deps).run({ mode: 'deploy' });
    expect(third.outcome).toBe('no-changes');
  });

  it('does not record a new node whose configuration failed', async () => {
    const h = createHarness({ desired: desiredFleet([nodeSpec('node-a')]) });
    h.configure.failHosts.add('node-a');

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('failed');
    expect(report.error?.code).toBe('CONFIGURATION_ERROR');
    expect(path(report).slice(-2)).toEqual(['Configuring', 'Failed']);
    expect(h.store.writes).toHaveLength(0);
  });

  it('removes only the confirmed destroys when a destroy partly fails', async () => {
    const a = nodeSpec('node-a');
    const b = nodeSpec('node-b');
    const h = createHarness({
      desired: desiredFleet([]),
      state: fleetState([nodeState(a, '10.0.0.1'), nodeState(b, '10.0.0.2')]),
      live: { 'node-a': '10.0.0.1', 'node-b': '10.0.0.2' },
    });
    h.provision.failOnDestroy.add('node-b');

    const report = await new Orchestrator(h.deps).run({ mode: 'destroy' });

    expect(report.outcome).toBe('failed');
    expect(report.destroyed).toEqual(['node-a']);
    expect(Object.keys(h.store.state.nodes)).toEqual(['node-b']);
  });

  it('fails without writing state when planning fails', async () => {
    const h = createHarness({ desired: desiredFleet([nodeSpec('node-a')]) });
    h.provision.planError = new ProvisionError('plan exploded', { failed: ['node-a'] });

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('failed');
    expect(report.error?.message).toBe('plan exploded');
    expect(path(report)).toEqual(['DesiredLoaded', 'Diffed', 'Failed']);
    expect(h.store.writes).toHaveLength(0);
  });

  it('fails before taking the lock when the fleet file is invalid', async () => {
    const h = createHarness({ desired: desiredFleet([]) });
    h.deps.loadDesired = async () => {
      throw new ConfigError('Fleet file not found: /tmp/missing.yaml');
    };

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('failed');
    expect(report.error).toEqual({
      name: 'ConfigError',
      code: 'CONFIG_ERROR',
      message: 'Fleet file not found: /tmp/missing.yaml',
    });
    expect(path(report)).toEqual(['Failed']);
    expect(h.locks).toEqual([]);
  });

  it('fails fast without touching any backend while another run holds the lock', async () => {
    const h = createHarness({ desired: desiredFleet([nodeSpec('node-a')]) });
    h.deps.lock = async (statePath: string) => {
      throw new ConcurrentRunError(`${statePath}.lock`);
    };

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('failed');
    expect(report.finalState).toBe('Failed');
    expect(report.error?.code).toBe('CONCURRENT_RUN');
    expect(path(report)).toEqual(['DesiredLoaded', 'Failed']);
    expect(h.store.writes).toHaveLength(0);
    expect(h.provision.plans).toHaveLength(0);
    expect(h.provision.applied).toHaveLength(0);
    expect(h.provision.destroyed).toHaveLength(0);
    expect(h.configure.requests).toHaveLength(0);
  });

  it('takes the lock on the state file', async () => {
    const h = createHarness({ desired: desiredFleet([]) });
    await new Orchestrator(h.deps).run({ mode: 'deploy' });
    expect(h.locks).toEqual([h.store.statePath]);
  });
});

// =============================================================================
// Confirmation gates
// =============================================================================

describe('Orchestrator confirmation', () => {
  it('cancels without changes and discards the plan when apply is declined', async () => {
    const h = createHarness({ desired: desiredFleet([nodeSpec('node-a')]), approve: false });

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('cancelled');
    expect(report.finalState).toBe('Done');
    expect(report.transitions[report.transitions.length - 1]?.note).toBe('declined');
    expect(report.error).toBeUndefined();
    expect(h.provision.applied).toHaveLength(0);
    expect(h.provision.discarded).toHaveLength(1);
    expect(h.store.writes).toHaveLength(0);
  });

  it('cancels a declined destroy and leaves nodes in place', async () => {
    const spec = nodeSpec('node-a');
    const h = createHarness({
      desired: desiredFleet([spec]),
      state: fleetState([nodeState(spec, '10.0.0.1')]),
      live: { 'node-a': '10.0.0.1' },
      approve: false,
    });

    const report = await new Orchestrator(h.deps).run({ mode: 'destroy' });

    expect(report.outcome).toBe('cancelled');
    expect(h.provision.destroyed).toHaveLength(0);
    expect(Object.keys(h.store.state.nodes)).toEqual(['node-a']);
  });

  it('passes through the gate without prompting under autoApprove', async () => {
    const h = createHarness({ desired: desiredFleet([nodeSpec('node-a')]), approve: false });

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy', autoApprove: true });

    expect(report.outcome).toBe('success');
    expect(path(report)).toContain('AwaitingApplyConfirmation');
    expect(h.confirmer.requests).toHaveLength(0);
  });

  it('shows one line per affected node at the prompt', async () => {
    const kept = nodeSpec('node-a');
    const gone = nodeSpec('node-z');
    const h = createHarness({
      desired: desiredFleet([kept, nodeSpec('node-b', { region: 'ams', plan: 'p2' })]),
      state: fleetState([nodeState(kept, '10.0.0.1'), nodeState(gone, '10.0.0.26')]),
      approve: false,
    });

    await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(h.confirmer.requests[0]?.details).toEqual([
      '+ node-b (ams, p2)',
      '- node-z (10.0.0.26)',
    ]);
  });
});

// =============================================================================
// Modes and policies
// =============================================================================

describe('Orchestrator modes', () => {
  it('apply provisions only and leaves new nodes pending', async () => {
    const h = createHarness({ desired: desiredFleet([nodeSpec('node-a')]) });

    const report = await new Orchestrator(h.deps).run({ mode: 'apply' });

    expect(report.outcome).toBe('success');
    expect(path(report)).toEqual([
      'DesiredLoaded',
      'Diffed',
      'AwaitingApplyConfirmation',
      'Provisioning',
      'Persisted',
      'Done',
    ]);
    expect(h.probe.calls).toHaveLength(0);
    expect(h.configure.requests).toHaveLength(0);
    expect(h.store.state.nodes['node-a']?.configuredAt).toBeNull();
  });

  it('deploy after apply configures the pending node without provisioning', async () => {
    const h = createHarness({ desired: desiredFleet([nodeSpec('node-a')]) });
    await new Orchestrator(h.deps).run({ mode: 'apply' });

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('success');
    expect(path(report)).toEqual(['DesiredLoaded', 'Diffed', 'Probing', 'Configuring', 'Persisted', 'Done']);
    expect(h.provision.plans).toHaveLength(1);
    expect(h.configure.requests[0]?.vars).toEqual({ reboot_infra: false });
    expect(h.store.state.nodes['node-a']?.configuredAt).not.toBeNull();
  });

  it('reboot runs the reboot playbook on every recorded node without writing state', async () => {
    const a = nodeSpec('node-a');
    const b = nodeSpec('node-b');
    const h = createHarness({
      desired: desiredFleet([a, b], {
        playbooks: { configure: 'node-configure.yml', reboot: 'reboot.yml' },
        vars: { panel_address: 'panel.example.test' },
      }),
      state: fleetState([nodeState(a, '10.0.0.1'), nodeState(b, '10.0.0.2')]),
    });

    const report = await new Orchestrator(h.deps).run({ mode: 'reboot' });

    expect(report.outcome).toBe('success');
    expect(path(report)).toEqual(['DesiredLoaded', 'Configuring', 'Done']);
    expect(h.configure.requests).toEqual([
      {
        playbook: 'reboot.yml',
        targets: [
          { name: 'node-a', address: '10.0.0.1' },
          { name: 'node-b', address: '10.0.0.2' },
        ],
        vars: { panel_address: 'panel.example.test', reboot_infra: true },
      },
    ]);
    expect(h.store.writes).toHaveLength(0);
  });

  it('reboot with nothing recorded is a no-op', async () => {
    const h = createHarness({ desired: desiredFleet([nodeSpec('node-a')]) });

    const report = await new Orchestrator(h.deps).run({ mode: 'reboot' });

    expect(report.outcome).toBe('no-changes');
    expect(h.configure.requests).toHaveLength(0);
  });

  it('configureAll reconfigures an in-sync fleet', async () => {
    const a = nodeSpec('node-a');
    const h = createHarness({
      desired: desiredFleet([a]),
      state: fleetState([nodeState(a, '10.0.0.1')]),
    });

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy', configureAll: true });

    expect(report.outcome).toBe('success');
    expect(path(report)).toEqual(['DesiredLoaded', 'Diffed', 'NoChanges', 'Configuring', 'Persisted', 'Done']);
    expect(h.configure.requests[0]?.targets).toEqual([{ name: 'node-a', address: '10.0.0.1' }]);
    expect(h.provision.plans).toHaveLength(0);
  });

  it('destroys undeclared nodes during deploy without configuring anything', async () => {
    const a = nodeSpec('node-a');
    const b = nodeSpec('node-b');
    const h = createHarness({
      desired: desiredFleet([a]),
      state: fleetState([nodeState(a, '10.0.0.1'), nodeState(b, '10.0.0.2')]),
      live: { 'node-a': '10.0.0.1', 'node-b': '10.0.0.2' },
    });

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.outcome).toBe('success');
    expect(path(report)).toEqual([
      'DesiredLoaded',
      'Diffed',
      'AwaitingApplyConfirmation',
      'Provisioning',
      'Persisted',
      'Done',
    ]);
    expect(h.provision.destroyed).toEqual([['node-b']]);
    expect(h.configure.requests).toHaveLength(0);
    expect(Object.keys(h.store.state.nodes)).toEqual(['node-a']);
  });
});

describe('Orchestrator registration replacement', () => {
  function replacementHarness() {
    const a = nodeSpec('node-a');
    const before = nodeSpec('node-b');
    const after = nodeSpec('node-b', { registration: { profile: 'hardened' } });
    return {
      after,
      harness: createHarness({
        desired: desiredFleet([a, after]),
        state: fleetState([nodeState(a, '10.0.0.1'), nodeState(before, '10.0.0.2')]),
        live: { 'node-a': '10.0.0.1', 'node-b': '10.0.0.2' },
      }),
    };
  }

  it('replaces only the changed node and keeps its provisioning time', async () => {
    const { after, harness: h } = replacementHarness();

    const report = await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(report.delta?.toReplaceRegistration).toEqual(['node-b']);
    expect(report.delta?.unchanged).toEqual(['node-a']);
    expect(h.provision.plans[0]?.replace.map(s => s.name)).toEqual(['node-b']);
    expect(report.replaced).toEqual(['node-b']);
    expect(h.probe.calls).toHaveLength(0);
    expect(h.store.state.nodes['node-b']).toMatchObject({
      publicAddress: '10.0.0.2',
      provisionedAt: T0,
      configFingerprint: fingerprint(after),
    });
  });

  it('carries unknown record fields through a replacement', async () => {
    const before = nodeSpec('node-b');
    const after = nodeSpec('node-b', { registration: { profile: 'hardened' } });
    const h = createHarness({
      desired: desiredFleet([after]),
      state: fleetState([nodeState(before, '10.0.0.2', { extra: { dnsRecord: 'node-b.example.test' } })]),
      live: { 'node-b': '10.0.0.2' },
    });

    await new Orchestrator(h.deps).run({ mode: 'deploy' });

    expect(h.store.state.nodes['node-b']?.extra).toEqual({ dnsRecord: 'node-b.example.test' });
  });

  it('conservative policy reconfigures the whole fleet after a replacement', async () => {
    const { harness: h } = replacementHarness();

    await new Orchestrator(h.deps).run({ mode: 'deploy', policy: 'conservative' });

    expect(h.configure.requests[0]?.targets.map(t => t.name)).toEqual(['node-a', 'node-b']);
    expect(h.configure.requests[0]?.vars).toEqual({ reboot_infra: false });
  });

  it('targeted policy reconfigures only the replaced node', async () => {
    const { harness: h } = replacementHarness();

    await new Orchestrator(h.deps).run({ mode: 'deploy', policy: 'targeted' });

    expect(h.configure.requests[0]?.targets.map(t => t.name)).toEqual(['node-b']);
  });
});

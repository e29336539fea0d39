/**
 * Terraform provisioning adapter
 *
 * Hands the desired node set to a Terraform working directory as
 * `fleet.auto.tfvars.json` and drives `init`, `plan`, `apply`, `output` and
 * targeted destroys. Resource syntax lives in the working directory, not here.
 *
 * Plan exit codes (`-detailed-exitcode`):
 * - 0: no changes
 * - 2: changes pending
 * - anything else: error
 */

import { join } from 'node:path';
import { ProvisionError, type ProvisionedNode } from '../../errors.js';
import type { NodeSpec } from '../../registry/types.js';
import { isRecord } from '../../registry/validator.js';
import { runCommand, formatCommand, type CommandRunner, type CommandOutput } from '../../utils/exec.js';
import { writeFileAtomic, removeFile } from '../../utils/fs-safe.js';
import type { Logger } from '../../utils/logger.js';
import { silentLogger } from '../../utils/logger.js';
import type { PlanHandle, PlanRequest, PlanResult, ProvisionDriver } from './types.js';

export const TFVARS_FILE = 'fleet.auto.tfvars.json';
export const PLAN_FILE = 'tfplan';

export interface TerraformDriverOptions {
  /** Terraform working directory */
  workingDir: string;
  /** Output holding `{ <name>: address | { ip, id } }` (default: node_data) */
  outputName?: string;
  /** Resource address of a node's instance; `{name}` is substituted */
  instanceAddress?: string;
  /** Resource address of a node's panel registration; `{name}` is substituted */
  registrationAddress?: string;
  /** Extra variables written next to the node map */
  variables?: Record<string, unknown>;
  binary?: string;
  /** Base environment for the child (default: process.env) */
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  logger?: Logger;
}

const DEFAULT_INSTANCE_ADDRESS = 'vultr_instance.node["{name}"]';
const DEFAULT_REGISTRATION_ADDRESS = 'panel_node.node["{name}"]';

function address(template: string, name: string): string {
  return template.split('{name}').join(name);
}

/**
 * Read one entry of the node output map
 *
 * Accepts a bare address string or an object carrying `ip`/`main_ip`/
 * `public_ip` and optionally `id`.
 */
export function parseOutputEntry(name: string, value: unknown): ProvisionedNode | undefined {
  if (typeof value === 'string' && value !== '') {
    return { name, publicAddress: value };
  }
  if (!isRecord(value)) return undefined;

  const ip = [value.ip, value.main_ip, value.public_ip].find(
    (v): v is string => typeof v === 'string' && v !== ''
  );
  if (!ip) return undefined;

  const node: ProvisionedNode = { name, publicAddress: ip };
  if (typeof value.id === 'string') node.providerId = value.id;
  return node;
}

/**
 * Parse `terraform output -json <name>` stdout
 */
export function parseNodeOutput(stdout: string): Record<string, ProvisionedNode> {
  const trimmed = stdout.trim();
  if (trimmed === '' || trimmed === 'null') return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    throw new ProvisionError(
      `Unreadable terraform output: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  if (!isRecord(parsed)) return {};

  const nodes: Record<string, ProvisionedNode> = {};
  for (const [name, value] of Object.entries(parsed)) {
    const node = parseOutputEntry(name, value);
    if (node) nodes[name] = node;
  }
  return nodes;
}

function tfNode(spec: NodeSpec): Record<string, unknown> {
  return {
    region: spec.region,
    plan: spec.plan,
    tags: spec.tags,
    registration: spec.registration,
  };
}

export class TerraformProvisionDriver implements ProvisionDriver {
  private readonly workingDir: string;
  private readonly outputName: string;
  private readonly instanceAddress: string;
  private readonly registrationAddress: string;
  private readonly variables: Record<string, unknown>;
  private readonly binary: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly runner: CommandRunner;
  private readonly log: Logger;
  private initialized = false;

  constructor(options: TerraformDriverOptions) {
    this.workingDir = options.workingDir;
    this.outputName = options.outputName ?? 'node_data';
    this.instanceAddress = options.instanceAddress ?? DEFAULT_INSTANCE_ADDRESS;
    this.registrationAddress = options.registrationAddress ?? DEFAULT_REGISTRATION_ADDRESS;
    this.variables = options.variables ?? {};
    this.binary = options.binary ?? 'terraform';
    this.env = options.env ?? process.env;
    this.runner = options.runner ?? runCommand;
    this.log = (options.logger ?? silentLogger()).child({ component: 'terraform' });
  }

  private async tf(args: string[]): Promise<CommandOutput> {
    this.log.debug(`Running ${formatCommand(this.binary, args)}`, { cwd: this.workingDir });
    const output = await this.runner(this.binary, args, {
      cwd: this.workingDir,
      env: { ...this.env, TF_IN_AUTOMATION: '1' },
      onOutput: (text) => this.log.debug(text.trimEnd()),
    });
    this.log.debug(`terraform ${args[0]} exited with ${String(output.exitCode)}`);
    return output;
  }

  private async init(): Promise<void> {
    if (this.initialized) return;
    const output = await this.tf(['init', '-input=false']);
    if (output.exitCode !== 0) {
      throw new ProvisionError(`terraform init failed: ${output.stderr.trim()}`);
    }
    this.initialized = true;
  }

  /**
   * Write the variable file for a request
   */
  async writeVariables(request: PlanRequest): Promise<string> {
    const nodes: Record<string, unknown> = {};
    const all = [...request.create, ...request.replace, ...request.retain]
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const spec of all) {
      nodes[spec.name] = tfNode(spec);
    }

    const path = join(this.workingDir, TFVARS_FILE);
    const document = { ...this.variables, fleet: request.fleet, nodes };
    await writeFileAtomic(path, JSON.stringify(document, null, 2) + '\n');
    return path;
  }

  async planCreate(request: PlanRequest): Promise<PlanResult> {
    try {
      await this.writeVariables(request);
      await this.init();
    } catch (err) {
      return { status: 'error', error: this.asProvisionError('terraform plan preparation failed', err) };
    }

    const args = ['plan', '-input=false', `-out=${PLAN_FILE}`, '-detailed-exitcode'];
    for (const spec of request.replace) {
      args.push(`-replace=${address(this.registrationAddress, spec.name)}`);
    }

    let output: CommandOutput;
    try {
      output = await this.tf(args);
    } catch (err) {
      return { status: 'error', error: this.asProvisionError('terraform plan failed to run', err) };
    }

    const handle: PlanHandle = { ref: join(this.workingDir, PLAN_FILE), request };
    switch (output.exitCode) {
      case 0:
        this.log.info('No infrastructure changes detected');
        return { status: 'no-changes', handle };
      case 2:
        return { status: 'changes-pending', handle, summary: extractPlanSummary(output.stdout) };
      default:
        await removeFile(handle.ref);
        return {
          status: 'error',
          error: new ProvisionError(
            `terraform plan exited with ${String(output.exitCode)}: ${output.stderr.trim()}`,
            { failed: [...request.create, ...request.replace].map(s => s.name) }
          ),
        };
    }
  }

  async apply(handle: PlanHandle): Promise<Record<string, ProvisionedNode>> {
    const wanted = [...handle.request.create, ...handle.request.replace].map(s => s.name);
    let output: CommandOutput;
    try {
      output = await this.tf(['apply', '-input=false', PLAN_FILE]);
    } finally {
      await removeFile(handle.ref);
    }

    const known = await this.read(wanted).catch((err: unknown): Record<string, ProvisionedNode> => {
      this.log.warn('Could not read node addresses after apply', {
        error: err instanceof Error ? err.message : String(err),
      });
      return {};
    });

    if (output.exitCode !== 0) {
      // Replacements are ambiguous after a failed apply: the old address may
      // still be in the output. Only fresh creations count as confirmed.
      const created = new Set(handle.request.create.map(s => s.name));
      const succeeded: Record<string, ProvisionedNode> = {};
      for (const [name, node] of Object.entries(known)) {
        if (created.has(name)) succeeded[name] = node;
      }
      throw new ProvisionError(`terraform apply failed: ${output.stderr.trim()}`, {
        succeeded,
        failed: wanted.filter(name => !Object.hasOwn(succeeded, name)),
      });
    }

    const missing = wanted.filter(name => !Object.hasOwn(known, name));
    if (missing.length > 0) {
      throw new ProvisionError(`Output "${this.outputName}" has no address for: ${missing.join(', ')}`, {
        succeeded: known,
        failed: missing,
      });
    }
    return known;
  }

  async discard(handle: PlanHandle): Promise<void> {
    await removeFile(handle.ref);
  }

  async destroy(names: string[]): Promise<void> {
    if (names.length === 0) return;
    await this.init();

    const args = ['apply', '-destroy', '-auto-approve', '-input=false'];
    for (const name of names) {
      args.push(`-target=${address(this.instanceAddress, name)}`);
      args.push(`-target=${address(this.registrationAddress, name)}`);
    }
    const output = await this.tf(args);
    if (output.exitCode === 0) return;

    const remaining = await this.read(names).catch(() => undefined);
    const destroyed = remaining ? names.filter(name => !Object.hasOwn(remaining, name)) : [];
    throw new ProvisionError(`terraform destroy failed: ${output.stderr.trim()}`, {
      destroyed,
      failed: names.filter(name => !destroyed.includes(name)),
    });
  }

  async read(names?: string[]): Promise<Record<string, ProvisionedNode>> {
    await this.init();
    const output = await this.tf(['output', '-json', this.outputName]);
    // No state yet, or the output is not defined until the first apply
    if (output.exitCode !== 0) return {};

    const all = parseNodeOutput(output.stdout);
    if (!names) return all;

    const filtered: Record<string, ProvisionedNode> = {};
    for (const name of names) {
      if (Object.hasOwn(all, name)) filtered[name] = all[name];
    }
    return filtered;
  }

  private asProvisionError(message: string, err: unknown): ProvisionError {
    if (err instanceof ProvisionError) return err;
    const detail = err instanceof Error ? err.message : String(err);
    return new ProvisionError(`${message}: ${detail}`, { cause: err });
  }
}

/**
 * Pull the "Plan: N to add, ..." line out of plan output
 */
export function extractPlanSummary(stdout: string): string | undefined {
  const line = stdout.split('\n').find(l => /^\s*Plan:/.test(l));
  return line?.trim();
}

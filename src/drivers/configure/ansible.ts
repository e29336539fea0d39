/**
 * Ansible configuration adapter
 *
 * Writes a throwaway INI inventory for the targets and runs
 * `ansible-playbook` limited to them. Failed hosts are read back from the
 * PLAY RECAP block.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '../../errors.js';
import { runCommand, type CommandRunner } from '../../utils/exec.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { ConfigDriver, ConfigRequest, ConfigTarget } from './types.js';

export interface AnsibleDriverOptions {
  /** Directory holding `playbooks/` and `ansible.cfg` */
  ansibleDir: string;
  /** Remote user for the management channel */
  sshUser: string;
  /** Private key for the management channel */
  sshKeyPath: string;
  /** Inventory group the targets are placed in (default: fleet_nodes) */
  group?: string;
  binary?: string;
  /** Base environment for the child (default: process.env) */
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Per-host counters from a PLAY RECAP line
 */
export interface RecapEntry {
  host: string;
  ok: number;
  changed: number;
  unreachable: number;
  failed: number;
}

const RECAP_LINE = /^(\S+)\s*:\s*(.*)$/;

/**
 * Parse the PLAY RECAP section of ansible-playbook output
 */
export function parseRecap(output: string): RecapEntry[] {
  const lines = output.split('\n');
  const start = lines.findIndex(l => l.startsWith('PLAY RECAP'));
  if (start === -1) return [];

  const entries: RecapEntry[] = [];
  for (const line of lines.slice(start + 1)) {
    const match = RECAP_LINE.exec(line.trim());
    if (!match) continue;
    const counters: Record<string, number> = {};
    for (const pair of match[2].split(/\s+/)) {
      const [key, value] = pair.split('=');
      if (key && value !== undefined && /^\d+$/.test(value)) {
        counters[key] = Number(value);
      }
    }
    if (!('ok' in counters)) continue;
    entries.push({
      host: match[1],
      ok: counters.ok ?? 0,
      changed: counters.changed ?? 0,
      unreachable: counters.unreachable ?? 0,
      failed: counters.failed ?? 0,
    });
  }
  return entries;
}

/**
 * Render an INI inventory for the given targets
 */
export function renderInventory(
  targets: ConfigTarget[],
  options: { group: string; sshUser: string; sshKeyPath: string }
): string {
  const lines = [`[${options.group}]`];
  for (const target of targets) {
    lines.push(`${target.name} ansible_host=${target.address}`);
  }
  lines.push('');
  lines.push(`[${options.group}:vars]`);
  lines.push(`ansible_user=${options.sshUser}`);
  lines.push(`ansible_ssh_private_key_file=${options.sshKeyPath}`);
  lines.push('');
  return lines.join('\n');
}

export class AnsibleConfigDriver implements ConfigDriver {
  private readonly options: Required<Omit<AnsibleDriverOptions, 'env' | 'runner' | 'logger'>>;
  private readonly env: NodeJS.ProcessEnv;
  private readonly runner: CommandRunner;
  private readonly log: Logger;

  constructor(options: AnsibleDriverOptions) {
    this.options = {
      ansibleDir: options.ansibleDir,
      sshUser: options.sshUser,
      sshKeyPath: options.sshKeyPath,
      group: options.group ?? 'fleet_nodes',
      binary: options.binary ?? 'ansible-playbook',
    };
    this.env = options.env ?? process.env;
    this.runner = options.runner ?? runCommand;
    this.log = (options.logger ?? silentLogger()).child({ component: 'ansible' });
  }

  /**
   * Command line for a request against an inventory file
   */
  buildArgs(request: ConfigRequest, inventoryPath: string): string[] {
    return [
      join('playbooks', request.playbook),
      '-i', inventoryPath,
      '--limit', request.targets.map(t => t.name).join(','),
      '-e', JSON.stringify({ target_hosts: this.options.group, ...request.vars }),
    ];
  }

  async apply(request: ConfigRequest): Promise<void> {
    if (request.targets.length === 0) return;
    const names = request.targets.map(t => t.name);

    const dir = await mkdtemp(join(tmpdir(), 'fleet-sync-inventory-'));
    try {
      const inventoryPath = join(dir, 'inventory.ini');
      await writeFile(inventoryPath, renderInventory(request.targets, this.options), 'utf-8');

      this.log.info(`Running ${request.playbook}`, { hosts: names });
      const output = await this.runner(this.options.binary, this.buildArgs(request, inventoryPath), {
        cwd: this.options.ansibleDir,
        env: { ...this.env, ANSIBLE_HOST_KEY_CHECKING: 'False', ANSIBLE_FORCE_COLOR: '0' },
        onOutput: (text) => this.log.debug(text.trimEnd()),
      });

      if (output.exitCode === 0) return;

      const recap = parseRecap(output.stdout);
      const failed = recap
        .filter(e => e.failed > 0 || e.unreachable > 0)
        .map(e => e.host);
      const hosts = failed.length > 0 ? failed : names;
      throw new ConfigurationError(
        `${request.playbook} failed on ${hosts.join(', ')} (exit ${String(output.exitCode)})`,
        hosts,
        output.exitCode ?? undefined
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}

#!/usr/bin/env node
/**
 * fleet-sync CLI - Reconcile a compute fleet against its declared definition
 *
 * Commands:
 * - deploy: provision, wait for reachability, configure
 * - apply: provision only
 * - reboot: run the reboot playbook on every recorded node
 * - destroy: tear down every recorded node
 * - diff: show what deploy would change
 * - status: show recorded nodes
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import {
  deployCommand,
  applyCommand,
  rebootCommand,
  destroyCommand,
  diffCommand,
  statusCommand,
} from './commands/index.js';
import { printResult, error, verbose as verboseLog } from './utils/output.js';
import { resolveSettings, ENV } from './config/index.js';
import { CONFIGURE_POLICIES } from './orchestrator/policy.js';
import { createLogger } from './utils/logger.js';
import { formatError } from './errors.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 * The environment is read here once; everything downstream gets the snapshot.
 */
function createContext(options: GlobalOptions): CommandContext {
  const env = { ...process.env };
  const settings = resolveSettings(options, env, {
    tty: Boolean(process.stdin.isTTY && process.stdout.isTTY),
  });

  if (settings.verbose) {
    for (const [key, source] of Object.entries(settings.sources)) {
      verboseLog(`Setting ${key} from ${source}`, true);
    }
  }

  return {
    options,
    outputFormat: settings.json ? 'json' : 'human',
    settings,
    logger: createLogger({
      level: settings.logLevel,
      json: settings.json,
      filePath: settings.logFile,
    }),
    env,
  };
}

/**
 * Run a command action and exit with its status
 */
async function runAction<T>(
  label: string,
  command: (ctx: CommandContext) => Promise<CommandResult<T>>
): Promise<void> {
  try {
    const ctx = createContext(program.opts<GlobalOptions>());
    const result = await command(ctx);

    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }

    process.exit(result.success ? 0 : 1);
  } catch (err) {
    error(`${label} failed: ${formatError(err)}`);
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('fleet-sync')
  .description('Desired-state reconciliation for small compute fleets')
  .version(VERSION)
  // Global options available to all commands. Boolean flags also read
  // FLEET_SYNC_YES / FLEET_SYNC_JSON / FLEET_SYNC_VERBOSE (true/false).
  .addOption(
    new Option('-f, --fleet-file <path>', 'Fleet definition file (default: fleet.yaml)')
      .env(ENV.fleetFile)
  )
  .addOption(
    new Option('--fleet <name>', 'Fleet to reconcile (default: nodes)')
      .env(ENV.fleet)
  )
  .addOption(
    new Option('--state-dir <path>', 'Directory for fleet state records (default: .fleet)')
      .env(ENV.stateDir)
  )
  .addOption(
    new Option('--terraform-dir <path>', 'Terraform working directory (default: terraform/nodes)')
      .env(ENV.terraformDir)
  )
  .addOption(
    new Option('--ansible-dir <path>', 'Directory holding playbooks/ (default: configuration)')
      .env(ENV.ansibleDir)
  )
  .addOption(
    new Option('--ssh-user <user>', 'Management user on the nodes (default: ansible_automaton)')
      .env(ENV.sshUser)
  )
  .addOption(
    new Option('--ssh-key <path>', 'Private key for the management user (default: ~/.ssh/ansible_key)')
      .env(ENV.sshKey)
  )
  .addOption(
    new Option('--configure-policy <policy>', 'Which nodes to configure after provisioning')
      .choices(CONFIGURE_POLICIES)
      .env(ENV.configurePolicy)
  )
  .addOption(
    new Option('--log-file <path>', 'Append structured log lines to this file')
      .env(ENV.logFile)
  )
  .addOption(new Option('-y, --yes', 'Approve changes without prompting'))
  .addOption(new Option('--json', 'Output JSON for CI/automation'))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging'));

/**
 * deploy command - Full reconciliation
 */
program
  .command('deploy')
  .description('Provision, probe and configure until the fleet matches its definition')
  .option('--configure-all', 'Configure every node, not only new and changed ones')
  .action(async (cmdOpts: { configureAll?: boolean }) => {
    await runAction('Deploy', (ctx) => deployCommand(ctx, { configureAll: cmdOpts.configureAll }));
  });

/**
 * apply command - Provisioning only
 */
program
  .command('apply')
  .description('Provision infrastructure only; new nodes are left pending configuration')
  .action(async () => {
    await runAction('Apply', (ctx) => applyCommand(ctx));
  });

/**
 * reboot command
 */
program
  .command('reboot')
  .description('Run the reboot playbook against every recorded node')
  .action(async () => {
    await runAction('Reboot', (ctx) => rebootCommand(ctx));
  });

/**
 * destroy command
 */
program
  .command('destroy')
  .description('Destroy every recorded node of the fleet')
  .action(async () => {
    await runAction('Destroy', (ctx) => destroyCommand(ctx));
  });

/**
 * diff command - Show what would change
 */
program
  .command('diff')
  .description('Show what a deploy would change, without changing anything')
  .action(async () => {
    await runAction('Diff', (ctx) => diffCommand(ctx));
  });

/**
 * status command
 */
program
  .command('status')
  .description('Show recorded nodes of the fleet')
  .option('--live', 'Compare recorded addresses with what the backend reports')
  .action(async (cmdOpts: { live?: boolean }) => {
    await runAction('Status', (ctx) => statusCommand(ctx, { live: cmdOpts.live }));
  });

// Parse and execute
await program.parseAsync();

/**
 * Runtime settings resolution
 *
 * Every setting resolves, highest priority first, from:
 * 1. CLI flag
 * 2. Environment variable (FLEET_SYNC_*)
 * 3. Built-in default
 *
 * The result is built once at start-up and frozen; nothing reads
 * `process.env` afterwards.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import type { GlobalOptions } from '../types.js';
import { ConfigError } from '../errors.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';
import { isConfigurePolicy, CONFIGURE_POLICIES, type ConfigureTargetPolicy } from '../orchestrator/policy.js';
import { DEFAULT_PROBE_SETTINGS, type ProbeSettings } from '../probe/connectivity.js';
import { stateFilePath } from '../state/store.js';

/** Environment variable names */
export const ENV = {
  fleetFile: 'FLEET_SYNC_FILE',
  fleet: 'FLEET_SYNC_FLEET',
  stateDir: 'FLEET_SYNC_STATE_DIR',
  terraformDir: 'FLEET_SYNC_TERRAFORM_DIR',
  ansibleDir: 'FLEET_SYNC_ANSIBLE_DIR',
  sshUser: 'FLEET_SYNC_SSH_USER',
  sshKey: 'FLEET_SYNC_SSH_KEY',
  yes: 'FLEET_SYNC_YES',
  json: 'FLEET_SYNC_JSON',
  verbose: 'FLEET_SYNC_VERBOSE',
  logFile: 'FLEET_SYNC_LOG_FILE',
  logLevel: 'FLEET_SYNC_LOG_LEVEL',
  configurePolicy: 'FLEET_SYNC_CONFIGURE_POLICY',
  probeIntervalMs: 'FLEET_SYNC_PROBE_INTERVAL_MS',
  probeAttempts: 'FLEET_SYNC_PROBE_ATTEMPTS',
  probeTimeoutMs: 'FLEET_SYNC_PROBE_TIMEOUT_MS',
  probeDeadlineMs: 'FLEET_SYNC_PROBE_DEADLINE_MS',
  tfOutput: 'FLEET_SYNC_TF_OUTPUT',
  tfInstanceAddress: 'FLEET_SYNC_TF_INSTANCE_ADDRESS',
  tfRegistrationAddress: 'FLEET_SYNC_TF_REGISTRATION_ADDRESS',
} as const;

export const DEFAULTS = {
  fleetFile: 'fleet.yaml',
  fleet: 'nodes',
  stateDir: '.fleet',
  terraformDir: 'terraform/nodes',
  ansibleDir: 'configuration',
  sshUser: 'ansible_automaton',
  sshKey: '~/.ssh/ansible_key',
  configurePolicy: 'conservative',
  tfOutput: 'node_data',
} as const;

export type SettingSource = 'cli' | 'env' | 'default';

export interface TerraformSettings {
  workingDir: string;
  outputName: string;
  instanceAddress?: string;
  registrationAddress?: string;
}

export interface RuntimeSettings {
  fleetFile: string;
  fleet: string;
  stateDir: string;
  statePath: string;
  terraform: TerraformSettings;
  ansibleDir: string;
  sshUser: string;
  sshKeyPath: string;
  yes: boolean;
  json: boolean;
  verbose: boolean;
  logLevel: LogLevel;
  logFile?: string;
  configurePolicy: ConfigureTargetPolicy;
  probe: ProbeSettings;
  /** Whether a person can answer prompts */
  interactive: boolean;
  /** Where each user-facing setting came from, for `--verbose` */
  sources: Record<string, SettingSource>;
}

export interface ResolveSettingsOptions {
  cwd?: string;
  /** Whether stdin/stdout are a terminal */
  tty?: boolean;
}

/**
 * Expand a leading `~` and resolve against `cwd`
 */
export function expandPath(path: string, cwd: string): string {
  const expanded = path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path;
  return isAbsolute(expanded) ? expanded : resolve(cwd, expanded);
}

/**
 * Parse a boolean environment value
 */
export function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const v = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  return undefined;
}

function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Build the settings for one invocation
 *
 * @param options - Parsed CLI flags
 * @param env - Environment snapshot taken at start-up
 * @throws ConfigError for unparseable values
 */
export function resolveSettings(
  options: Partial<GlobalOptions>,
  env: NodeJS.ProcessEnv,
  resolveOptions: ResolveSettingsOptions = {}
): RuntimeSettings {
  const cwd = resolveOptions.cwd ?? process.cwd();
  const sources: Record<string, SettingSource> = {};

  const pick = (key: string, cli: string | undefined, envName: string, fallback: string): string => {
    if (cli !== undefined && cli !== '') {
      sources[key] = 'cli';
      return cli;
    }
    const fromEnv = env[envName];
    if (fromEnv !== undefined && fromEnv !== '') {
      sources[key] = 'env';
      return fromEnv;
    }
    sources[key] = 'default';
    return fallback;
  };

  const flag = (key: string, cli: boolean | undefined, envName: string): boolean => {
    if (cli) {
      sources[key] = 'cli';
      return true;
    }
    const fromEnv = parseBoolean(env[envName]);
    sources[key] = fromEnv === undefined ? 'default' : 'env';
    return fromEnv ?? false;
  };

  const fleetFile = expandPath(pick('fleetFile', options.fleetFile, ENV.fleetFile, DEFAULTS.fleetFile), cwd);
  const fleet = pick('fleet', options.fleet, ENV.fleet, DEFAULTS.fleet);
  const stateDir = expandPath(pick('stateDir', options.stateDir, ENV.stateDir, DEFAULTS.stateDir), cwd);
  const terraformDir = expandPath(
    pick('terraformDir', options.terraformDir, ENV.terraformDir, DEFAULTS.terraformDir),
    cwd
  );
  const ansibleDir = expandPath(pick('ansibleDir', options.ansibleDir, ENV.ansibleDir, DEFAULTS.ansibleDir), cwd);
  const sshUser = pick('sshUser', options.sshUser, ENV.sshUser, DEFAULTS.sshUser);
  const sshKeyPath = expandPath(pick('sshKey', options.sshKey, ENV.sshKey, DEFAULTS.sshKey), cwd);

  const yes = flag('yes', options.yes, ENV.yes);
  const json = flag('json', options.json, ENV.json);
  const verbose = flag('verbose', options.verbose, ENV.verbose);

  const policy = pick('configurePolicy', options.configurePolicy, ENV.configurePolicy, DEFAULTS.configurePolicy);
  if (!isConfigurePolicy(policy)) {
    throw new ConfigError(
      `Unknown configure policy "${policy}". Expected one of: ${CONFIGURE_POLICIES.join(', ')}`
    );
  }

  const rawLevel = env[ENV.logLevel];
  let logLevel: LogLevel = verbose ? 'debug' : 'info';
  if (rawLevel) {
    if (!isLogLevel(rawLevel)) {
      throw new ConfigError(`${ENV.logLevel} must be one of debug, info, warn, error`);
    }
    logLevel = rawLevel;
  }

  const logFileRaw = options.logFile ?? env[ENV.logFile];
  const logFile = logFileRaw ? expandPath(logFileRaw, cwd) : undefined;

  const probe: ProbeSettings = {
    intervalMs: parsePositiveInt(ENV.probeIntervalMs, env[ENV.probeIntervalMs]) ?? DEFAULT_PROBE_SETTINGS.intervalMs,
    maxAttempts: parsePositiveInt(ENV.probeAttempts, env[ENV.probeAttempts]) ?? DEFAULT_PROBE_SETTINGS.maxAttempts,
    attemptTimeoutMs:
      parsePositiveInt(ENV.probeTimeoutMs, env[ENV.probeTimeoutMs]) ?? DEFAULT_PROBE_SETTINGS.attemptTimeoutMs,
  };
  const deadlineMs = parsePositiveInt(ENV.probeDeadlineMs, env[ENV.probeDeadlineMs]);
  if (deadlineMs !== undefined) probe.deadlineMs = deadlineMs;

  const terraform: TerraformSettings = {
    workingDir: terraformDir,
    outputName: env[ENV.tfOutput] || DEFAULTS.tfOutput,
  };
  if (env[ENV.tfInstanceAddress]) terraform.instanceAddress = env[ENV.tfInstanceAddress];
  if (env[ENV.tfRegistrationAddress]) terraform.registrationAddress = env[ENV.tfRegistrationAddress];

  const interactive = Boolean(resolveOptions.tty) && !env.CI && !env.CONTINUOUS_INTEGRATION;

  return Object.freeze({
    fleetFile,
    fleet,
    stateDir,
    statePath: stateFilePath(stateDir, fleet),
    terraform,
    ansibleDir,
    sshUser,
    sshKeyPath,
    yes,
    json,
    verbose,
    logLevel,
    logFile,
    configurePolicy: policy,
    probe,
    interactive,
    sources,
  });
}

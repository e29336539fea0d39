/**
 * Shared types and interfaces for the fleet-sync CLI
 */

import type { RuntimeSettings } from './config/settings.js';
import type { Logger } from './utils/logger.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 *
 * A type alias rather than an interface so it satisfies commander's
 * `OptionValues` constraint in `program.opts<GlobalOptions>()`.
 */
export type GlobalOptions = {
  /** Path to the fleet definition file */
  fleetFile?: string;
  /** Fleet to reconcile within the file */
  fleet?: string;
  /** Directory holding `<fleet>.json` state records */
  stateDir?: string;
  /** Terraform working directory */
  terraformDir?: string;
  /** Directory holding `playbooks/` */
  ansibleDir?: string;
  sshUser?: string;
  sshKey?: string;
  /** Answer yes to confirmation prompts */
  yes?: boolean;
  /** Output JSON for CI/automation */
  json?: boolean;
  /** Enable verbose logging */
  verbose?: boolean;
  /** Append structured log lines to this file */
  logFile?: string;
  configurePolicy?: string;
};

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Settings resolved from flags, environment and defaults */
  settings: RuntimeSettings;
  logger: Logger;
  /** Environment snapshot taken at start-up, handed to child processes */
  env: NodeJS.ProcessEnv;
}

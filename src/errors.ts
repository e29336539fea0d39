/**
 * Error taxonomy for fleet reconciliation
 *
 * Every fatal condition of a reconciliation pass is one of these classes.
 * Each carries a stable `code` for logs/JSON output and an optional
 * suggestion shown to the operator.
 */

import type { ValidationIssue } from './registry/errors.js';

/**
 * Base error class for all fleet-sync errors
 */
export class FleetSyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'FleetSyncError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Malformed desired state. Fatal, never retried: fix the input and rerun.
 */
export class ConfigError extends FleetSyncError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message, 'CONFIG_ERROR', 'Fix the fleet file and rerun');
    this.name = 'ConfigError';
  }

  override toUserMessage(): string {
    const lines = [`Error: ${this.message}`];
    for (const issue of this.issues) {
      lines.push(`  [${issue.code}] ${issue.path}: ${issue.message}`);
    }
    if (this.suggestion) {
      lines.push('', `Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Node as reported by the provisioning backend
 */
export interface ProvisionedNode {
  name: string;
  publicAddress: string;
  /** Backend-side identifier (instance id), when known */
  providerId?: string;
}

/**
 * Provisioning backend failed for some or all names.
 *
 * `succeeded` holds what the backend confirmed before failing, so the
 * orchestrator can record exactly that and nothing more.
 */
export class ProvisionError extends FleetSyncError {
  public readonly succeeded: Record<string, ProvisionedNode>;
  public readonly destroyed: string[];
  public readonly failed: string[];

  constructor(
    message: string,
    details: {
      succeeded?: Record<string, ProvisionedNode>;
      destroyed?: string[];
      failed?: string[];
      cause?: unknown;
    } = {}
  ) {
    super(message, 'PROVISION_ERROR', 'Rerun to resume; only confirmed changes were recorded');
    this.name = 'ProvisionError';
    this.succeeded = details.succeeded ?? {};
    this.destroyed = details.destroyed ?? [];
    this.failed = details.failed ?? [];
    if (details.cause !== undefined) {
      this.cause = details.cause;
    }
  }
}

/**
 * One or more new nodes never answered on the management channel
 */
export class UnreachableError extends FleetSyncError {
  constructor(
    public readonly addresses: string[],
    public readonly attempts?: number
  ) {
    const tried = attempts !== undefined ? ` after ${attempts} attempt(s)` : '';
    super(
      `Unreachable: ${addresses.join(', ')}${tried}`,
      'UNREACHABLE',
      'Check firewall rules and the management key, then rerun'
    );
    this.name = 'UnreachableError';
  }
}

/**
 * Configuration backend run failed
 */
export class ConfigurationError extends FleetSyncError {
  constructor(
    message: string,
    public readonly hosts: string[],
    public readonly exitCode?: number
  ) {
    super(message, 'CONFIGURATION_ERROR', 'Inspect the playbook output, fix, and rerun');
    this.name = 'ConfigurationError';
  }
}

/**
 * Fleet state file is unreadable or from a newer format
 */
export class StateError extends FleetSyncError {
  constructor(
    message: string,
    public readonly statePath: string
  ) {
    super(message, 'STATE_ERROR', `Inspect ${statePath}; it is plain JSON and safe to hand-edit`);
    this.name = 'StateError';
  }
}

/**
 * Another reconciliation run holds the state lock
 */
export class ConcurrentRunError extends FleetSyncError {
  constructor(
    public readonly lockPath: string,
    public readonly holder?: string
  ) {
    const by = holder ? ` (held by ${holder})` : '';
    super(
      `Another run is in progress for this fleet${by}`,
      'CONCURRENT_RUN',
      `Wait for it to finish. If no run is active, remove ${lockPath}`
    );
    this.name = 'ConcurrentRunError';
  }
}

/**
 * An external command could not be run or exited non-zero
 */
export class CommandError extends FleetSyncError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr?: string
  ) {
    const details = stderr ? `: ${stderr.trim()}` : '';
    const status = exitCode === null ? 'did not exit cleanly' : `exited with ${exitCode}`;
    super(`Command ${status}: ${command}${details}`, 'COMMAND_ERROR');
    this.name = 'CommandError';
  }
}

/**
 * Type guard to check if an error is a FleetSyncError
 */
export function isFleetSyncError(error: unknown): error is FleetSyncError {
  return error instanceof FleetSyncError;
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isFleetSyncError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

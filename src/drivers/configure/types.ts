/**
 * Configuration backend contract
 */

export interface ConfigTarget {
  name: string;
  address: string;
}

export interface ConfigRequest {
  /** Playbook reference, relative to the backend's playbook directory */
  playbook: string;
  targets: ConfigTarget[];
  /** Opaque variables handed to the backend */
  vars: Record<string, unknown>;
}

export interface ConfigDriver {
  /**
   * Converge the targets. No per-host rollback, no retry.
   * @throws ConfigurationError naming the failed hosts
   */
  apply(request: ConfigRequest): Promise<void>;
}

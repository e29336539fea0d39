/**
 * Desired fleet types
 *
 * The fleet file (fleet.yaml) declares one or more fleets. Each fleet maps
 * node names to their placement; fleet-level `registration` inputs feed the
 * config fingerprint, fleet-level `vars` are handed to the configuration
 * backend untouched.
 */

import type { Logger } from '../utils/logger.js';

/** Current supported API version for fleet files */
export const SUPPORTED_API_VERSION = 'fleet-sync/v1';

/** Plan used when neither the node nor the fleet defaults name one */
export const DEFAULT_PLAN = 'vc2-1c-1gb';

/** Playbook applied on deploy when a fleet declares none */
export const DEFAULT_CONFIGURE_PLAYBOOK = 'node-configure.yml';

/**
 * Opaque map of fingerprint-relevant registration inputs
 * (panel address, config profile, inbounds, node port, ...)
 */
export type RegistrationInputs = Record<string, unknown>;

/**
 * A declared node, after defaults are applied
 */
export interface NodeSpec {
  /** Unique key within the fleet; also the hostname */
  name: string;
  region: string;
  plan: string;
  /** Sorted, de-duplicated */
  tags: string[];
  /** Fleet-level registration inputs merged with node-level overrides */
  registration: RegistrationInputs;
}

/**
 * Playbook references for a fleet
 */
export interface FleetPlaybooks {
  configure: string;
  /** Used by `reboot`; falls back to `configure` */
  reboot?: string;
}

/**
 * One fully resolved fleet
 */
export interface DesiredFleet {
  name: string;
  nodes: Record<string, NodeSpec>;
  playbooks: FleetPlaybooks;
  /** Opaque configuration map for the configuration backend */
  vars: Record<string, unknown>;
  /** Path of the file this fleet came from */
  sourcePath: string;
}

/**
 * Options for loading a fleet file
 */
export interface FleetLoadOptions {
  /** Base path for resolving a relative fleet file path (default: cwd) */
  basePath?: string;
  /** Receives validation warnings */
  logger?: Logger;
}

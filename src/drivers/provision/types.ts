/**
 * Provisioning backend contract
 *
 * The orchestrator only ever talks to this interface; the Terraform adapter
 * is one implementation and tests use an in-memory one.
 */

import type { NodeSpec } from '../../registry/types.js';
import type { ProvisionError, ProvisionedNode } from '../../errors.js';

export type { ProvisionedNode } from '../../errors.js';

/**
 * What the backend should converge to
 */
export interface PlanRequest {
  fleet: string;
  /** New instances */
  create: NodeSpec[];
  /** Existing instances whose registration must be recreated */
  replace: NodeSpec[];
  /** Existing instances that stay as they are */
  retain: NodeSpec[];
}

/**
 * Opaque reference to a computed plan; only the driver that produced it
 * interprets `ref`.
 */
export interface PlanHandle {
  ref: string;
  request: PlanRequest;
}

export type PlanResult =
  | { status: 'no-changes'; handle: PlanHandle }
  | { status: 'changes-pending'; handle: PlanHandle; summary?: string }
  | { status: 'error'; error: ProvisionError };

export interface ProvisionDriver {
  /** Compute (but do not execute) the changes for `request` */
  planCreate(request: PlanRequest): Promise<PlanResult>;
  /**
   * Execute a plan. Returns the created and replaced nodes.
   * @throws ProvisionError carrying what succeeded
   */
  apply(handle: PlanHandle): Promise<Record<string, ProvisionedNode>>;
  /** Drop a plan that will not be applied */
  discard(handle: PlanHandle): Promise<void>;
  /**
   * @throws ProvisionError carrying the names that were destroyed
   */
  destroy(names: string[]): Promise<void>;
  /** Instances the backend currently knows, optionally filtered by name */
  read(names?: string[]): Promise<Record<string, ProvisionedNode>>;
}

/**
 * Command exports
 */

export { deployCommand, type DeployOptions } from './deploy.js';
export { applyCommand } from './apply.js';
export { rebootCommand } from './reboot.js';
export { destroyCommand } from './destroy.js';
export { diffCommand, type DiffResult, type DiffSources } from './diff.js';
export { statusCommand, buildStatusRows, type StatusOptions, type StatusResult, type StatusSources } from './status.js';
export {
  runPass,
  toCommandResult,
  createOrchestratorDeps,
  createProvisionDriver,
  type RuntimeOverrides,
} from './runtime.js';

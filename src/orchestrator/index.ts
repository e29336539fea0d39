/**
 * Reconciliation orchestration
 *
 * @module orchestrator
 */

export {
  Orchestrator,
  describeDelta,
  type FleetProbe,
  type OrchestratorDeps,
  type RunMode,
  type RunOptions,
  type RunOutcome,
  type RunReport,
} from './orchestrator.js';
export { RunStateMachine, TRANSITIONS, canTransition, isTerminal, type RunState, type Transition } from './machine.js';
export {
  selectConfigureTargets,
  isConfigurePolicy,
  CONFIGURE_POLICIES,
  type ConfigureTargetPolicy,
  type TargetSelection,
} from './policy.js';
export {
  PromptConfirmer,
  autoApprove,
  declineAll,
  createConfirmer,
  parseAnswer,
  promptConfirmation,
  type Confirmer,
  type ConfirmationRequest,
} from './confirm.js';

/**
 * Reconciliation pass state machine
 *
 * Every move is checked against {@link TRANSITIONS}; an illegal move is a bug
 * in the orchestrator, not an operational failure, so it throws.
 */

export type RunState =
  | 'Init'
  | 'DesiredLoaded'
  | 'Diffed'
  | 'AwaitingDestroyConfirmation'
  | 'AwaitingApplyConfirmation'
  | 'NoChanges'
  | 'Provisioning'
  | 'Probing'
  | 'Configuring'
  | 'Persisted'
  | 'Done'
  | 'Failed';

/**
 * Legal next states. Steps with nothing to do are skipped, hence the
 * shortcuts (e.g. Provisioning → Persisted when nothing needs configuring).
 */
export const TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  Init: ['DesiredLoaded', 'Failed'],
  DesiredLoaded: ['Diffed', 'AwaitingDestroyConfirmation', 'NoChanges', 'Configuring', 'Failed'],
  Diffed: ['AwaitingApplyConfirmation', 'NoChanges', 'Provisioning', 'Probing', 'Failed'],
  AwaitingDestroyConfirmation: ['Provisioning', 'Done', 'Failed'],
  AwaitingApplyConfirmation: ['Provisioning', 'Done', 'Failed'],
  NoChanges: ['Done', 'Configuring', 'Failed'],
  Provisioning: ['Probing', 'Configuring', 'Persisted', 'Failed'],
  Probing: ['Configuring', 'Failed'],
  Configuring: ['Persisted', 'Done', 'Failed'],
  Persisted: ['Done'],
  Done: [],
  Failed: [],
};

export interface Transition {
  from: RunState;
  to: RunState;
  /** ISO 8601 */
  at: string;
  note?: string;
}

export function canTransition(from: RunState, to: RunState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: RunState): boolean {
  return state === 'Done' || state === 'Failed';
}

export class RunStateMachine {
  private current: RunState = 'Init';
  private readonly history: Transition[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  get state(): RunState {
    return this.current;
  }

  get transitions(): Transition[] {
    return [...this.history];
  }

  to(next: RunState, note?: string): void {
    if (!canTransition(this.current, next)) {
      throw new Error(`Illegal transition ${this.current} -> ${next}`);
    }
    this.history.push({
      from: this.current,
      to: next,
      at: this.now().toISOString(),
      ...(note ? { note } : {}),
    });
    this.current = next;
  }
}

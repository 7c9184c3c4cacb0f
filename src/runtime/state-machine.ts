// Lifecycle state machine for workers and their containers
// 3 states, no transition tables, no event types

/**
 * Worker lifecycle constants - use these instead of string literals
 * to prevent typos and get better editor autocomplete.
 */
export const WorkerStates = {
  STARTING: "starting",
  READY: "ready",
  STOPPED: "stopped",
} as const;

export type WorkerState = (typeof WorkerStates)[keyof typeof WorkerStates];

/**
 * Holds the lifecycle state of one worker. A stopped worker never
 * transitions again.
 */
export class StateMachine {
  private state: WorkerState = WorkerStates.STARTING;

  /**
   * Transition to a new state. Returns false when the transition was
   * ignored because the state is already terminal or unchanged.
   */
  transition(next: WorkerState): boolean {
    if (this.state === next || this.isTerminal()) return false;
    this.state = next;
    return true;
  }

  get(): WorkerState {
    return this.state;
  }

  /**
   * Check if current state matches any of the provided states
   */
  is(...states: WorkerState[]): boolean {
    return states.includes(this.state);
  }

  isTerminal(): boolean {
    return this.state === WorkerStates.STOPPED;
  }
}

/**
 * Per-run state machine: pending → setup → running → {succeeded | failed | errored}.
 */
import { ErrorCodes, HarnessError } from '../../utils/errors.js';
import type { RunState, RunStatus } from './types.js';

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  pending: ['setup'],
  setup: ['running', 'errored'],
  running: ['succeeded', 'failed', 'errored'],
  succeeded: [],
  failed: [],
  errored: [],
};

const TERMINAL_STATUS: Partial<Record<RunState, RunStatus>> = {
  succeeded: 'success',
  failed: 'failed',
  errored: 'errored',
};

export class RunLifecycle {
  private current: RunState = 'pending';
  private readonly visited: RunState[] = ['pending'];

  get state(): RunState {
    return this.current;
  }

  get trace(): readonly RunState[] {
    return this.visited;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  /**
   * Move to the next state.
   * @throws HarnessError ILLEGAL_TRANSITION when the move is out of order
   */
  transition(next: RunState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new HarnessError(
        ErrorCodes.ILLEGAL_TRANSITION,
        `Illegal run state transition: ${this.current} → ${next}`,
        { from: this.current, to: next }
      );
    }
    this.current = next;
    this.visited.push(next);
  }

  /**
   * Status for the terminal state reached.
   * @throws HarnessError when the run has not finished
   */
  status(): RunStatus {
    const status = TERMINAL_STATUS[this.current];
    if (!status) {
      throw new HarnessError(
        ErrorCodes.ILLEGAL_TRANSITION,
        `Run has not finished (state: ${this.current})`,
        { state: this.current }
      );
    }
    return status;
  }
}

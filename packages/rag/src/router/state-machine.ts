/**
 * Router State Machine
 *
 * One machine per routed query. Legal moves are listed in `TRANSITIONS`;
 * anything else throws, so a routing bug shows up as an error instead of a
 * silently skipped step.
 *
 *   received → classified → dispatched → specialist_succeeded → synthesized → responded
 *                                      ↘ specialist_failed → dispatched (retry / fallback)
 *                                                          ↘ responded (all failed)
 *              classified → clarification_requested → awaiting_user → received
 *
 * @module @docpilot/rag/router/state-machine
 */

export type RouterState =
  | 'received'
  | 'classified'
  | 'dispatched'
  | 'specialist_succeeded'
  | 'specialist_failed'
  | 'synthesized'
  | 'responded'
  | 'clarification_requested'
  | 'awaiting_user';

export const TRANSITIONS: Readonly<Record<RouterState, readonly RouterState[]>> = {
  received: ['classified'],
  classified: ['dispatched', 'clarification_requested'],
  dispatched: ['specialist_succeeded', 'specialist_failed'],
  specialist_succeeded: ['synthesized'],
  specialist_failed: ['dispatched', 'responded'],
  synthesized: ['responded'],
  responded: [],
  clarification_requested: ['awaiting_user'],
  awaiting_user: ['received'],
};

export class InvalidTransitionError extends Error {
  public readonly from: RouterState;
  public readonly to: RouterState;

  constructor(from: RouterState, to: RouterState) {
    super(`Invalid router transition: ${from} → ${to}`);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

export function canTransition(from: RouterState, to: RouterState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class RouterStateMachine {
  private current: RouterState;
  private trail: RouterState[];

  constructor(history: readonly RouterState[] = ['received']) {
    if (history.length === 0) {
      throw new Error('Router history must contain at least one state');
    }
    for (let i = 1; i < history.length; i++) {
      if (!canTransition(history[i - 1], history[i])) {
        throw new InvalidTransitionError(history[i - 1], history[i]);
      }
    }
    this.trail = [...history];
    this.current = history[history.length - 1];
  }

  get state(): RouterState {
    return this.current;
  }

  /** Every state visited, oldest first */
  get history(): RouterState[] {
    return [...this.trail];
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0 || this.current === 'awaiting_user';
  }

  transition(to: RouterState): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.current = to;
    this.trail.push(to);
  }
}

import { ROUTER_TRANSITIONS, RouterState, RouterTransitionEvent } from './types';
import { logger } from '../observability/logger';

export interface TransitionResult {
  newState: RouterState;
  /** null when the step was rejected or was a no-op */
  event: RouterTransitionEvent | null;
}

/**
 * Guards the router's lifecycle: Start moves to exactly one terminal state per
 * classification. A step outside the transition table leaves the state as is.
 */
export class RouterStateMachine {
  constructor(private readonly transitions: Readonly<Record<RouterState, readonly RouterState[]>> = ROUTER_TRANSITIONS) {}

  transition(requestId: string, from: RouterState, to: RouterState, reason: string): TransitionResult {
    if (from === to) return { newState: from, event: null };

    if (!this.transitions[from].includes(to)) {
      logger.warn({ requestId, from, to, reason }, 'Rejected router transition');
      return { newState: from, event: null };
    }

    const event: RouterTransitionEvent = { requestId, from, to, reason, timestamp: Date.now() };
    logger.debug(event, 'Router transition');
    return { newState: to, event };
  }

  isTerminal(state: RouterState): boolean {
    return this.transitions[state].length === 0;
  }
}

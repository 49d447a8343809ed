import {
  StateCode,
  TERMINAL_STATES,
} from '../catalog/catalog.constants';

/**
 * Allowed state transitions. Anything not listed here is rejected.
 * Terminal states map to [] and there is no way back out of `resuelta`
 * other than closing or cancelling.
 */
export const STATE_TRANSITIONS: Record<StateCode, readonly StateCode[]> = {
  [StateCode.PENDING]: [StateCode.ASSIGNED, StateCode.CANCELLED],
  [StateCode.ASSIGNED]: [StateCode.IN_PROGRESS, StateCode.CANCELLED],
  [StateCode.IN_PROGRESS]: [StateCode.RESOLVED, StateCode.CANCELLED],
  [StateCode.RESOLVED]: [StateCode.CLOSED, StateCode.CANCELLED],
  [StateCode.CLOSED]: [],
  [StateCode.CANCELLED]: [],
};

/** States in which a responsible party may be (re)assigned */
export const ASSIGNABLE_STATES: readonly StateCode[] = [
  StateCode.PENDING,
  StateCode.ASSIGNED,
  StateCode.IN_PROGRESS,
];

/** States that carry a resolution timestamp */
const RESOLVED_STATES: readonly StateCode[] = [
  StateCode.RESOLVED,
  StateCode.CLOSED,
];

export function canTransition(from: StateCode, to: StateCode): boolean {
  return STATE_TRANSITIONS[from].includes(to);
}

export function isTerminal(state: StateCode): boolean {
  return TERMINAL_STATES.includes(state);
}

export function isAssignable(state: StateCode): boolean {
  return ASSIGNABLE_STATES.includes(state);
}

/**
 * Value of `resolvedAt` after entering `to`.
 * Entering `resuelta` stamps `now`; `cerrada` keeps the existing stamp;
 * any other target clears it.
 */
export function nextResolvedAt(
  to: StateCode,
  current: Date | null,
  now: Date,
): Date | null {
  if (to === StateCode.RESOLVED) {
    return now;
  }
  if (RESOLVED_STATES.includes(to)) {
    return current ?? now;
  }
  return null;
}

/**
 * Crisis Escalation State Machine (XState v5)
 *
 * The explicit transition table for crisis records. The escalation service is
 * stateful; this machine is not: each request rehydrates it at the record's
 * current state, evaluates one event, and reads back the next state.
 *
 * State flow:
 *   DETECTED → NOTIFYING → ACKNOWLEDGED → IN_PROGRESS → RESOLVED
 *   NOTIFYING → ESCALATED (ACK_TIMEOUT)
 *   ESCALATED → ACKNOWLEDGED (backup responder)
 *   ACKNOWLEDGED → RESOLVED (resolved without a separate intervention step)
 *
 * Actor authorization is NOT enforced here; callers validate before sending.
 */

import { setup, createActor } from 'xstate';
import { CrisisState, type CrisisEvent, type CrisisMachineContext } from '../types/crisis';

// =============================================================================
// Machine Definition
// =============================================================================

export const crisisMachine = setup({
  types: {
    context: {} as CrisisMachineContext,
    events: {} as CrisisEvent,
  },
}).createMachine({
  id: 'crisisEscalation',
  initial: 'DETECTED',
  context: {
    crisisId: '',
  },
  states: {
    DETECTED: {
      on: {
        NOTIFY: { target: 'NOTIFYING' },
      },
    },
    NOTIFYING: {
      on: {
        ACKNOWLEDGE: { target: 'ACKNOWLEDGED' },
        ACK_TIMEOUT: { target: 'ESCALATED' },
      },
    },
    ESCALATED: {
      on: {
        ACKNOWLEDGE: { target: 'ACKNOWLEDGED' },
      },
    },
    ACKNOWLEDGED: {
      on: {
        BEGIN_PROGRESS: { target: 'IN_PROGRESS' },
        RESOLVE: { target: 'RESOLVED' },
      },
    },
    IN_PROGRESS: {
      on: {
        RESOLVE: { target: 'RESOLVED' },
      },
    },
    RESOLVED: {
      type: 'final',
    },
  },
});

// =============================================================================
// Transition Helpers
// =============================================================================

/**
 * Evaluate a transition without touching any record.
 *
 * @returns The next state, or null when the table has no such transition
 */
export function evaluateTransition(
  currentState: CrisisState,
  event: CrisisEvent,
  crisisId = ''
): CrisisState | null {
  if (isTerminal(currentState)) {
    return null;
  }

  const actor = createActor(crisisMachine, {
    snapshot: crisisMachine.resolveState({
      value: currentState,
      context: { crisisId },
    }),
  });

  actor.start();
  actor.send(event);

  const parsed = CrisisState.safeParse(actor.getSnapshot().value);
  actor.stop();

  if (!parsed.success || parsed.data === currentState) {
    return null;
  }

  return parsed.data;
}

export function canTransition(currentState: CrisisState, event: CrisisEvent): boolean {
  return evaluateTransition(currentState, event) !== null;
}

export function isTerminal(state: CrisisState): boolean {
  return state === 'RESOLVED';
}

/**
 * States in which a crisis still needs a responder.
 */
export function isOpen(state: CrisisState): boolean {
  return !isTerminal(state);
}

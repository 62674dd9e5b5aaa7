import { GovernedToolCall, ToolCallState } from './types';
import { logger } from '../observability/logger';
import { governanceViolations, toolCallStateTransitions } from '../observability/metrics';

/**
 * Allowed tool call transitions. `proposed -> cancelled` covers calls that
 * are refused before they can be parked (invalid arguments).
 */
export const TOOL_CALL_TRANSITIONS: Readonly<Record<ToolCallState, readonly ToolCallState[]>> = {
  proposed: ['executing', 'awaiting_confirmation', 'fetching', 'cancelled'],
  executing: ['completed'],
  completed: [],
  awaiting_confirmation: ['confirmed', 'rejected'],
  confirmed: ['executing'],
  rejected: ['cancelled'],
  cancelled: [],
  fetching: ['displayed'],
  displayed: [],
};

export const TERMINAL_STATES: readonly ToolCallState[] = ['completed', 'cancelled', 'displayed'];

export function isTerminal(state: ToolCallState): boolean {
  return TERMINAL_STATES.includes(state);
}

export class ToolCallStateMachine {
  /**
   * Attempt a transition. Applies it to the call and returns true if valid;
   * otherwise leaves the call untouched, logs the refusal and returns false.
   */
  transition(call: GovernedToolCall, to: ToolCallState, reason: string, now = Date.now()): boolean {
    const from = call.state;
    if (!TOOL_CALL_TRANSITIONS[from].includes(to)) {
      governanceViolations.inc({ kind: 'invalid_transition' });
      logger.warn(
        { callId: call.callId, turnId: call.turnId, tool: call.name, from, to, reason },
        'Invalid tool call transition refused',
      );
      return false;
    }

    call.state = to;
    call.transitions.push({ from, to, at: now, reason });
    toolCallStateTransitions.inc({ from, to });
    logger.debug({ callId: call.callId, tool: call.name, from, to, reason }, 'Tool call transition');
    return true;
  }
}

export const toolCallStateMachine = new ToolCallStateMachine();

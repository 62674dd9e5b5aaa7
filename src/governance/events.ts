import { DisplayPayload, PendingConfirmation } from './types';
import { ToolName, ToolResult } from '../tools/types';
import { EvalResult } from '../config/types';
import { logger } from '../observability/logger';

export interface TurnEvents {
  awaiting_confirmation: PendingConfirmation;
  action_result: { callId: string; turnId: string; sessionId: string; tool: ToolName; result: ToolResult };
  action_cancelled: { callId: string; turnId: string; sessionId: string; tool: ToolName; reason: string };
  display_ready: DisplayPayload & { turnId: string; sessionId: string };
  turn_finalized: { turnId: string; sessionId: string; evalResult: EvalResult; persisted: boolean };
}

export type TurnEventName = keyof TurnEvents;
type Listener<K extends TurnEventName> = (payload: TurnEvents[K]) => void;
type ListenerTable = { [K in TurnEventName]: Array<Listener<K>> };

/**
 * Outbound events for whatever surface renders confirmations and widgets.
 * Delivery is synchronous; a failing listener is logged and skipped.
 */
export class TurnEventBus {
  private readonly log = logger.child({ component: 'turn-events' });
  private readonly listeners: ListenerTable = {
    awaiting_confirmation: [],
    action_result: [],
    action_cancelled: [],
    display_ready: [],
    turn_finalized: [],
  };

  /** Register a listener; returns an unsubscribe function */
  on<K extends TurnEventName>(event: K, listener: Listener<K>): () => void {
    const list: Array<Listener<K>> = this.listeners[event];
    list.push(listener);
    return () => {
      const index = list.indexOf(listener);
      if (index >= 0) list.splice(index, 1);
    };
  }

  emit<K extends TurnEventName>(event: K, payload: TurnEvents[K]): void {
    const list: Array<Listener<K>> = this.listeners[event];
    for (const listener of [...list]) {
      try {
        listener(payload);
      } catch (err) {
        this.log.error({ err, event }, 'Turn event listener error');
      }
    }
  }
}

import { GovernanceMode, ToolName, ToolResult } from '../tools/types';
import { ClassificationResult, ConversationTurn, OutstandingResult, SessionHint } from '../config/types';
import { RejectedToolCall } from '../generator/response-generator';
import { InferenceCallRecord } from '../llm/cost-ledger';

export type ToolCallState =
  | 'proposed'
  | 'executing'
  | 'completed'
  | 'awaiting_confirmation'
  | 'confirmed'
  | 'rejected'
  | 'cancelled'
  | 'fetching'
  | 'displayed';

export type CancelReason = 'rejected' | 'confirmation_expired' | 'confirmation_unavailable' | 'invalid_arguments';

export interface StateChange {
  from: ToolCallState;
  to: ToolCallState;
  at: number;
  reason: string;
}

/** A proposed tool call under governance, from proposal to its terminal state */
export interface GovernedToolCall {
  callId: string;
  turnId: string;
  sessionId: string;
  name: ToolName;
  args: Record<string, unknown>;
  mode: GovernanceMode;
  state: ToolCallState;
  /** Epoch ms after which an unresolved confirmation counts as rejected */
  deadline?: number;
  result?: ToolResult;
  cancelReason?: CancelReason;
  /** Who resolved a confirm-required call */
  resolvedBy?: string;
  transitions: StateChange[];
}

/** Data for a display-only widget */
export interface DisplayPayload {
  callId: string;
  tool: ToolName;
  widget: string;
  success: boolean;
  data?: unknown;
}

/** What the rendering surface needs to show a confirmation form */
export interface PendingConfirmation {
  callId: string;
  turnId: string;
  sessionId: string;
  tool: ToolName;
  label: string;
  args: Record<string, unknown>;
  deadline: number;
}

/**
 * Everything needed to finish a turn after its confirmations resolve.
 * Written when a turn suspends; the calls themselves are stored per call.
 */
export interface SuspendedTurn {
  turn: ConversationTurn;
  session?: SessionHint;
  classification: ClassificationResult;
  outstanding: OutstandingResult;
  degraded: boolean;
  draftBody: string;
  customer?: { name: string; email: string };
  rejectedToolCalls: RejectedToolCall[];
  displays: DisplayPayload[];
  /** All governed calls of the turn, in proposal order */
  callIds: string[];
  costCalls: InferenceCallRecord[];
  suspendedAt: number;
}

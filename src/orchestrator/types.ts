import { ClassificationResult, EvalResult, OutstandingResult } from '../config/types';
import { AssembledReply } from '../assembler/response-assembler';
import { DisplayPayload, GovernedToolCall, PendingConfirmation, ToolCallState } from '../governance/types';
import { RejectedToolCall } from '../generator/response-generator';
import { TurnCost } from '../llm/cost-ledger';
import { ToolResult } from '../tools/types';

export type PipelineStage = 'pre_filter' | 'classify' | 'context' | 'generate' | 'govern' | 'assemble' | 'evaluate';

export interface CompletedTurn {
  status: 'completed';
  turnId: string;
  sessionId: string;
  evalResult: EvalResult;
  reply: AssembledReply;
  /** Absent when the pre-filter ended the turn before classification */
  classification?: ClassificationResult;
  outstanding?: OutstandingResult;
  toolCalls: GovernedToolCall[];
  displays: DisplayPayload[];
  rejectedToolCalls: RejectedToolCall[];
  degraded: boolean;
  /** False when the history append failed; the disposition above still stands */
  persisted: boolean;
  cost: TurnCost;
}

export interface SuspendedTurnOutcome {
  status: 'awaiting_confirmation';
  turnId: string;
  sessionId: string;
  classification: ClassificationResult;
  pendingCalls: PendingConfirmation[];
  toolCalls: GovernedToolCall[];
  displays: DisplayPayload[];
  cost: TurnCost;
}

export interface CancelledTurn {
  status: 'cancelled';
  turnId: string;
  sessionId: string;
  /** Stage that would have run next */
  stage: PipelineStage;
}

export type TurnOutcome = CompletedTurn | SuspendedTurnOutcome | CancelledTurn;

export interface ConfirmationAck {
  callId: string;
  accepted: boolean;
  /** The call had already been resolved; nothing was executed */
  alreadyResolved?: boolean;
  reason?: 'unknown_call' | 'confirmation_expired';
  state?: ToolCallState;
  result?: ToolResult;
  /** Present when this resolution let the suspended turn finish */
  outcome?: CompletedTurn;
}

export type InvalidTurnReason = 'empty_message' | 'message_too_long' | 'invalid_channel';

/** Input rejected before the pipeline starts; nothing was recorded */
export class InvalidTurnError extends Error {
  constructor(readonly reason: InvalidTurnReason, message: string) {
    super(message);
    this.name = 'InvalidTurnError';
  }
}

import { Category, Channel, ConversationTurn, Disposition, EvalTier } from '../config/types';

/** Persisted copy of one finalized turn */
export interface TurnRecord {
  turnId: string;
  sessionId: string;
  channel: Channel;
  text: string;
  receivedAt: number;
  category: Category;
  disposition: Disposition;
  tier: EvalTier;
  reasons: string[];
  reply: string;
  /** Trigger reported by the outstanding detector, when it flagged the turn */
  outstandingTrigger?: string;
  finalizedAt: number;
}

export interface TurnDisposition {
  category: Category;
  disposition: Disposition;
  tier: EvalTier;
  reasons: string[];
  reply: string;
  outstandingTrigger?: string;
}

export interface HistoryStore {
  /** Most recent turns first */
  recentTurns(sessionId: string, limit: number): Promise<TurnRecord[]>;
  /** Throws when the write did not happen */
  append(turn: ConversationTurn, outcome: TurnDisposition): Promise<void>;
}

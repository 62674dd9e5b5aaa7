import { Category, Disposition } from '../config/types';
import { CustomerRecord } from '../platform/types';

export type ContextField = 'identity' | 'account' | 'history';

export type AccountFactKind = 'subscription' | 'shipment' | 'transaction' | 'support';

export interface AccountFact {
  kind: AccountFactKind;
  text: string;
}

/** One prior turn, kept verbatim apart from reply truncation */
export interface HistoryEntry {
  turnId: string;
  receivedAt: number;
  category: Category;
  disposition: Disposition;
  customerText: string;
  reply: string;
}

export interface ContextBundle {
  sessionId: string;
  category: Category;
  /** Absent when the customer has not been identified */
  identity?: CustomerRecord;
  accountFacts: AccountFact[];
  /** Most recent first */
  history: HistoryEntry[];
  /** Single-line digest of turns older than the verbatim window */
  olderSummary?: string;
  /** Outstanding trigger recorded on the most recent flagged prior turn */
  riskFlag?: string;
  /** Lookups that failed or timed out */
  omitted: ContextField[];
  truncated: boolean;
}

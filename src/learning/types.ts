import { Category } from '../config/types';

export const CORRECTION_TYPES = ['tone', 'accuracy', 'safety', 'completeness'] as const;
export type CorrectionType = (typeof CORRECTION_TYPES)[number];

/** A human edit of a drafted reply, kept as a few-shot example for its category */
export interface CorrectionRecord {
  id: string;
  category: Category;
  sessionId?: string;
  turnId?: string;
  aiResponse: string;
  humanEdit: string;
  correctionType: CorrectionType;
  /** Reviewer's short description of what was wrong */
  issue?: string;
  createdAt: number;
}

export interface CorrectionStore {
  save(record: CorrectionRecord): Promise<void>;
  /** Newest first */
  recent(category: Category, limit: number): Promise<CorrectionRecord[]>;
}

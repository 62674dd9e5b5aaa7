export interface KnowledgeEntry {
  id: string;
  title: string;
  content: string;
  tags: string[];
}

export interface KnowledgeDocument {
  id: string;
  partition: string;
  title: string;
  content: string;
  tags: string[];
  /** Term-overlap relevance in [0, 1] */
  score: number;
}

/** Ranked document search over named partitions */
export interface KnowledgeLookup {
  search(partition: string, query: string, limit?: number): Promise<KnowledgeDocument[]>;
}

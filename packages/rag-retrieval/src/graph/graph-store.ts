/**
 * @module @corrective-rag/retrieval/graph/graph-store
 * Knowledge-graph lookup used to enrich vector results
 */

export interface GraphMention {
  sourceId: string;
  chunkIndex?: number;
  content: string;
}

export interface GraphHit {
  entity: string;
  type: string;
  /** 0 for an entity matched by a term, 1+ for entities reached over relations */
  hops: number;
  relation?: string;
  mention: GraphMention;
}

export interface GraphLookupOptions {
  limit: number;
  maxHops?: number;
}

export interface GraphStore {
  /**
   * Entities whose name contains one of `terms` (case-insensitive), then their neighbours
   * up to `maxHops`, each with the chunks that mention them
   */
  findRelated(terms: string[], options: GraphLookupOptions): Promise<GraphHit[]>;
}

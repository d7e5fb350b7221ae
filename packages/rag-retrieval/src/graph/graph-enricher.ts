/**
 * @module @corrective-rag/retrieval/graph/graph-enricher
 * Appends graph-related passages to a vector result set.
 *
 * Terms come from the query (longer words) and from capitalized names in the
 * retrieved passages. Related passages are only appended, deduplicated by
 * source and chunk; the vector ranking is left untouched.
 */

import type { Passage } from '@corrective-rag/contracts';
import { describeError, getLogger } from '@corrective-rag/core';
import type { GraphHit, GraphStore } from './graph-store.js';

export interface GraphEnricherOptions {
  store: GraphStore;
  /** Maximum graph passages appended per call */
  limit?: number;
  maxHops?: number;
  /** Score given to passages of entities matched directly by a term */
  directScore?: number;
  /** Score given to passages reached over a relation */
  neighborScore?: number;
}

const QUERY_STOPWORDS = new Set([
  'what', 'when', 'where', 'which', 'who', 'whom', 'whose', 'why', 'how',
  'does', 'have', 'with', 'from', 'that', 'this', 'there', 'their', 'about',
  'into', 'than', 'then', 'them', 'they', 'were', 'will', 'would', 'could',
  'should', 'tell', 'explain', 'describe',
]);

const logger = getLogger('rag:retrieval:graph');

export function passageKey(passage: Pick<Passage, 'sourceId' | 'chunkIndex'>): string {
  return `${passage.sourceId}#${passage.chunkIndex ?? ''}`;
}

/**
 * Lookup terms for the graph: query words longer than three characters (minus
 * question words) and capitalized names found in passages
 */
export function extractTerms(query: string, passages: readonly Passage[]): string[] {
  const terms = new Set<string>();

  for (const word of query.toLowerCase().match(/[\p{L}\p{N}][\p{L}\p{N}-]*/gu) ?? []) {
    if (word.length > 3 && !QUERY_STOPWORDS.has(word)) {
      terms.add(word);
    }
  }

  for (const passage of passages) {
    for (const name of passage.content.match(/\b[A-Z][\p{L}\p{N}-]{2,}/gu) ?? []) {
      const lowered = name.toLowerCase();
      if (!QUERY_STOPWORDS.has(lowered)) {
        terms.add(lowered);
      }
    }
  }

  return [...terms];
}

/**
 * Anything that adds related passages to a retrieved set
 */
export interface PassageEnricher {
  enrich(query: string, passages: readonly Passage[]): Promise<Passage[]>;
}

export class GraphEnricher implements PassageEnricher {
  private readonly store: GraphStore;
  private readonly limit: number;
  private readonly maxHops: number;
  private readonly directScore: number;
  private readonly neighborScore: number;

  constructor(options: GraphEnricherOptions) {
    this.store = options.store;
    this.limit = options.limit ?? 5;
    this.maxHops = options.maxHops ?? 1;
    this.directScore = options.directScore ?? 0.75;
    this.neighborScore = options.neighborScore ?? 0.6;
  }

  /**
   * Graph passages not already present in `passages`. Lookup failures yield `[]`.
   */
  async enrich(query: string, passages: readonly Passage[]): Promise<Passage[]> {
    const terms = extractTerms(query, passages);
    if (terms.length === 0) {
      return [];
    }

    let hits: GraphHit[];
    try {
      hits = await this.store.findRelated(terms, { limit: this.limit * 2, maxHops: this.maxHops });
    } catch (error) {
      logger.warn('Graph lookup failed, skipping enrichment', {
        code: 'RAG_GRAPH_ERROR',
        error: describeError(error),
      });
      return [];
    }

    const seen = new Set(passages.map(passageKey));
    const added: Passage[] = [];

    for (const hit of hits) {
      if (added.length >= this.limit) {
        break;
      }
      const key = passageKey(hit.mention);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      added.push({
        sourceId: hit.mention.sourceId,
        content: hit.mention.content,
        score: hit.hops === 0 ? this.directScore : this.neighborScore,
        chunkIndex: hit.mention.chunkIndex,
        origin: 'graph',
        metadata: {
          entity: hit.entity,
          entityType: hit.type,
          hops: hit.hops,
          ...(hit.relation ? { relation: hit.relation } : {}),
        },
      });
    }

    logger.debug('Graph enrichment complete', { terms: terms.length, hits: hits.length, added: added.length });
    return added;
  }
}

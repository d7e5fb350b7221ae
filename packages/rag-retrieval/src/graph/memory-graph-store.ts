/**
 * @module @corrective-rag/retrieval/graph/memory-graph-store
 * Adjacency-list graph kept in process
 */

import type { GraphHit, GraphLookupOptions, GraphMention, GraphStore } from './graph-store.js';

interface EntityNode {
  name: string;
  type: string;
  mentions: GraphMention[];
  edges: Array<{ target: string; relation: string }>;
}

export class MemoryGraphStore implements GraphStore {
  private readonly entities = new Map<string, EntityNode>();

  addEntity(name: string, type = 'CONCEPT'): this {
    this.node(name).type = type;
    return this;
  }

  addMention(entity: string, mention: GraphMention): this {
    this.node(entity).mentions.push(mention);
    return this;
  }

  /**
   * Relations are traversed in both directions
   */
  addRelation(from: string, to: string, relation: string): this {
    const source = this.node(from);
    const target = this.node(to);
    source.edges.push({ target: target.name.toLowerCase(), relation });
    target.edges.push({ target: source.name.toLowerCase(), relation });
    return this;
  }

  get size(): number {
    return this.entities.size;
  }

  async findRelated(terms: string[], options: GraphLookupOptions): Promise<GraphHit[]> {
    const { limit, maxHops = 1 } = options;
    const needles = terms.map(term => term.toLowerCase()).filter(term => term.length > 0);
    if (needles.length === 0 || limit <= 0) {
      return [];
    }

    const visited = new Map<string, { hops: number; relation?: string }>();
    let frontier: string[] = [];

    for (const key of this.entities.keys()) {
      if (needles.some(needle => key.includes(needle))) {
        visited.set(key, { hops: 0 });
        frontier.push(key);
      }
    }

    for (let hop = 1; hop <= maxHops && frontier.length > 0; hop++) {
      const next: string[] = [];
      for (const key of frontier) {
        for (const edge of this.entities.get(key)?.edges ?? []) {
          if (!visited.has(edge.target)) {
            visited.set(edge.target, { hops: hop, relation: edge.relation });
            next.push(edge.target);
          }
        }
      }
      frontier = next;
    }

    const hits: GraphHit[] = [];
    for (const [key, { hops, relation }] of visited) {
      const node = this.entities.get(key);
      if (!node) {
        continue;
      }
      for (const mention of node.mentions) {
        hits.push({ entity: node.name, type: node.type, hops, relation, mention });
      }
    }

    return hits.sort((a, b) => a.hops - b.hops).slice(0, limit);
  }

  private node(name: string): EntityNode {
    const key = name.toLowerCase();
    let node = this.entities.get(key);
    if (!node) {
      node = { name, type: 'CONCEPT', mentions: [], edges: [] };
      this.entities.set(key, node);
    }
    return node;
  }
}

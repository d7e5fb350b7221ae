/**
 * Conversation Memory
 *
 * Recent turns per session, fed back to the router as history.
 * Sessions are evicted least-recently-used first and expire when idle.
 */

import type { ConversationTurn } from '@corrective-rag/contracts';

export interface ConversationMemoryOptions {
  /** Maximum sessions kept */
  maxSessions?: number;
  /** Turns kept per session (a question and its answer are two turns) */
  maxTurns?: number;
  /** Idle time after which a session is forgotten */
  ttlMs?: number;
}

interface SessionEntry {
  turns: ConversationTurn[];
  updatedAt: number;
}

const DEFAULT_OPTIONS = {
  maxSessions: 100,
  maxTurns: 10,
  ttlMs: 30 * 60 * 1000, // 30 minutes
};

export class ConversationMemory {
  private readonly options: Required<ConversationMemoryOptions>;
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly accessOrder: string[] = [];

  constructor(options: ConversationMemoryOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Turns for a session, oldest first. Empty for unknown or expired sessions.
   */
  history(sessionId: string): ConversationTurn[] {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return [];
    }

    if (Date.now() - entry.updatedAt > this.options.ttlMs) {
      this.clear(sessionId);
      return [];
    }

    this.touch(sessionId);
    return [...entry.turns];
  }

  append(sessionId: string, ...turns: ConversationTurn[]): void {
    const existing = this.sessions.get(sessionId);
    const entry: SessionEntry = existing ?? { turns: [], updatedAt: 0 };

    entry.turns.push(...turns);
    if (entry.turns.length > this.options.maxTurns) {
      entry.turns.splice(0, entry.turns.length - this.options.maxTurns);
    }
    entry.updatedAt = Date.now();

    this.sessions.set(sessionId, entry);
    this.touch(sessionId);

    while (this.sessions.size > this.options.maxSessions) {
      const oldest = this.accessOrder.shift();
      if (oldest === undefined) {
        break;
      }
      this.sessions.delete(oldest);
    }
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
    const index = this.accessOrder.indexOf(sessionId);
    if (index !== -1) {
      this.accessOrder.splice(index, 1);
    }
  }

  getStats(): { sessions: number; turns: number } {
    let turns = 0;
    for (const entry of this.sessions.values()) {
      turns += entry.turns.length;
    }
    return { sessions: this.sessions.size, turns };
  }

  private touch(sessionId: string): void {
    const index = this.accessOrder.indexOf(sessionId);
    if (index !== -1) {
      this.accessOrder.splice(index, 1);
    }
    this.accessOrder.push(sessionId);
  }
}

import { afterEach, describe, it, expect, vi } from 'vitest';
import { ConversationMemory } from '../memory/conversation-memory.js';

const user = (content: string) => ({ role: 'user' as const, content });
const assistant = (content: string) => ({ role: 'assistant' as const, content });

describe('ConversationMemory', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns an empty history for unknown sessions', () => {
    expect(new ConversationMemory().history('missing')).toEqual([]);
  });

  it('keeps only the most recent turns', () => {
    const memory = new ConversationMemory({ maxTurns: 3 });

    memory.append('s', user('q1'), assistant('a1'));
    memory.append('s', user('q2'), assistant('a2'));

    expect(memory.history('s')).toEqual([assistant('a1'), user('q2'), assistant('a2')]);
  });

  it('returns a copy of the stored turns', () => {
    const memory = new ConversationMemory();
    memory.append('s', user('q1'));

    memory.history('s').push(user('injected'));

    expect(memory.history('s')).toEqual([user('q1')]);
  });

  it('evicts the least recently used session', () => {
    const memory = new ConversationMemory({ maxSessions: 2 });

    memory.append('a', user('qa'));
    memory.append('b', user('qb'));
    memory.history('a');
    memory.append('c', user('qc'));

    expect(memory.history('b')).toEqual([]);
    expect(memory.history('a')).toEqual([user('qa')]);
    expect(memory.history('c')).toEqual([user('qc')]);
    expect(memory.getStats()).toEqual({ sessions: 2, turns: 2 });
  });

  it('forgets idle sessions', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const memory = new ConversationMemory({ ttlMs: 1000 });

    memory.append('s', user('q1'));
    vi.setSystemTime(new Date('2026-01-01T00:00:02Z'));

    expect(memory.history('s')).toEqual([]);
    expect(memory.getStats()).toEqual({ sessions: 0, turns: 0 });
  });

  it('clears a session', () => {
    const memory = new ConversationMemory();
    memory.append('s', user('q1'));

    memory.clear('s');

    expect(memory.history('s')).toEqual([]);
  });
});

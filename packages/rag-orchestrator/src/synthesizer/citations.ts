import { contentPreview, type Citation, type Passage } from '@corrective-rag/contracts';

// [1], [1, 3], [Source 2], [source:2], [Sources 1, 2]
const MARKER = /\[\s*(?:sources?\s*:?\s*)?(\d+(?:\s*,\s*(?:sources?\s*:?\s*)?\d+)*)\s*\]/gi;

/**
 * 1-based passage ids cited in `answer`, in order of first reference.
 * Ids outside `1..passageCount` are ignored.
 */
export function citedIds(answer: string, passageCount: number): number[] {
  const ids: number[] = [];

  for (const match of answer.matchAll(MARKER)) {
    for (const digits of (match[1] ?? '').match(/\d+/g) ?? []) {
      const id = Number(digits);
      if (id >= 1 && id <= passageCount && !ids.includes(id)) {
        ids.push(id);
      }
    }
  }

  return ids;
}

export function toCitation(passage: Passage): Citation {
  return {
    source: passage.sourceId,
    contentPreview: contentPreview(passage.content),
    similarityScore: passage.score,
    ...(passage.chunkIndex !== undefined ? { chunkId: passage.chunkIndex } : {}),
  };
}

/**
 * Citations for the passages an answer references. With no valid markers every
 * context passage counts as used.
 */
export function buildCitations(answer: string, context: readonly Passage[]): Citation[] {
  const ids = citedIds(answer, context.length);
  const used = ids.length > 0
    ? ids.flatMap(id => {
        const passage = context[id - 1];
        return passage ? [passage] : [];
      })
    : context;

  return used.map(toCitation);
}

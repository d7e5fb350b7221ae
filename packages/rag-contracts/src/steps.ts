import type { StepName } from './types.js';

/**
 * Human-readable progress labels, shown by clients while a run is in flight
 */
export const STEP_LABELS: Readonly<Record<StepName, string>> = {
  route: 'Analyzing query intent',
  retrieve: 'Searching knowledge base',
  grade: 'Evaluating relevance',
  rewrite: 'Refining search query',
  web_search: 'Searching the web',
  synthesize: 'Generating response',
};

export const CONTENT_PREVIEW_LENGTH = 200;

/**
 * First `CONTENT_PREVIEW_LENGTH` characters of a passage, with an ellipsis when cut
 */
export function contentPreview(content: string): string {
  return content.length > CONTENT_PREVIEW_LENGTH
    ? `${content.slice(0, CONTENT_PREVIEW_LENGTH)}...`
    : content;
}

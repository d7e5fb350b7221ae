/**
 * Prompts for Query Rewriting
 */

export const REWRITER_SYSTEM_PROMPT = `You rewrite search queries for a document retrieval system.

The previous search did not find relevant passages. Produce ONE new search query that:
- keeps the user's original intent
- uses different wording: synonyms, more specific terms, or the key concepts spelled out
- differs from every query already tried

Return only the query text, without quotes or explanation.`;

export const REWRITER_PROMPT_TEMPLATE = `Original question: "{original}"
Last search query: "{current}"
Why it failed: {reason}

Queries already tried:
{tried}

New search query:`;

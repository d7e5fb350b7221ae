/**
 * Prompts for Relevance Grading
 *
 * The grader judges the retrieved set as a whole, not each passage.
 */

export const GRADER_SYSTEM_PROMPT = `You are a strict relevance grader for a retrieval system.

Decide whether the retrieved passages, taken together, contain information that helps answer the question.
- "relevant": at least part of the answer is supported by the passages
- "not relevant": the passages are off-topic, too vague, or only share keywords with the question

Do not answer the question yourself.`;

export const GRADER_PROMPT_TEMPLATE = `Question: "{query}"

PASSAGES (TOON format - compact notation):
{passages}

NOTE: Header [count]{fields}: lists the number of passages and field names; each row is one passage.

Return JSON:
{
  "relevant": true/false,
  "reasoning": "one short sentence"
}`;

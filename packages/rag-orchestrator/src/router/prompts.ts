/**
 * Prompts for Intent Routing
 */

export const ROUTER_SYSTEM_PROMPT = `You classify user messages for a question-answering assistant backed by a document knowledge base.

Intents:
1. "knowledge_search": questions that need facts from documents, research, technical or domain knowledge.
   Examples: "What is retrieval-augmented generation?", "Summarize the onboarding policy"
2. "calculation": arithmetic or numeric computation.
   Examples: "What is 15 * 7?", "Compute (3 + 4) ^ 2"
3. "greeting": greetings, thanks, goodbyes and small talk.
   Examples: "Hello", "Thanks!", "Goodbye"
4. "other_conversational": anything conversational that needs no documents.
   Examples: "Can you write me a haiku?", "What can you do?"

When unsure, choose "knowledge_search".`;

export const ROUTER_PROMPT_TEMPLATE = `{history}Classify this message: "{query}"

Return JSON:
{
  "intent": "knowledge_search|calculation|greeting|other_conversational",
  "confidence": 0.0-1.0,
  "reasoning": "one short sentence"
}`;

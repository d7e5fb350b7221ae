import { z } from 'zod';

export const INTENTS = [
  'knowledge_search',
  'calculation',
  'greeting',
  'other_conversational',
] as const;

export const IntentSchema = z.enum(INTENTS);

export const GraphEnrichmentModeSchema = z.enum(['merge', 'separate', 'off']);

export type GraphEnrichmentMode = z.infer<typeof GraphEnrichmentModeSchema>;

/**
 * Tunables for a single workflow run. Every field has a default, so `{}` is a valid config.
 */
export const WorkflowConfigSchema = z
  .object({
    maxIterations: z.number().int().min(1).default(3),
    retrievalK: z.number().int().min(1).default(5),
    similarityThreshold: z.number().min(0).max(1).default(0.5),
    /** How graph-enriched passages are graded: with vector passages, on their own, or not fetched */
    graphEnrichment: GraphEnrichmentModeSchema.default('merge'),
    webSearchEnabled: z.boolean().default(true),
    maxContextPassages: z.number().int().min(1).default(5),
    webSearchConfidenceFactor: z.number().gt(0).lt(1).default(0.7),
  })
  .strict();

export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;
export type WorkflowConfigInput = z.input<typeof WorkflowConfigSchema>;

export const MAX_QUERY_LENGTH = 2000;

export const ConversationTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

/**
 * Chat request accepted by the gateway. `sessionId` falls back to `session-<epoch seconds>`.
 */
export const ChatRequestSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'Query must not be empty')
    .max(MAX_QUERY_LENGTH, `Query must be at most ${MAX_QUERY_LENGTH} characters`),
  userId: z.string().min(1).default('default'),
  sessionId: z
    .string()
    .min(1)
    .optional()
    .transform(value => value ?? `session-${Math.floor(Date.now() / 1000)}`),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;
export type ChatRequestInput = z.input<typeof ChatRequestSchema>;

export const CitationSchema = z.object({
  source: z.string(),
  contentPreview: z.string(),
  similarityScore: z.number(),
  chunkId: z.number().int().optional(),
});

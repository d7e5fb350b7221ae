/**
 * @module @corrective-rag/core/config
 * Environment-backed settings
 */

import { z } from 'zod';
import { createRagError } from '../error/rag-error.js';

const optionalString = z
  .string()
  .trim()
  .transform(value => (value.length > 0 ? value : undefined))
  .optional();

export const SettingsSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o'),
  OPENAI_GRADER_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  TAVILY_API_KEY: optionalString,
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  RETRIEVAL_K: z.coerce.number().int().min(1).default(5),
  MAX_ITERATIONS: z.coerce.number().int().min(1).default(3),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Parse settings from an environment map (defaults to `process.env`).
 * Empty strings count as unset.
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const input: Record<string, string> = {};
  for (const key of Object.keys(SettingsSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      input[key] = key === 'LOG_LEVEL' ? value.toLowerCase() : value;
    }
  }

  const parsed = SettingsSchema.safeParse(input);
  if (!parsed.success) {
    const keys = parsed.error.issues.map(issue => issue.path.join('.')).join(', ');
    throw createRagError('RAG_CONFIG_ERROR', `Invalid settings: ${keys}`, {
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}

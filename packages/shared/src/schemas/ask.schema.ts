// ============================================================================
// Natural-Language Assistant: Zod Validation Schemas
// ============================================================================

import { z } from 'zod';

// --- POST /ask ---

// A blank question is rejected by the handler (400); a missing or
// non-string question fails here.
export const askQuestionSchema = z.object({
  question: z.string(),
});

export type AskQuestion = z.infer<typeof askQuestionSchema>;

export const askResponseSchema = z.object({
  answer: z.string(),
  results: z.array(z.record(z.unknown())),
  out_of_scope: z.boolean(),
  sql_query: z.string().nullable().optional(),
  error: z.string().nullable().optional(),
});

export type AskResponse = z.infer<typeof askResponseSchema>;

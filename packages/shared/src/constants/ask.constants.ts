// ============================================================================
// Natural-Language Assistant: Constants
// ============================================================================

/**
 * A question is in scope when it contains at least one of these terms
 * (case-insensitive substring match).
 */
export const DOMAIN_KEYWORDS: readonly string[] = Object.freeze([
  'hospital',
  'doctor',
  'medical',
  'procedure',
  'surgery',
  'cost',
  'price',
  'drg',
  'rating',
  'quality',
  'cheapest',
  'best',
  'near',
  'zip',
  'miles',
  'knee',
  'heart',
  'joint',
  'replacement',
  'bypass',
  'cardiac',
  'orthopedic',
]);

/** Generated statements containing any of these (as substrings) are rejected. */
export const MUTATING_SQL_KEYWORDS: readonly string[] = Object.freeze([
  'DROP',
  'DELETE',
  'INSERT',
  'UPDATE',
  'CREATE',
  'ALTER',
  'EXEC',
  'EXECUTE',
]);

/** Row cap the model is instructed to apply to generated statements. */
export const GENERATED_SQL_ROW_LIMIT = 10;

/** Results handed to the model when it writes the answer. */
export const ANSWER_CONTEXT_RESULT_LIMIT = 5;

// --- Model call settings ---

export const SQL_SYNTHESIS_TEMPERATURE = 0.1;
export const SQL_SYNTHESIS_MAX_TOKENS = 500;
export const ANSWER_SYNTHESIS_TEMPERATURE = 0.7;
export const ANSWER_SYNTHESIS_MAX_TOKENS = 300;

export const DEFAULT_LLM_BASE_URL = 'https://api.openai.com';
export const DEFAULT_LLM_MODEL = 'gpt-4o';
export const DEFAULT_LLM_TIMEOUT_MS = 30_000;

/** Value shipped in sample .env files; treated as "no key configured". */
export const PLACEHOLDER_API_KEY = 'your-openai-api-key-here';

// --- Fixed answers ---

export const AskMessage = {
  OUT_OF_SCOPE:
    'I can only help with hospital pricing and quality information. Please ask about medical procedures, costs, or hospital ratings.',
  NO_MATCHES:
    "I couldn't find any hospitals matching your criteria. Please try different search terms or a broader location.",
  EMPTY_MODEL_ANSWER:
    "I couldn't generate a response. Please try rephrasing your question.",
} as const;

export type AskMessage = (typeof AskMessage)[keyof typeof AskMessage];

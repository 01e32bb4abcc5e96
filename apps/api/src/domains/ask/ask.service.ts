// ============================================================================
// Assistant: Natural-language question pipeline
// scope check → parameter extraction → SQL synthesis → guarded read-only
// execution → fallback search → answer synthesis
// ============================================================================

import {
  AskMessage,
  ANSWER_CONTEXT_RESULT_LIMIT,
  ANSWER_SYNTHESIS_MAX_TOKENS,
  ANSWER_SYNTHESIS_TEMPERATURE,
  GENERATED_SQL_ROW_LIMIT,
  SQL_SYNTHESIS_MAX_TOKENS,
  SQL_SYNTHESIS_TEMPERATURE,
} from '@costnav/shared/constants/ask.constants.js';
import {
  providerResultSchema,
  type ProviderResult,
} from '@costnav/shared/schemas/pricing.schema.js';
import type { PricingRepository, QueryRow } from '../provider/provider.repository.js';
import { searchProviders } from '../provider/provider.service.js';
import { errorMessage } from '../../lib/errors.js';
import type { ChatMessage, LanguageModel, LlmClient } from './ask.llm.js';
import {
  bindNamedPlaceholders,
  failed,
  guardGeneratedSql,
  succeeded,
  type StageResult,
} from './ask.sql.js';
import {
  extractParameters,
  isInScope,
  toPlaceholderValues,
  type ExtractedParameters,
} from './ask.extract.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by handler / test)
// ---------------------------------------------------------------------------

export interface AskLogger {
  warn(data: Record<string, unknown>, msg: string): void;
  error(data: Record<string, unknown>, msg: string): void;
}

export interface AskServiceDeps {
  repo: Pick<PricingRepository, 'findPricedProcedures' | 'executeReadOnly'>;
  model: LanguageModel;
  logger: AskLogger;
}

export interface AskResult {
  answer: string;
  results: QueryRow[];
  outOfScope: boolean;
  /** Statement produced by the model, when one passed the guard. */
  sqlQuery: string | null;
  /** Message of a failure that was absorbed on the way to an answer. */
  error: string | null;
}

// ---------------------------------------------------------------------------
// Prompts
// ---------------------------------------------------------------------------

export const SQL_SYSTEM_PROMPT = `You are a SQL expert for a healthcare database. Generate a safe PostgreSQL query based on the user's question.

Database schema:
- hospitals: provider_id (PK), provider_name, provider_city, provider_state, provider_zip_code
- procedures: id (PK), provider_id (FK), ms_drg_code (VARCHAR), ms_drg_definition, total_discharges, average_covered_charges, average_total_payments, average_medicare_payments
- ratings: id (PK), provider_id (FK), rating (1-10 scale)

Rules:
1. Only generate a single SELECT statement
2. Use proper JOINs to connect tables
3. Include WHERE clauses for filtering
4. Use ORDER BY for sorting
5. Limit results to ${GENERATED_SQL_ROW_LIMIT} rows
6. Never use INSERT, UPDATE, DELETE, or DROP
7. Refer to values from the question only through the named placeholders :drg, :zip_code and :radius_km; never quote a placeholder
8. Always include provider information and ratings when available
9. Return ONLY the raw SQL query - NO markdown formatting, NO code blocks, NO explanations`;

export const ANSWER_SYSTEM_PROMPT = `You are a helpful healthcare assistant. Generate a concise, natural language answer based on the database results.
Focus on the most relevant information: hospital names, costs, ratings, and locations.
Keep the answer under 200 words and be conversational.`;

// ---------------------------------------------------------------------------
// Stage: SQL synthesis
// ---------------------------------------------------------------------------

export async function synthesizeSql(
  client: LlmClient,
  question: string,
): Promise<StageResult<string>> {
  const messages: ChatMessage[] = [
    { role: 'system', content: SQL_SYSTEM_PROMPT },
    { role: 'user', content: question },
  ];

  let content: string | null;
  try {
    const result = await client.chatCompletion(messages, {
      temperature: SQL_SYNTHESIS_TEMPERATURE,
      maxTokens: SQL_SYNTHESIS_MAX_TOKENS,
    });
    content = result.content;
  } catch (err) {
    return failed(`SQL synthesis failed: ${errorMessage(err)}`);
  }

  if (content === null) {
    return failed('Language model returned empty response');
  }
  return guardGeneratedSql(content);
}

// ---------------------------------------------------------------------------
// Stage: execution of the generated statement
// ---------------------------------------------------------------------------

export async function executeGeneratedSql(
  deps: Pick<AskServiceDeps, 'repo'>,
  statement: string,
  params: ExtractedParameters,
): Promise<StageResult<QueryRow[]>> {
  const bound = bindNamedPlaceholders(statement, toPlaceholderValues(params));
  if (!bound.ok) return bound;

  try {
    return succeeded(await deps.repo.executeReadOnly(bound.value));
  } catch (err) {
    return failed(`Generated SQL failed: ${errorMessage(err)}`);
  }
}

// ---------------------------------------------------------------------------
// Stage: deterministic fallback
// ---------------------------------------------------------------------------

export async function fallbackSearch(
  deps: Pick<AskServiceDeps, 'repo'>,
  params: ExtractedParameters,
): Promise<ProviderResult[]> {
  return searchProviders(
    { repo: deps.repo },
    {
      drg: params.drg,
      zipCode: params.zipCode,
      radiusKm: params.radiusKm,
      sortBy: params.sortBy,
    },
  );
}

interface Retrieval {
  results: QueryRow[];
  sqlQuery: string | null;
}

/**
 * Model path first; any failure along it (or no model at all) falls back
 * to the structured search. The fallback never runs alongside a pending
 * model call.
 */
async function retrieveResults(
  deps: AskServiceDeps,
  question: string,
  params: ExtractedParameters,
): Promise<Retrieval> {
  if (!deps.model.enabled) {
    return { results: await fallbackSearch(deps, params), sqlQuery: null };
  }

  const synthesized = await synthesizeSql(deps.model.client, question);
  if (!synthesized.ok) {
    deps.logger.warn({ reason: synthesized.reason }, 'SQL synthesis unusable; using fallback search');
    return { results: await fallbackSearch(deps, params), sqlQuery: null };
  }

  const executed = await executeGeneratedSql(deps, synthesized.value, params);
  if (!executed.ok) {
    deps.logger.warn({ reason: executed.reason }, 'Generated SQL not executed; using fallback search');
    return { results: await fallbackSearch(deps, params), sqlQuery: synthesized.value };
  }

  return { results: executed.value, sqlQuery: synthesized.value };
}

// ---------------------------------------------------------------------------
// Stage: answer synthesis
// ---------------------------------------------------------------------------

const currency = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatCurrency(amount: number): string {
  return `$${currency.format(amount)}`;
}

/**
 * Sentence naming the single result, or the cheapest of several. Rows that
 * do not carry the provider record shape are only counted.
 */
export function templateAnswer(results: QueryRow[]): string {
  const records: ProviderResult[] = [];
  for (const row of results) {
    const parsed = providerResultSchema.safeParse(row);
    if (parsed.success) records.push(parsed.data);
  }

  if (records.length === 0) {
    return `I found ${results.length} matching ${results.length === 1 ? 'record' : 'records'}.`;
  }

  if (results.length === 1) {
    const only = records[0];
    return `I found ${only.provider_name} in ${only.provider_city}, ${only.provider_state}. The average covered charges for ${only.ms_drg_definition} is ${formatCurrency(only.average_covered_charges)}.`;
  }

  const cheapest = records.reduce((best, record) =>
    record.average_covered_charges < best.average_covered_charges ? record : best,
  );
  return `I found ${results.length} hospitals. The most affordable option is ${cheapest.provider_name} in ${cheapest.provider_city} with average charges of ${formatCurrency(cheapest.average_covered_charges)}.`;
}

export async function summarizeWithModel(
  client: LlmClient,
  question: string,
  results: QueryRow[],
): Promise<StageResult<string>> {
  const resultsText = results
    .slice(0, ANSWER_CONTEXT_RESULT_LIMIT)
    .map((row) => JSON.stringify(row))
    .join('\n');

  try {
    const response = await client.chatCompletion(
      [
        { role: 'system', content: ANSWER_SYSTEM_PROMPT },
        { role: 'user', content: `Question: ${question}\n\nResults: ${resultsText}` },
      ],
      {
        temperature: ANSWER_SYNTHESIS_TEMPERATURE,
        maxTokens: ANSWER_SYNTHESIS_MAX_TOKENS,
      },
    );
    const content = response.content?.trim();
    return succeeded(content ? content : AskMessage.EMPTY_MODEL_ANSWER);
  } catch (err) {
    return failed(`Answer synthesis failed: ${errorMessage(err)}`);
  }
}

interface ComposedAnswer {
  answer: string;
  error: string | null;
}

export async function composeAnswer(
  deps: AskServiceDeps,
  question: string,
  results: QueryRow[],
): Promise<ComposedAnswer> {
  if (results.length === 0) {
    return { answer: AskMessage.NO_MATCHES, error: null };
  }

  if (!deps.model.enabled) {
    return { answer: templateAnswer(results), error: null };
  }

  const summary = await summarizeWithModel(deps.model.client, question, results);
  if (!summary.ok) {
    deps.logger.warn({ reason: summary.reason }, 'Answer synthesis failed; using templated answer');
    return { answer: templateAnswer(results), error: summary.reason };
  }
  return { answer: summary.value, error: null };
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Answer a question about hospital pricing. Downstream failures degrade to
 * the deterministic search; if even that throws, the deterministic path is
 * tried once more and the first failure is reported in `error`. Only a
 * second failure reaches the caller.
 */
export async function processQuestion(
  deps: AskServiceDeps,
  question: string,
): Promise<AskResult> {
  if (!isInScope(question)) {
    return {
      answer: AskMessage.OUT_OF_SCOPE,
      results: [],
      outOfScope: true,
      sqlQuery: null,
      error: null,
    };
  }

  const params = extractParameters(question);

  try {
    const { results, sqlQuery } = await retrieveResults(deps, question, params);
    const { answer, error } = await composeAnswer(deps, question, results);
    return { answer, results, outOfScope: false, sqlQuery, error };
  } catch (err) {
    deps.logger.error({ err: errorMessage(err) }, 'Assistant pipeline failed; retrying fallback search');
    const results = await fallbackSearch(deps, params);
    const { answer } = await composeAnswer(deps, question, results);
    return {
      answer,
      results,
      outOfScope: false,
      sqlQuery: null,
      error: errorMessage(err),
    };
  }
}

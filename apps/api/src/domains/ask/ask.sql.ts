// ============================================================================
// Assistant: Generated SQL handling
// Cleaning, the mutating-keyword guard, and binding of named placeholders
// to real query parameters.
// ============================================================================

import { sql, type SQL } from 'drizzle-orm';
import { MUTATING_SQL_KEYWORDS } from '@costnav/shared/constants/ask.constants.js';

// ---------------------------------------------------------------------------
// Stage results
// ---------------------------------------------------------------------------

export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export function succeeded<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function failed<T>(reason: string): StageResult<T> {
  return { ok: false, reason };
}

// ---------------------------------------------------------------------------
// Cleaning + guard
// ---------------------------------------------------------------------------

/** Remove markdown code fences the model was told not to emit. */
export function stripCodeFences(text: string): string {
  let statement = text.trim();
  statement = statement.replace(/^```(?:sql)?/i, '');
  statement = statement.replace(/```$/, '');
  return statement.trim();
}

/**
 * First data-mutating keyword found anywhere in the statement
 * (case-insensitive substring, so `updated_at` trips it too).
 */
export function findMutatingKeyword(statement: string): string | undefined {
  const upper = statement.toUpperCase();
  return MUTATING_SQL_KEYWORDS.find((keyword) => upper.includes(keyword));
}

export function guardGeneratedSql(raw: string): StageResult<string> {
  const statement = stripCodeFences(raw);
  if (statement.length === 0) {
    return failed('Language model returned an empty statement');
  }
  const keyword = findMutatingKeyword(statement);
  if (keyword) {
    return failed(`Generated SQL contains dangerous operations (${keyword})`);
  }
  return succeeded(statement);
}

// ---------------------------------------------------------------------------
// Placeholder binding
// ---------------------------------------------------------------------------

export type PlaceholderValues = Readonly<Record<string, string | number | undefined>>;

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /\w/;
const QUOTED_PLACEHOLDER = /^':([A-Za-z_]\w*)'$/;

/**
 * Turn `:name` placeholders into bound parameters.
 *
 * Placeholders inside string literals are left as text, except a literal
 * that is nothing but a placeholder (`':drg'`), which binds like `:drg`.
 * `::type` casts and double-quoted identifiers pass through untouched.
 * A placeholder without a value fails the stage.
 */
export function bindNamedPlaceholders(
  statement: string,
  values: PlaceholderValues,
): StageResult<SQL> {
  const chunks: SQL[] = [];
  let text = '';
  let i = 0;

  const bind = (name: string): string | undefined => {
    const value = values[name];
    if (value === undefined) return `No value for placeholder :${name}`;
    chunks.push(sql.raw(text));
    chunks.push(sql`${String(value)}`);
    text = '';
    return undefined;
  };

  while (i < statement.length) {
    const ch = statement[i];

    if (ch === "'" || ch === '"') {
      const end = findClosingQuote(statement, i);
      if (end === -1) {
        return failed('Unterminated quoted text in generated SQL');
      }
      const quoted = statement.slice(i, end + 1);
      const placeholder = ch === "'" ? QUOTED_PLACEHOLDER.exec(quoted) : null;
      if (placeholder) {
        const error = bind(placeholder[1]);
        if (error) return failed(error);
      } else {
        text += quoted;
      }
      i = end + 1;
      continue;
    }

    if (ch === ':') {
      if (statement[i + 1] === ':') {
        text += '::';
        i += 2;
        continue;
      }
      if (IDENTIFIER_START.test(statement[i + 1] ?? '')) {
        let end = i + 2;
        while (end < statement.length && IDENTIFIER_PART.test(statement[end])) end++;
        const error = bind(statement.slice(i + 1, end));
        if (error) return failed(error);
        i = end;
        continue;
      }
    }

    text += ch;
    i++;
  }

  chunks.push(sql.raw(text));
  return succeeded(sql.join(chunks));
}

/** Index of the quote closing the one at `start`; doubled quotes are escapes. */
function findClosingQuote(statement: string, start: number): number {
  const quote = statement[start];
  let i = start + 1;
  while (i < statement.length) {
    if (statement[i] === quote) {
      if (statement[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i;
    }
    i++;
  }
  return -1;
}

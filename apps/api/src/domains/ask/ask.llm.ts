// ============================================================================
// Assistant: Language Model Client
// OpenAI-compatible chat-completions client. Whether the model is available
// is decided once, from configuration, when the client is built.
// ============================================================================

import { z } from 'zod';
import type { LlmSettings } from '../../lib/env.js';

// ---------------------------------------------------------------------------
// LLM Client Configuration
// ---------------------------------------------------------------------------

export interface LlmClientConfig {
  baseUrl: string;
  model: string;
  apiKey: string;
  timeoutMs: number;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface ChatCompletionResult {
  /** Null when the API returned a choice without text. */
  content: string | null;
  finishReason: string;
}

export interface LlmClient {
  chatCompletion(messages: ChatMessage[], options?: ChatCompletionOptions): Promise<ChatCompletionResult>;
  config: Readonly<Omit<LlmClientConfig, 'apiKey'>>;
}

// ---------------------------------------------------------------------------
// Capability
// ---------------------------------------------------------------------------

/**
 * The assistant either has a model or it does not. Callers branch on
 * `enabled` once instead of null-checking a client at every call site.
 */
export type LanguageModel =
  | { enabled: true; client: LlmClient }
  | { enabled: false; reason: string };

export const DISABLED_MODEL: LanguageModel = {
  enabled: false,
  reason: 'OPENAI_API_KEY not configured',
};

const chatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).nullish(),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
});

export class LlmApiError extends Error {
  constructor(public status: number) {
    super(`LLM API error: ${status}`);
  }
}

// ---------------------------------------------------------------------------
// LLM Client Factory
// ---------------------------------------------------------------------------

/**
 * Create a client for the `/v1/chat/completions` protocol (OpenAI, or any
 * compatible server reachable at `baseUrl`). Calls are aborted after
 * `timeoutMs`.
 */
export function createLlmClient(config: LlmClientConfig): LlmClient {
  const { baseUrl, model, apiKey, timeoutMs } = config;

  return {
    config: Object.freeze({ baseUrl, model, timeoutMs }),

    async chatCompletion(
      messages: ChatMessage[],
      options?: ChatCompletionOptions,
    ): Promise<ChatCompletionResult> {
      const url = `${baseUrl}/v1/chat/completions`;

      const body = JSON.stringify({
        model,
        messages,
        temperature: options?.temperature ?? 0.1,
        max_tokens: options?.maxTokens ?? 500,
      });

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const response = await fetch(url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${apiKey}`,
          },
          body,
          signal: controller.signal,
        });

        if (!response.ok) {
          throw new LlmApiError(response.status);
        }

        const parsed = chatCompletionResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new Error('LLM API returned an unexpected payload');
        }

        const choice = parsed.data.choices[0];
        return {
          content: choice?.message?.content ?? null,
          finishReason: choice?.finish_reason ?? 'unknown',
        };
      } finally {
        clearTimeout(timer);
      }
    },
  };
}

/** Select the model capability from configuration. */
export function createLanguageModel(settings: LlmSettings): LanguageModel {
  if (!settings.apiKey) {
    return DISABLED_MODEL;
  }
  return {
    enabled: true,
    client: createLlmClient({
      baseUrl: settings.baseUrl,
      model: settings.model,
      apiKey: settings.apiKey,
      timeoutMs: settings.timeoutMs,
    }),
  };
}

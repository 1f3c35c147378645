/*
Purpose: provider-neutral completion contract shared by the OpenAI, Anthropic and mock clients.
Assumptions: clients retry transient failures themselves and surface LlmError otherwise.
Usage: const { text } = await client.complete(prompt, { system, temperature, timeoutMs });
*/

// =============================================================================
// TYPES
// =============================================================================

export type LlmCompletionOptions = {
  system?: string;
  temperature?: number;
  timeoutMs?: number;
  maxTokens?: number;
};

export type LlmCompletionResult = {
  text: string;
  finishReason: string | null;
};

export interface LlmClient {
  complete(prompt: string, options?: LlmCompletionOptions): Promise<LlmCompletionResult>;
}

export class LlmError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "LlmError";
  }
}

// =============================================================================
// RETRIES
// =============================================================================

export const RETRIABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

export type RetryPolicy = {
  maxRetries: number;
  isRetryable: (error: unknown) => boolean;
  wrapError: (error: unknown) => LlmError;
  sleep?: (durationMs: number) => Promise<void>;
};

export async function runWithRetries<T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxRetries);
  const sleep = policy.sleep ?? delay;
  let attempt = 1;
  let lastError: unknown;

  while (attempt <= maxAttempts) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (!policy.isRetryable(err) || attempt === maxAttempts) {
        throw policy.wrapError(err);
      }
      await sleep(retryDelayMs(attempt));
    }
    attempt += 1;
  }

  throw policy.wrapError(lastError ?? new Error("Unknown LLM failure"));
}

export function retryDelayMs(attempt: number): number {
  const capped = Math.min(attempt, 5);
  return 250 * 2 ** (capped - 1);
}

export function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.message.toLowerCase().includes("timeout") || error.message.includes("ETIMEDOUT");
}

function delay(durationMs: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, durationMs));
}

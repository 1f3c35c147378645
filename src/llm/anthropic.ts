import Anthropic, { APIError, AnthropicError } from "@anthropic-ai/sdk";
import type {
  Message,
  MessageCreateParamsNonStreaming,
} from "@anthropic-ai/sdk/resources/messages/messages";

import {
  isTimeoutError,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
  LlmError,
  RETRIABLE_STATUS_CODES,
  runWithRetries,
} from "./client.js";

export type AnthropicRequestOptions = {
  timeout?: number;
  maxRetries?: number;
};

export type AnthropicTransport = {
  create: (
    body: MessageCreateParamsNonStreaming,
    options?: AnthropicRequestOptions,
  ) => Promise<Message>;
};

export type AnthropicClientOptions = {
  model: string;
  apiKey?: string;
  apiKeyEnv?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  maxRetries?: number;
  transport?: AnthropicTransport;
  sleep?: (durationMs: number) => Promise<void>;
};

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_MAX_TOKENS = 8_000;
// Anthropic's "overloaded" status.
const ANTHROPIC_RETRIABLE_STATUS_CODES = new Set([...RETRIABLE_STATUS_CODES, 529]);

export class AnthropicClient implements LlmClient {
  private readonly model: string;
  private readonly defaultTemperature?: number;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly maxRetries: number;
  private readonly transport: AnthropicTransport;
  private readonly sleep?: (durationMs: number) => Promise<void>;

  constructor(options: AnthropicClientOptions) {
    this.model = options.model;
    this.defaultTemperature = options.defaultTemperature;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultMaxTokens = options.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.sleep = options.sleep;

    if (!options.transport) {
      const keyEnv = options.apiKeyEnv ?? "ANTHROPIC_API_KEY";
      const apiKey = options.apiKey ?? process.env[keyEnv];
      if (!apiKey) {
        throw new LlmError(
          `Anthropic API key is required. Set ${keyEnv} or pass apiKey to AnthropicClient.`,
        );
      }
      this.transport = createTransport({ apiKey, baseURL: options.baseURL });
    } else {
      this.transport = options.transport;
    }
  }

  async complete(
    prompt: string,
    options: LlmCompletionOptions = {},
  ): Promise<LlmCompletionResult> {
    const body: MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: options.maxTokens ?? this.defaultMaxTokens,
      temperature: options.temperature ?? this.defaultTemperature ?? 0,
      messages: [{ role: "user", content: prompt }],
      ...(options.system ? { system: options.system } : {}),
    };
    const requestOptions: AnthropicRequestOptions = {
      timeout: options.timeoutMs ?? this.defaultTimeoutMs,
    };

    const message = await runWithRetries(() => this.transport.create(body, requestOptions), {
      maxRetries: this.maxRetries,
      isRetryable: (err) => this.isRetryable(err),
      wrapError: (err) => this.wrapError(err),
      sleep: this.sleep,
    });

    const text = message.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");
    if (!text) {
      throw new LlmError("Anthropic response did not include text content.", message);
    }

    return { text, finishReason: message.stop_reason ?? null };
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof APIError) {
      if (error.status === undefined) return false;
      return ANTHROPIC_RETRIABLE_STATUS_CODES.has(error.status);
    }
    if (error instanceof AnthropicError) {
      return false;
    }
    return isTimeoutError(error);
  }

  private wrapError(error: unknown): LlmError {
    if (error instanceof APIError) {
      const status = error.status ?? "unknown";
      const detail = apiErrorDetail(error.error) ?? error.message;
      const hint =
        status === 401 || status === 403
          ? "Check ANTHROPIC_API_KEY and permissions."
          : status === 429
            ? "Rate limited by Anthropic."
            : null;
      const suffix = hint ? ` ${hint}` : "";
      return new LlmError(
        `Anthropic request failed (status ${status}): ${detail}${suffix}`,
        error,
      );
    }

    if (error instanceof AnthropicError) {
      return new LlmError(`Anthropic request failed: ${error.message}`, error);
    }

    if (error instanceof Error) {
      return new LlmError(error.message, error);
    }

    return new LlmError("Anthropic request failed due to an unknown error.", error);
  }
}

function apiErrorDetail(body: unknown): string | undefined {
  if (body && typeof body === "object" && "message" in body && typeof body.message === "string") {
    return body.message;
  }
  return undefined;
}

function createTransport(args: { apiKey: string; baseURL?: string }): AnthropicTransport {
  const client = new Anthropic({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    maxRetries: 0, // Manual retries handled in AnthropicClient.
  });

  return {
    create: async (body, options) => client.messages.create(body, options),
  };
}

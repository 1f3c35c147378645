import OpenAI from "openai";
import { APIError, OpenAIError } from "openai/error";
import type {
  Response,
  ResponseCreateParamsNonStreaming,
} from "openai/resources/responses/responses";

import {
  isTimeoutError,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
  LlmError,
  RETRIABLE_STATUS_CODES,
  runWithRetries,
} from "./client.js";

export type OpenAiTransport = {
  create: (
    body: ResponseCreateParamsNonStreaming,
    options?: OpenAI.RequestOptions,
  ) => Promise<Response>;
};

export type OpenAiClientOptions = {
  model: string;
  apiKey?: string;
  apiKeyEnv?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  maxRetries?: number;
  fetch?: typeof fetch;
  transport?: OpenAiTransport;
  sleep?: (durationMs: number) => Promise<void>;
};

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_MAX_RETRIES = 3;

export class OpenAiClient implements LlmClient {
  private readonly model: string;
  private readonly defaultTemperature?: number;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens?: number;
  private readonly maxRetries: number;
  private readonly transport: OpenAiTransport;
  private readonly sleep?: (durationMs: number) => Promise<void>;

  constructor(options: OpenAiClientOptions) {
    this.model = options.model;
    this.defaultTemperature = options.defaultTemperature;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultMaxTokens = options.defaultMaxTokens;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.sleep = options.sleep;

    if (!options.transport) {
      const keyEnv = options.apiKeyEnv ?? "OPENAI_API_KEY";
      const apiKey = options.apiKey ?? process.env[keyEnv];
      if (!apiKey) {
        throw new LlmError(
          `OpenAI API key is required. Set ${keyEnv} or pass apiKey to OpenAiClient.`,
        );
      }
      this.transport = createTransport({
        apiKey,
        baseURL: options.baseURL,
        fetch: options.fetch,
      });
    } else {
      this.transport = options.transport;
    }
  }

  async complete(
    prompt: string,
    options: LlmCompletionOptions = {},
  ): Promise<LlmCompletionResult> {
    const body = this.buildRequestBody(prompt, options);
    const requestOptions = this.buildRequestOptions(options.timeoutMs);

    const response = await runWithRetries(() => this.transport.create(body, requestOptions), {
      maxRetries: this.maxRetries,
      isRetryable: (err) => this.isRetryable(err),
      wrapError: (err) => this.wrapError(err),
      sleep: this.sleep,
    });

    const text = response.output_text ?? "";
    if (!text) {
      throw new LlmError("OpenAI response did not include assistant content.", response);
    }

    return {
      text,
      finishReason: response.status ?? null,
    };
  }

  private buildRequestBody(
    prompt: string,
    options: LlmCompletionOptions,
  ): ResponseCreateParamsNonStreaming {
    const temperature = options.temperature ?? this.defaultTemperature ?? 0;
    const maxTokens = options.maxTokens ?? this.defaultMaxTokens;

    return {
      model: this.model,
      input: prompt,
      instructions: options.system,
      temperature,
      max_output_tokens: maxTokens,
    };
  }

  private buildRequestOptions(timeoutMs?: number): OpenAI.RequestOptions | undefined {
    const timeout = timeoutMs ?? this.defaultTimeoutMs;
    if (!timeout) return undefined;
    return { timeout };
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof APIError) {
      if (error.status === undefined) return false;
      return RETRIABLE_STATUS_CODES.has(error.status);
    }
    if (error instanceof OpenAIError) {
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
          ? "Check OPENAI_API_KEY and permissions."
          : status === 429
            ? "Rate limited by OpenAI."
            : null;
      const suffix = hint ? ` ${hint}` : "";
      return new LlmError(`OpenAI request failed (status ${status}): ${detail}${suffix}`, error);
    }

    if (error instanceof OpenAIError) {
      return new LlmError(`OpenAI request failed: ${error.message}`, error);
    }

    if (error instanceof Error) {
      return new LlmError(error.message, error);
    }

    return new LlmError("OpenAI request failed due to an unknown error.", error);
  }
}

function apiErrorDetail(body: unknown): string | undefined {
  if (body && typeof body === "object" && "message" in body && typeof body.message === "string") {
    return body.message;
  }
  return undefined;
}

function createTransport(args: {
  apiKey: string;
  baseURL?: string;
  fetch?: typeof fetch;
}): OpenAiTransport {
  const client = new OpenAI({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    fetch: args.fetch,
    maxRetries: 0, // Manual retries handled in OpenAiClient.
  });

  return {
    create: async (body, options) => client.responses.create({ ...body, stream: false }, options),
  };
}

import path from "node:path";

import { defaultApiKeyEnv, type ProjectConfig } from "../core/config.js";

import { AnthropicClient } from "./anthropic.js";
import type { LlmClient } from "./client.js";
import { MockLlmClient } from "./mock.js";
import { LlmModuleGenerator } from "./module-generator.js";
import { OpenAiClient } from "./openai.js";

export function createLlmClient(
  config: ProjectConfig,
  env: NodeJS.ProcessEnv = process.env,
): LlmClient {
  const llm = config.llm;
  if (env.JAUNT_MOCK_LLM === "1" || llm.provider === "mock") {
    return new MockLlmClient();
  }

  const apiKeyEnv = llm.api_key_env ?? defaultApiKeyEnv(llm.provider);
  const apiKey = apiKeyEnv ? env[apiKeyEnv] : undefined;
  const common = {
    model: llm.model,
    apiKey,
    apiKeyEnv,
    baseURL: llm.base_url,
    defaultTemperature: llm.temperature,
    defaultTimeoutMs: llm.timeout_seconds * 1000,
    defaultMaxTokens: llm.max_tokens,
    maxRetries: llm.max_retries,
  };

  if (llm.provider === "anthropic") {
    return new AnthropicClient(common);
  }
  return new OpenAiClient(common);
}

export function createModuleGenerator(
  config: ProjectConfig,
  client: LlmClient = createLlmClient(config),
): LlmModuleGenerator {
  const resolve = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(config.projectRoot, value);

  return new LlmModuleGenerator(client, {
    templates: {
      build: resolve(config.prompts.build_module),
      test: resolve(config.prompts.test_module),
    },
    temperature: config.llm.temperature,
    timeoutMs: config.llm.timeout_seconds * 1000,
    maxTokens: config.llm.max_tokens,
  });
}

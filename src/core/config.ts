import { z, type ZodIssue } from "zod";

// =============================================================================
// SCHEMAS
// =============================================================================

export const PathsConfigSchema = z
  .object({
    source_roots: z.array(z.string().min(1)).min(1).default(["src"]),
    test_roots: z.array(z.string().min(1)).default(["tests"]),
    generated_dir: z
      .string()
      .min(1)
      .regex(/^[A-Za-z0-9_.-]+$/, "generated_dir must be a single directory name")
      .default("__generated__"),
  })
  .strict();

export const LlmProviderSchema = z.enum(["openai", "anthropic", "mock"]);

export const LlmConfigSchema = z
  .object({
    provider: LlmProviderSchema.default("openai"),
    model: z.string().min(1).default("gpt-4.1"),
    api_key_env: z.string().min(1).optional(),
    base_url: z.string().url().optional(),
    temperature: z.number().min(0).max(2).optional(),
    timeout_seconds: z.number().positive().default(120),
    max_retries: z.number().int().min(1).default(3),
    max_tokens: z.number().int().positive().default(8_000),
  })
  .strict();

export const BuildConfigSchema = z
  .object({
    jobs: z.number().int().min(1).default(8),
    infer_deps: z.boolean().default(true),
    header_comment: z.enum(["#", "//"]).default("//"),
    include: z.array(z.string().min(1)).default(["**/*.ts"]),
    exclude: z.array(z.string().min(1)).default([]),
    max_attempts: z.number().int().min(1).default(2),
  })
  .strict();

export const TestConfigSchema = z
  .object({
    jobs: z.number().int().min(1).default(4),
    infer_deps: z.boolean().default(true),
    runner_args: z.array(z.string()).default(["run"]),
  })
  .strict();

export const PromptsConfigSchema = z
  .object({
    build_module: z.string().min(1).optional(),
    test_module: z.string().min(1).optional(),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    version: z.literal(1).default(1),
    paths: PathsConfigSchema.default({}),
    llm: LlmConfigSchema.default({}),
    build: BuildConfigSchema.default({}),
    test: TestConfigSchema.default({}),
    prompts: PromptsConfigSchema.default({}),
  })
  .strict();

export type LlmProvider = z.infer<typeof LlmProviderSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type TestConfig = z.infer<typeof TestConfigSchema>;
export type PromptsConfig = z.infer<typeof PromptsConfigSchema>;

/** Parsed config plus the directory that contains `.jaunt/`. */
export type ProjectConfig = z.infer<typeof ProjectConfigSchema> & {
  projectRoot: string;
};

// =============================================================================
// HELPERS
// =============================================================================

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "invalid_enum_value") {
      const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
      return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}

export function defaultApiKeyEnv(provider: LlmProvider): string | undefined {
  if (provider === "openai") return "OPENAI_API_KEY";
  if (provider === "anthropic") return "ANTHROPIC_API_KEY";
  return undefined;
}

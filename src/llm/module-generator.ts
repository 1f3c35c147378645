/*
Purpose: turn a module context into generated source through an LLM client and a prompt template.
Assumptions: the client returns either bare code or code inside one fenced block.
Usage: const generator = new LlmModuleGenerator(client, { templates }); await generator.generate(context, { extraErrorContext: [] });
*/

import type { GenerateOptions, ModuleContext, ModuleGenerator } from "../app/orchestrator/ports.js";
import { renderPromptTemplate, type PromptTemplateName } from "../core/prompts.js";

import type { LlmClient } from "./client.js";

// =============================================================================
// TYPES
// =============================================================================

export type LlmModuleGeneratorOptions = {
  templates?: { build?: string; test?: string };
  system?: string;
  temperature?: number;
  timeoutMs?: number;
  maxTokens?: number;
};

const DEFAULT_SYSTEM_PROMPT =
  "You write production TypeScript modules. Reply with code only, no commentary.";
const NONE = "(none)";

// =============================================================================
// GENERATOR
// =============================================================================

export class LlmModuleGenerator implements ModuleGenerator {
  constructor(
    private readonly client: LlmClient,
    private readonly options: LlmModuleGeneratorOptions = {},
  ) {}

  async generate(context: ModuleContext, options: GenerateOptions): Promise<string> {
    const prompt = await this.renderPrompt(context, options);
    const result = await this.client.complete(prompt, {
      system: this.options.system ?? DEFAULT_SYSTEM_PROMPT,
      temperature: this.options.temperature,
      timeoutMs: this.options.timeoutMs,
      maxTokens: this.options.maxTokens,
    });
    return stripCodeFence(result.text);
  }

  renderPrompt(context: ModuleContext, options: GenerateOptions): Promise<string> {
    const name: PromptTemplateName = context.kind === "build" ? "build-module" : "test-module";
    const templatePath =
      context.kind === "build" ? this.options.templates?.build : this.options.templates?.test;

    return renderPromptTemplate(
      name,
      {
        moduleName: context.moduleName,
        kind: context.kind,
        expectedNames: context.expectedNames.join(", "),
        unitSpecs: formatBlocks(context.units.map((unit) => [unit.ref, unit.text] as const)),
        unitHints: formatHints(context.units),
        dependencyApis: formatBlocks(context.dependencyApis),
        dependencyArtifacts: formatBlocks(context.dependencyArtifacts),
        errorContext:
          options.extraErrorContext.length > 0 ? options.extraErrorContext.join("\n") : NONE,
        generatedPath: context.generatedPath,
      },
      { templatePath },
    );
  }
}

// =============================================================================
// HELPERS
// =============================================================================

const FENCE = /```[A-Za-z0-9_-]*[ \t]*\n([\s\S]*?)\n?```/;

/** Contents of the first fenced block, or the trimmed text when there is none. */
export function stripCodeFence(text: string): string {
  const match = FENCE.exec(text);
  const body = match ? (match[1] ?? "") : text;
  return `${body.trim()}\n`;
}

function formatHints(units: ModuleContext["units"]): string {
  const lines = units.flatMap((unit) => (unit.prompt ? [`- ${unit.ref}: ${unit.prompt}`] : []));
  return lines.length > 0 ? lines.join("\n") : NONE;
}

function formatBlocks(entries: Iterable<readonly [string, string]>): string {
  const blocks: string[] = [];
  for (const [title, body] of entries) {
    blocks.push(`### ${title}\n\n\`\`\`ts\n${body.trimEnd()}\n\`\`\``);
  }
  return blocks.length > 0 ? blocks.join("\n\n") : NONE;
}

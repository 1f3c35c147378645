import type { LlmClient, LlmCompletionOptions, LlmCompletionResult } from "./client.js";

const REQUIRED_NAMES_LINE = /^Required top-level names:[ \t]*(.*)$/m;
const TEST_PROMPT_MARKER = "Vitest test module";

export type MockLlmCall = {
  prompt: string;
  options: LlmCompletionOptions;
};

/**
 * Offline client: replays queued responses, otherwise answers with a stub for
 * every name on the prompt's "Required top-level names:" line. Test prompts
 * get one passing `it` per name.
 */
export class MockLlmClient implements LlmClient {
  readonly calls: MockLlmCall[] = [];
  private readonly queued: string[];

  constructor(responses: string[] = []) {
    this.queued = [...responses];
  }

  queueResponse(text: string): void {
    this.queued.push(text);
  }

  async complete(
    prompt: string,
    options: LlmCompletionOptions = {},
  ): Promise<LlmCompletionResult> {
    this.calls.push({ prompt, options });
    const next = this.queued.shift();
    if (next !== undefined) return { text: next, finishReason: "stop" };
    const names = requiredNames(prompt);
    const text = prompt.includes(TEST_PROMPT_MARKER) ? stubTests(names) : stubModule(names);
    return { text, finishReason: "stop" };
  }
}

export function requiredNames(prompt: string): string[] {
  const match = REQUIRED_NAMES_LINE.exec(prompt);
  if (!match) return [];
  return (match[1] ?? "")
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function stubModule(names: string[]): string {
  if (names.length === 0) return "export {};\n";
  return names.map((name) => `export function ${name}(): void {}`).join("\n") + "\n";
}

function stubTests(names: string[]): string {
  const cases = names.map((name) => `it(${JSON.stringify(name)}, () => {});`);
  return ['import { it } from "vitest";', "", ...cases].join("\n") + "\n";
}

import { OpenAIProvider, Runner, type Agent } from "@openai/agents";
import type { LlmConfig } from "../config.js";
import { ParseError } from "../errors.js";

/** Runs a single-turn text agent and returns its reply. */
export interface CompletionRunner {
  complete(agent: Agent, input: string, signal?: AbortSignal): Promise<string>;
}

const CHAT_COMPLETIONS_SUFFIX = /\/chat\/completions\/?$/;

/**
 * The endpoint is configured as the full chat-completions URL; the SDK wants the base URL
 * and appends the path itself.
 */
export function llmBaseUrl(endpoint: string): string {
  return endpoint.trim().replace(CHAT_COMPLETIONS_SUFFIX, "").replace(/\/+$/, "");
}

export class AgentsCompletionRunner implements CompletionRunner {
  private readonly runner: Runner;

  constructor(config: LlmConfig) {
    const modelProvider = new OpenAIProvider({
      apiKey: config.apiKey,
      baseURL: llmBaseUrl(config.endpoint),
      useResponses: false
    });
    this.runner = new Runner({ modelProvider, tracingDisabled: true });
  }

  async complete(agent: Agent, input: string, signal?: AbortSignal): Promise<string> {
    const result = await this.runner.run(agent, input, { maxTurns: 1, signal });
    const output = result.finalOutput;
    if (typeof output !== "string" || output.trim().length === 0) {
      throw new ParseError(`${agent.name} returned no message content`);
    }
    return output;
  }
}

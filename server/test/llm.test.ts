import { beforeEach, describe, expect, it, vi } from "vitest";

const state = vi.hoisted(() => {
  const providerOptions: unknown[] = [];
  const runnerOptions: unknown[] = [];
  const runMock = vi.fn<(agent: { name: string }, input: string, options: unknown) => Promise<{ finalOutput?: unknown }>>();
  return { providerOptions, runnerOptions, runMock };
});

vi.mock("@openai/agents", () => {
  class Agent {
    readonly name: string;
    constructor(options: { name: string }) {
      this.name = options.name;
    }
  }

  class OpenAIProvider {
    constructor(options: unknown) {
      state.providerOptions.push(options);
    }
  }

  class Runner {
    constructor(options: unknown) {
      state.runnerOptions.push(options);
    }

    run(agent: { name: string }, input: string, options: unknown) {
      return state.runMock(agent, input, options);
    }
  }

  return { Agent, OpenAIProvider, Runner };
});

import { AgentsCompletionRunner, llmBaseUrl } from "../src/pipeline/llm.js";
import { makeSummarizerAgent, SUMMARIZER_AGENT_NAME } from "../src/pipeline/agents.js";
import { ParseError } from "../src/errors.js";

const CONFIG = { apiKey: "test-llm-key", endpoint: "https://llm.example.test/api/v3/chat/completions", modelId: "test-model" };

beforeEach(() => {
  state.providerOptions.length = 0;
  state.runnerOptions.length = 0;
  state.runMock.mockReset();
});

describe("pipeline/llm", () => {
  it("llmBaseUrl strips the chat completions path", () => {
    expect(llmBaseUrl("https://llm.example.test/api/v3/chat/completions")).toBe("https://llm.example.test/api/v3");
    expect(llmBaseUrl(" https://llm.example.test/api/v3/chat/completions/ ")).toBe("https://llm.example.test/api/v3");
    expect(llmBaseUrl("https://llm.example.test/v1/")).toBe("https://llm.example.test/v1");
  });

  it("configures a chat-completions provider without tracing", () => {
    new AgentsCompletionRunner(CONFIG);
    expect(state.providerOptions).toEqual([
      { apiKey: "test-llm-key", baseURL: "https://llm.example.test/api/v3", useResponses: false }
    ]);
    expect(state.runnerOptions).toHaveLength(1);
    expect(state.runnerOptions[0]).toMatchObject({ tracingDisabled: true });
  });

  it("runs a single turn and returns the final output", async () => {
    state.runMock.mockResolvedValue({ finalOutput: "**Title:** \"A\"\n- b" });
    const controller = new AbortController();
    const runner = new AgentsCompletionRunner(CONFIG);
    const agent = makeSummarizerAgent("test-model");

    await expect(runner.complete(agent, "article", controller.signal)).resolves.toBe('**Title:** "A"\n- b');
    expect(state.runMock).toHaveBeenCalledWith(agent, "article", { maxTurns: 1, signal: controller.signal });
  });

  it("rejects empty replies", async () => {
    state.runMock.mockResolvedValue({ finalOutput: "  " });
    const runner = new AgentsCompletionRunner(CONFIG);
    const err = await runner.complete(makeSummarizerAgent("test-model"), "article").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ParseError);
    expect(err).toMatchObject({ message: `${SUMMARIZER_AGENT_NAME} returned no message content` });
  });
});

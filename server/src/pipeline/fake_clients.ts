import type { Agent } from "@openai/agents";
import { BULLET_PROMPT_AGENT_NAME, SUMMARIZER_AGENT_NAME, TITLE_PROMPT_AGENT_NAME } from "./agents.js";
import { sanitizePrompt, truncatePrompt, type ImageStyle } from "./image_synthesizer.js";
import type { CompletionRunner } from "./llm.js";
import { wait } from "./utils.js";

export type FakeClientOptions = {
  delayMs?: number;
};

const NEVER_ABORTED = new AbortController().signal;

function sentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function firstWords(text: string, count: number): string {
  return text.split(/\s+/).slice(0, count).join(" ").replace(/[.!?,;:]+$/, "");
}

/** Summaries built from the article's own sentences, in the markdown shape the live model tends to use. */
export function fakeSummary(article: string): string {
  const parts = sentences(article);
  const title = parts.length > 0 ? firstWords(parts[0], 8) : "Untitled story";
  const bullets = (parts.length > 1 ? parts.slice(1) : parts).slice(0, 3);
  return [`**Title:** "${title}"`, "", ...bullets.map((b) => `- ${b}`)].join("\n");
}

export function fakeVisualPrompt(input: string, kind: "title" | "bullet"): string {
  const subject = input.replace(/^.*?:\s*/, "").replace(/["']/g, "");
  const framing = kind === "title" ? "A bold editorial cover illustration of" : "A cinematic news photograph of";
  return `Visual prompt: ${framing} ${firstWords(subject, 12)}`;
}

/** Deterministic stand-in for the LLM, keyed on which agent is asking. */
export class FakeCompletionRunner implements CompletionRunner {
  readonly calls: Array<{ agent: string; input: string }> = [];

  constructor(private readonly options: FakeClientOptions = {}) {}

  async complete(agent: Agent, input: string, signal?: AbortSignal): Promise<string> {
    this.calls.push({ agent: agent.name, input });
    await wait(this.options.delayMs ?? 0, signal ?? NEVER_ABORTED);
    switch (agent.name) {
      case SUMMARIZER_AGENT_NAME:
        return fakeSummary(input);
      case TITLE_PROMPT_AGENT_NAME:
        return fakeVisualPrompt(input, "title");
      case BULLET_PROMPT_AGENT_NAME:
        return fakeVisualPrompt(input, "bullet");
      default:
        throw new Error(`no fake reply for agent "${agent.name}"`);
    }
  }
}

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** Returns an SVG data URL with the prompt written on it instead of calling the image service. */
export class FakeImageSynthesizer {
  readonly prompts: string[] = [];

  constructor(private readonly options: FakeClientOptions = {}) {}

  async synthesize(prompt: string, style: ImageStyle, signal?: AbortSignal): Promise<string> {
    const cleaned = truncatePrompt(sanitizePrompt(prompt));
    this.prompts.push(cleaned);
    await wait(this.options.delayMs ?? 0, signal ?? NEVER_ABORTED);
    const fill = style === "title" ? "#1d3557" : "#457b9d";
    const svg =
      `<svg xmlns="http://www.w3.org/2000/svg" width="720" height="1280">` +
      `<rect width="100%" height="100%" fill="${fill}"/>` +
      `<text x="40" y="640" fill="#f1faee" font-size="28">${escapeXml(cleaned)}</text>` +
      `</svg>`;
    return `data:image/svg+xml;base64,${Buffer.from(svg, "utf8").toString("base64")}`;
  }
}

import type { Agent } from "@openai/agents";
import { classifyUpstreamFailure, SummarizationError } from "../errors.js";
import { makeSummarizerAgent } from "./agents.js";
import type { CompletionRunner } from "./llm.js";

export type SummaryResult = {
  title: string;
  bullets: string[];
};

export type SummaryLine =
  | { type: "title"; text: string }
  | { type: "bullet"; text: string }
  | { type: "other" };

type ParserState = "seeking_title" | "collecting_bullets";

const TITLE_MARKER = /\b(?:Title|TITLE)\s*:/;
const SURROUNDING_DOUBLE_QUOTES = /^["“”]+|["“”]+$/g;

function stripEmphasis(text: string): string {
  return text.replace(/\*/g, "");
}

export function classifySummaryLine(raw: string): SummaryLine {
  const line = raw.trim();
  const plain = stripEmphasis(line);
  const marker = TITLE_MARKER.exec(plain);
  if (marker) {
    const text = plain
      .slice(marker.index + marker[0].length)
      .trim()
      .replace(SURROUNDING_DOUBLE_QUOTES, "")
      .trim();
    return { type: "title", text };
  }
  if (line.startsWith("-")) {
    const text = stripEmphasis(line.replace(/^-+/, "").trim()).trim();
    return text.length > 0 ? { type: "bullet", text } : { type: "other" };
  }
  return { type: "other" };
}

/**
 * Line classifier over the model's free text. Accepts both the titled shape
 * ("Title: …" followed by "- …" lines) and the bullets-only shape.
 */
export function parseSummary(text: string): SummaryResult {
  let state: ParserState = "seeking_title";
  let title = "";
  const bullets: string[] = [];

  for (const raw of text.replace(/\r\n/g, "\n").split("\n")) {
    const line = classifySummaryLine(raw);
    if (line.type === "other") continue;

    switch (state) {
      case "seeking_title":
        if (line.type === "title") title = line.text;
        else bullets.push(line.text);
        state = "collecting_bullets";
        break;
      case "collecting_bullets":
        if (line.type === "bullet") bullets.push(line.text);
        else title = line.text;
        break;
    }
  }

  return { title, bullets };
}

export class Summarizer {
  private readonly agent: Agent;

  constructor(
    private readonly runner: CompletionRunner,
    model: string
  ) {
    this.agent = makeSummarizerAgent(model);
  }

  async summarize(articleText: string, signal?: AbortSignal): Promise<SummaryResult> {
    if (articleText.trim().length === 0) {
      throw new SummarizationError("failed to summarize article", new Error("article text is empty"));
    }

    let content: string;
    try {
      content = await this.runner.complete(this.agent, articleText, signal);
    } catch (err) {
      throw new SummarizationError("failed to summarize article", classifyUpstreamFailure(err));
    }
    return parseSummary(content);
  }
}

import type { Agent } from "@openai/agents";
import { classifyUpstreamFailure, PromptEnhancementError } from "../errors.js";
import { makeBulletPromptAgent, makeTitlePromptAgent } from "./agents.js";
import type { CompletionRunner } from "./llm.js";

export type PromptKind = "title" | "bullet";

/** Limit the model is asked to respect. Not enforced here. */
export const ADVISORY_PROMPT_MAX_CHARS = 150;

export function enhancementUserMessage(text: string, kind: PromptKind): string {
  return kind === "title"
    ? `I need prompt for generating cover image for news article title : ${text}`
    : `I need prompt for generating cover image for news article : ${text}`;
}

/** Lists where a prompt breaks the advisory rules; an empty list means it complies. */
export function inspectPromptConstraints(prompt: string): string[] {
  const issues: string[] = [];
  const length = Array.from(prompt).length;
  if (length > ADVISORY_PROMPT_MAX_CHARS) {
    issues.push(`exceeds ${ADVISORY_PROMPT_MAX_CHARS} characters (${length})`);
  }
  if (/["']/.test(prompt)) issues.push("contains quotation marks");
  return issues;
}

export class PromptEnhancer {
  private readonly agents: Record<PromptKind, Agent>;

  constructor(
    private readonly runner: CompletionRunner,
    model: string
  ) {
    this.agents = {
      title: makeTitlePromptAgent(model),
      bullet: makeBulletPromptAgent(model)
    };
  }

  async enhancePrompt(text: string, kind: PromptKind, signal?: AbortSignal): Promise<string> {
    let content: string;
    try {
      content = await this.runner.complete(this.agents[kind], enhancementUserMessage(text, kind), signal);
    } catch (err) {
      throw new PromptEnhancementError(`failed to enhance ${kind} prompt`, classifyUpstreamFailure(err));
    }
    return content.trim();
  }
}

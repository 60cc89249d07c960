import { Agent } from "@openai/agents";

export const SUMMARIZER_AGENT_NAME = "Article Summarizer";
export const TITLE_PROMPT_AGENT_NAME = "Title Visual Prompt Writer";
export const BULLET_PROMPT_AGENT_NAME = "Bullet Visual Prompt Writer";

export const SUMMARIZER_INSTRUCTIONS =
  "You are an expert in summarizing news article and generating article title. " +
  "Return title and summary of article in maximum 3 bullet points.";

const VISUAL_PROMPT_RULES =
  "Focus on key visual elements only. " +
  "Keep it under 150 characters and as one complete sentence. " +
  "Make sure that there is no single or double quotes used in the response text.";

export const TITLE_PROMPT_INSTRUCTIONS = `Convert this title into a visual description. ${VISUAL_PROMPT_RULES}`;
export const BULLET_PROMPT_INSTRUCTIONS = `Convert this news bullet point into a visual description. ${VISUAL_PROMPT_RULES}`;

export function makeSummarizerAgent(model: string): Agent {
  return new Agent({
    name: SUMMARIZER_AGENT_NAME,
    handoffDescription: "Summarizes a news article into a title and up to three bullet points.",
    model,
    instructions: SUMMARIZER_INSTRUCTIONS
  });
}

export function makeTitlePromptAgent(model: string): Agent {
  return new Agent({
    name: TITLE_PROMPT_AGENT_NAME,
    handoffDescription: "Turns an article title into a one-sentence visual description.",
    model,
    instructions: TITLE_PROMPT_INSTRUCTIONS
  });
}

export function makeBulletPromptAgent(model: string): Agent {
  return new Agent({
    name: BULLET_PROMPT_AGENT_NAME,
    handoffDescription: "Turns a news bullet point into a one-sentence visual description.",
    model,
    instructions: BULLET_PROMPT_INSTRUCTIONS
  });
}

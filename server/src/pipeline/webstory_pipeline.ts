import type { PipelineFn, PipelineOptions } from "../executor.js";
import { InvalidStoryInputError, StorageWriteError } from "../errors.js";
import type { RunManager, StepName } from "../run_manager.js";
import type { ImageEmbedder } from "./image_embedder.js";
import type { ImageSynthesizer } from "./image_synthesizer.js";
import { inspectPromptConstraints, type PromptEnhancer } from "./prompt_enhancer.js";
import type { RunSettings, Slide, Story, StoryRequest } from "./schemas.js";
import { assembleStory } from "./story_assembler.js";
import { buildStoryObjectKey, type StoryStore } from "./story_store.js";
import type { SummaryResult, Summarizer } from "./summarizer.js";
import { mapOrdered } from "./worker_pool.js";

export type WebstoryDeps = {
  summarizer: Pick<Summarizer, "summarize">;
  enhancer: Pick<PromptEnhancer, "enhancePrompt">;
  synthesizer: Pick<ImageSynthesizer, "synthesize">;
  /** When set, slide images are inlined into the document instead of linked. */
  embedder?: Pick<ImageEmbedder, "embed">;
  store: StoryStore;
  storage: { keyPrefix: string };
  defaults: Required<RunSettings>;
  clock?: () => Date;
};

/** Everything one invocation needs; nothing here is shared between runs. */
export type PipelineContext = {
  runId: string;
  runs: RunManager;
  signal: AbortSignal;
  settings: Required<RunSettings>;
  clock: () => Date;
};

export type StoryText = {
  title: string;
  bullets: string[];
};

function ensureNotAborted(signal: AbortSignal): void {
  if (signal.aborted) throw new Error("Cancelled");
}

/**
 * Caller-supplied title and bullets win over the summary's. Blank bullets are dropped; an
 * empty title or no bullets at all is rejected here, before anything is synthesized.
 */
export function resolveStoryText(request: StoryRequest, summary?: SummaryResult): StoryText {
  const requestBullets = (request.bullets ?? []).map((b) => b.trim()).filter((b) => b.length > 0);
  const title = request.title?.trim() || summary?.title.trim() || "";
  const bullets = requestBullets.length > 0 ? requestBullets : (summary?.bullets ?? []).map((b) => b.trim()).filter((b) => b.length > 0);

  if (title.length === 0) throw new InvalidStoryInputError("story title is empty");
  if (bullets.length === 0) throw new InvalidStoryInputError("story has no bullet points");
  return { title, bullets };
}

export function planSlides(text: StoryText): Slide[] {
  return [
    { index: 0, kind: "title", sourceText: text.title },
    ...text.bullets.map((sourceText, i): Slide => ({ index: i + 1, kind: "body", sourceText }))
  ];
}

async function runStep<T>(ctx: PipelineContext, step: StepName, fn: () => Promise<T>): Promise<T> {
  ensureNotAborted(ctx.signal);
  await ctx.runs.startStep(ctx.runId, step);
  try {
    const out = await fn();
    await ctx.runs.finishStep(ctx.runId, step, true);
    return out;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    await ctx.runs.finishStep(ctx.runId, step, false, msg);
    throw err;
  }
}

async function illustrateSlide(deps: WebstoryDeps, ctx: PipelineContext, slide: Slide, signal: AbortSignal): Promise<Slide> {
  ensureNotAborted(signal);
  const enhancedPrompt = await deps.enhancer.enhancePrompt(slide.sourceText, slide.kind === "title" ? "title" : "bullet", signal);
  const issues = inspectPromptConstraints(enhancedPrompt);
  if (issues.length > 0) {
    ctx.runs.log(ctx.runId, `Slide ${slide.index} prompt: ${issues.join(", ")}`, "illustrate");
  }

  ensureNotAborted(signal);
  const imageUrl = await deps.synthesizer.synthesize(enhancedPrompt, slide.kind, signal);
  ctx.runs.slideReady(ctx.runId, { index: slide.index, kind: slide.kind, imageUrl });
  return { ...slide, enhancedPrompt, imageUrl };
}

async function embedSlideImages(embedder: Pick<ImageEmbedder, "embed">, ctx: PipelineContext, slides: Slide[]): Promise<Slide[]> {
  ctx.runs.log(ctx.runId, `Embedding ${slides.length} slide images`, "assemble");
  return await mapOrdered(slides, ctx.settings.synthesisConcurrency, ctx.signal, async (slide, _index, signal) =>
    slide.imageUrl ? { ...slide, imageUrl: await embedder.embed(slide.imageUrl, signal) } : slide
  );
}

async function publishStory(deps: WebstoryDeps, ctx: PipelineContext, key: string, documentHtml: string): Promise<string> {
  ensureNotAborted(ctx.signal);
  try {
    return await deps.store.put(Buffer.from(documentHtml, "utf8"), key);
  } catch (err) {
    if (err instanceof StorageWriteError) throw err;
    throw new StorageWriteError(`failed to store "${key}"`, err);
  }
}

/**
 * Summarize (when article text is given), illustrate every slide, assemble, publish. The store
 * write is the only externally visible side effect and happens last.
 */
export async function runWebstoryPipeline(
  input: { runId: string; request: StoryRequest; settings?: RunSettings },
  runs: RunManager,
  options: PipelineOptions,
  deps: WebstoryDeps
): Promise<Story> {
  const ctx: PipelineContext = {
    runId: input.runId,
    runs,
    signal: options.signal,
    settings: {
      synthesisConcurrency: input.settings?.synthesisConcurrency ?? deps.defaults.synthesisConcurrency,
      autoAdvanceMs: input.settings?.autoAdvanceMs ?? deps.defaults.autoAdvanceMs
    },
    clock: deps.clock ?? (() => new Date())
  };
  const { request } = input;

  const text = await runStep(ctx, "summarize", async () => {
    if (!request.article) {
      runs.log(ctx.runId, "No article text; using the provided title and bullet points", "summarize");
      return resolveStoryText(request);
    }
    const summary = await deps.summarizer.summarize(request.article, ctx.signal);
    runs.log(ctx.runId, `Summary: "${summary.title}" with ${summary.bullets.length} bullet point(s)`, "summarize");
    return resolveStoryText(request, summary);
  });

  const slides = await runStep(ctx, "illustrate", async () => {
    const planned = planSlides(text);
    runs.log(ctx.runId, `Illustrating ${planned.length} slides (concurrency ${ctx.settings.synthesisConcurrency})`, "illustrate");
    return await mapOrdered(planned, ctx.settings.synthesisConcurrency, ctx.signal, (slide, _index, signal) =>
      illustrateSlide(deps, ctx, slide, signal)
    );
  });

  const documentHtml = await runStep(ctx, "assemble", async () => {
    const rendered = deps.embedder ? await embedSlideImages(deps.embedder, ctx, slides) : slides;
    return assembleStory(text.title, rendered, { autoAdvanceMs: ctx.settings.autoAdvanceMs });
  });

  return await runStep(ctx, "publish", async () => {
    const objectKey = buildStoryObjectKey(deps.storage.keyPrefix, text.title, ctx.clock());
    const publicUrl = await publishStory(deps, ctx, objectKey, documentHtml);
    const story: Story = {
      id: ctx.runId,
      title: text.title,
      slides,
      documentHtml,
      publicUrl,
      downloadUrl: publicUrl,
      objectKey
    };
    runs.log(ctx.runId, `Published ${objectKey}`, "publish");
    try {
      await runs.completeStory(ctx.runId, story);
    } catch (err) {
      // Past the commit point: the document is live, so a bookkeeping failure is only reported.
      const msg = err instanceof Error ? err.message : String(err);
      runs.log(ctx.runId, `Warning: ${publicUrl} is live but the run record was not saved: ${msg}`, "publish");
    }
    return story;
  });
}

export function createWebstoryPipeline(deps: WebstoryDeps): PipelineFn {
  return async (input, runs, options) => {
    await runWebstoryPipeline(input, runs, options, deps);
  };
}

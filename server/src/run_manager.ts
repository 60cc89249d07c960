import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import { z } from "zod";
import type { ErrorDescription } from "./errors.js";
import { RunSettingsSchema, SlideSchema, StoryRequestSchema, type RunSettings, type Story, type StoryRequest } from "./pipeline/schemas.js";
import {
  artifactAbsPath,
  DOCUMENT_ARTIFACT_NAME,
  ensureDir,
  nowIso,
  runOutputDirAbs,
  runsRootAbs,
  slug,
  tryReadJsonFile,
  writeJsonFile,
  writeTextFile
} from "./pipeline/utils.js";

export const STEP_ORDER = ["summarize", "illustrate", "assemble", "publish"] as const;

export type StepName = (typeof STEP_ORDER)[number];

const StepNameSchema = z.enum(STEP_ORDER);

const StepRecordSchema = z.object({
  name: StepNameSchema,
  status: z.enum(["queued", "running", "done", "error"]),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
  error: z.string().optional(),
  artifacts: z.array(z.string())
});

export type StepRecord = z.infer<typeof StepRecordSchema>;

const ErrorDescriptionSchema = z.object({
  kind: z.string(),
  stage: z.enum(["summarize", "enhance", "synthesize", "assemble", "publish"]).optional(),
  message: z.string(),
  cause: z.string().optional()
});

const StorySummarySchema = z.object({
  title: z.string(),
  slides: z.array(SlideSchema),
  publicUrl: z.string(),
  downloadUrl: z.string(),
  objectKey: z.string(),
  documentArtifact: z.string()
});

export type StorySummary = z.infer<typeof StorySummarySchema>;

const RunStatusSchema = z.object({
  runId: z.string(),
  label: z.string(),
  request: StoryRequestSchema,
  settings: RunSettingsSchema.optional(),
  status: z.enum(["queued", "running", "done", "error"]),
  startedAt: z.string(),
  finishedAt: z.string().optional(),
  error: ErrorDescriptionSchema.optional(),
  steps: z.object({
    summarize: StepRecordSchema,
    illustrate: StepRecordSchema,
    assemble: StepRecordSchema,
    publish: StepRecordSchema
  }),
  story: StorySummarySchema.optional(),
  outputFolder: z.string()
});

export type RunStatus = z.infer<typeof RunStatusSchema>;

type RunInternal = RunStatus & {
  emitter: EventEmitter;
};

export type RunListItem = Pick<RunStatus, "runId" | "label" | "status" | "startedAt" | "finishedAt">;

export type RunEventType = "step_started" | "step_finished" | "slide_ready" | "log" | "error" | "story_published";

const RUN_EVENT_TYPES: readonly RunEventType[] = ["step_started", "step_finished", "slide_ready", "log", "error", "story_published"];

const RUN_ID_SLUG_MAX = 48;
const RUN_ID_SUFFIX_LEN = 8;
const RUN_ID_MAX_ATTEMPTS = 10;
const RUN_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";
const LABEL_MAX_WORDS = 12;

function randomRunSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    out += RUN_ID_SUFFIX_ALPHABET[bytes[i] % RUN_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

/** Human label for a run: the caller's title, else the opening words of the article. */
export function runLabel(request: StoryRequest): string {
  const title = request.title?.trim();
  if (title) return title;
  const words = (request.article ?? "").trim().split(/\s+/).filter((w) => w.length > 0);
  if (words.length === 0) return "Untitled story";
  return words.length > LABEL_MAX_WORDS ? `${words.slice(0, LABEL_MAX_WORDS).join(" ")}…` : words.join(" ");
}

function emptySteps(): RunStatus["steps"] {
  return {
    summarize: { name: "summarize", status: "queued", artifacts: [] },
    illustrate: { name: "illustrate", status: "queued", artifacts: [] },
    assemble: { name: "assemble", status: "queued", artifacts: [] },
    publish: { name: "publish", status: "queued", artifacts: [] }
  };
}

function isTerminalRunStatus(status: RunStatus["status"]): boolean {
  return status === "done" || status === "error";
}

function recoverStaleLoadedRun(run: RunStatus): RunStatus {
  if (isTerminalRunStatus(run.status)) return run;
  const recoveredAt = nowIso();
  const message = "Recovered after server restart while run was active.";
  const steps = { ...run.steps };

  for (const stepName of STEP_ORDER) {
    const step = steps[stepName];
    if (step.status === "running" || step.status === "queued") {
      steps[stepName] = {
        ...step,
        status: "error",
        error: step.error ?? message,
        finishedAt: step.finishedAt ?? recoveredAt
      };
    }
  }

  return {
    ...run,
    status: "error",
    finishedAt: run.finishedAt ?? recoveredAt,
    error: run.error ?? { kind: "interrupted", message },
    steps
  };
}

function newEmitter(): EventEmitter {
  const emitter = new EventEmitter();
  // An unobserved "error" event would otherwise throw.
  emitter.on("error", () => undefined);
  return emitter;
}

export class RunManager {
  private runs = new Map<string, RunInternal>();

  async initFromDisk(): Promise<void> {
    await ensureDir(runsRootAbs());
    const entries = await fs.readdir(runsRootAbs(), { withFileTypes: true });
    for (const ent of entries) {
      if (!ent.isDirectory()) continue;
      const runJsonPath = path.join(runOutputDirAbs(ent.name), "run.json");
      const parsed = RunStatusSchema.safeParse(await tryReadJsonFile(runJsonPath));
      if (!parsed.success || parsed.data.runId !== ent.name) continue;
      const recovered = recoverStaleLoadedRun(parsed.data);
      if (recovered !== parsed.data) await writeJsonFile(runJsonPath, recovered);
      this.runs.set(recovered.runId, { ...recovered, emitter: newEmitter() });
    }
  }

  listRuns(): RunListItem[] {
    return [...this.runs.values()]
      .map((r) => ({ runId: r.runId, label: r.label, status: r.status, startedAt: r.startedAt, finishedAt: r.finishedAt }))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
  }

  getRun(runId: string): RunStatus | null {
    const r = this.runs.get(runId);
    return r ? this.snapshot(r) : null;
  }

  hasRun(runId: string): boolean {
    return this.runs.has(runId);
  }

  /** Absolute path of the saved story document, once the run has published one. */
  documentPath(runId: string): string | null {
    const r = this.runs.get(runId);
    if (!r?.story) return null;
    return artifactAbsPath(runId, r.story.documentArtifact);
  }

  private async runIdExists(runId: string): Promise<boolean> {
    if (this.runs.has(runId)) return true;
    return fs
      .stat(runOutputDirAbs(runId))
      .then((st) => st.isDirectory())
      .catch(() => false);
  }

  private async nextRunId(label: string): Promise<string> {
    const labelSlug = slug(label).slice(0, RUN_ID_SLUG_MAX).replace(/^-+|-+$/g, "") || "untitled";
    for (let attempt = 0; attempt < RUN_ID_MAX_ATTEMPTS; attempt++) {
      const runId = `${labelSlug}-${randomRunSuffix(RUN_ID_SUFFIX_LEN)}`;
      if (!(await this.runIdExists(runId))) return runId;
    }
    throw new Error("Unable to allocate unique runId after retries");
  }

  async createRun(request: StoryRequest, settings?: RunSettings): Promise<RunStatus> {
    const label = runLabel(request);
    const runId = await this.nextRunId(label);

    const run: RunInternal = {
      runId,
      label,
      request,
      settings,
      status: "queued",
      startedAt: nowIso(),
      steps: emptySteps(),
      outputFolder: path.join("output", "runs", runId),
      emitter: newEmitter()
    };

    await ensureDir(runOutputDirAbs(runId));
    await this.persist(run);

    this.runs.set(runId, run);
    return this.snapshot(run);
  }

  async setRunStatus(
    runId: string,
    status: RunStatus["status"],
    patch?: { finishedAt?: string; error?: ErrorDescription }
  ): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.status = status;
    if (patch?.finishedAt) r.finishedAt = patch.finishedAt;
    if (patch?.error) r.error = patch.error;
    await this.persist(r);
  }

  async startStep(runId: string, step: StepName): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = "running";
    s.startedAt = nowIso();
    await this.persist(r);
    r.emitter.emit("step_started", { step, at: s.startedAt });
  }

  async finishStep(runId: string, step: StepName, ok: boolean, error?: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = ok ? "done" : "error";
    s.finishedAt = nowIso();
    if (!ok && error) s.error = error;
    await this.persist(r);
    r.emitter.emit("step_finished", { step, at: s.finishedAt, ok });
    if (!ok && error) r.emitter.emit("error", { step, message: error, at: s.finishedAt });
  }

  slideReady(runId: string, payload: { index: number; kind: string; imageUrl: string }): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("slide_ready", { ...payload, at: nowIso() });
  }

  /**
   * Records a published story: keeps a copy of the document in the run folder and emits
   * `story_published`. Only called after the store accepted the document.
   */
  async completeStory(runId: string, story: Story): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    if (!story.documentHtml || !story.publicUrl || !story.objectKey) {
      throw new Error(`story ${story.id} is not finalized`);
    }

    // The story is already live; record it in memory before any disk write can fail.
    r.story = {
      title: story.title,
      slides: story.slides,
      publicUrl: story.publicUrl,
      downloadUrl: story.downloadUrl ?? story.publicUrl,
      objectKey: story.objectKey,
      documentArtifact: DOCUMENT_ARTIFACT_NAME
    };
    r.emitter.emit("story_published", {
      publicUrl: r.story.publicUrl,
      downloadUrl: r.story.downloadUrl,
      objectKey: r.story.objectKey,
      slideCount: story.slides.length,
      at: nowIso()
    });

    await writeTextFile(artifactAbsPath(runId, DOCUMENT_ARTIFACT_NAME), story.documentHtml);
    const publish = r.steps.publish;
    if (!publish.artifacts.includes(DOCUMENT_ARTIFACT_NAME)) publish.artifacts.push(DOCUMENT_ARTIFACT_NAME);
    await this.persist(r);
  }

  log(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("log", { message, step, at: nowIso() });
  }

  error(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("error", { message, step, at: nowIso() });
  }

  subscribe(runId: string, onEvent: (type: RunEventType, payload: unknown) => void): (() => void) | null {
    const r = this.runs.get(runId);
    if (!r) return null;

    const handlers = RUN_EVENT_TYPES.map((type) => {
      const handler = (payload: unknown) => onEvent(type, payload);
      r.emitter.on(type, handler);
      return { type, handler };
    });

    return () => {
      for (const { type, handler } of handlers) r.emitter.off(type, handler);
    };
  }

  private snapshot(run: RunInternal): RunStatus {
    const { emitter: _emitter, ...pub } = run;
    return structuredClone(pub);
  }

  private async persist(run: RunInternal): Promise<void> {
    await writeJsonFile(path.join(runOutputDirAbs(run.runId), "run.json"), this.snapshot(run));
  }
}

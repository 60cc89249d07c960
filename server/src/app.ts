import express from "express";
import cors from "cors";
import path from "node:path";
import fs from "node:fs/promises";
import { z } from "zod";
import type { RunExecutor } from "./executor.js";
import type { RunManager } from "./run_manager.js";
import { configPresence, type PipelineMode } from "./config.js";
import { NavigationController } from "./navigation.js";
import { CreateStoryBodySchema } from "./pipeline/schemas.js";
import { publicRootAbs } from "./pipeline/utils.js";

const NavigationBodySchema = z
  .object({
    action: z.enum(["next", "prev"]),
    expectedIndex: z.number().int().min(0).optional()
  })
  .strict();

export type AppOptions = {
  mode?: PipelineMode;
  /** Directory served under /public; defaults to the file store's root. */
  publicDir?: string;
  /** Navigation sessions kept in memory; the least recently used one is dropped first. */
  navigationSessionLimit?: number;
};

export const DEFAULT_NAVIGATION_SESSION_LIMIT = 100;

function downloadName(objectKey: string): string {
  return path.posix.basename(objectKey).replace(/[^\w.-]/g, "_");
}

export function createApp(runs: RunManager, executor: RunExecutor, options: AppOptions = {}) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  const navigation = new Map<string, NavigationController>();
  const navigationLimit = Math.max(1, options.navigationSessionLimit ?? DEFAULT_NAVIGATION_SESSION_LIMIT);

  function navigationFor(runId: string): NavigationController | null {
    const story = runs.getRun(runId)?.story;
    if (!story) {
      navigation.delete(runId);
      return null;
    }
    // Map order doubles as recency order.
    const controller = navigation.get(runId) ?? new NavigationController(story.slides.length);
    navigation.delete(runId);
    navigation.set(runId, controller);
    for (const oldest of navigation.keys()) {
      if (navigation.size <= navigationLimit) break;
      navigation.delete(oldest);
    }
    return controller;
  }

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, mode: options.mode ?? "live", ...configPresence() });
  });

  app.post("/api/stories", async (req, res) => {
    const parsed = CreateStoryBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const run = await runs.createRun(parsed.data.request, parsed.data.settings);
    res.json({ runId: run.runId });

    executor.enqueue(run.runId);
  });

  app.get("/api/stories", (_req, res) => {
    res.json(runs.listRuns());
  });

  app.get("/api/stories/:runId", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(run);
  });

  app.post("/api/stories/:runId/cancel", (req, res) => {
    if (!runs.hasRun(req.params.runId)) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const ok = executor.cancel(req.params.runId);
    if (!ok) {
      res.status(409).json({ error: "run not cancellable" });
      return;
    }

    res.json({ ok: true });
  });

  app.get("/api/stories/:runId/events", (req, res) => {
    const runId = req.params.runId;
    if (!runs.hasRun(runId)) {
      res.status(404).end();
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = runs.subscribe(runId, send);
    send("log", { message: "SSE connected" });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe?.();
      res.end();
    });
  });

  app.get("/api/stories/:runId/document", async (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const filePath = runs.documentPath(runId);
    if (!filePath || !run.story) {
      res.status(404).json({ error: "story not published" });
      return;
    }

    let html: string;
    try {
      html = await fs.readFile(filePath, "utf8");
    } catch {
      res.status(404).json({ error: "story document missing" });
      return;
    }

    res.setHeader("Content-Type", "text/html; charset=utf-8");
    if (req.query.download === "1") {
      res.setHeader("Content-Disposition", `attachment; filename="${downloadName(run.story.objectKey)}"`);
    }
    res.send(html);
  });

  app.get("/api/stories/:runId/navigation", (req, res) => {
    if (!runs.hasRun(req.params.runId)) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    const controller = navigationFor(req.params.runId);
    if (!controller) {
      res.status(409).json({ error: "story not published" });
      return;
    }
    res.json(controller.state);
  });

  app.post("/api/stories/:runId/navigation", (req, res) => {
    if (!runs.hasRun(req.params.runId)) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    const parsed = NavigationBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }
    const controller = navigationFor(req.params.runId);
    if (!controller) {
      res.status(409).json({ error: "story not published" });
      return;
    }

    const result = controller.apply(parsed.data.action, parsed.data.expectedIndex);
    if (!result.applied) {
      res.status(409).json({ error: "navigation state changed", state: result.state });
      return;
    }
    res.json(result.state);
  });

  app.use("/public", express.static(options.publicDir ?? publicRootAbs()));

  return app;
}

import { describe, expect, it } from "vitest";
import request from "supertest";
import http from "node:http";
import path from "node:path";
import { createApp, type AppOptions } from "../src/app.js";
import { RunExecutor } from "../src/executor.js";
import { RunManager } from "../src/run_manager.js";
import { FakeCompletionRunner, FakeImageSynthesizer } from "../src/pipeline/fake_clients.js";
import { PromptEnhancer } from "../src/pipeline/prompt_enhancer.js";
import { FileStoryStore, localPublicUrl } from "../src/pipeline/story_store.js";
import { Summarizer } from "../src/pipeline/summarizer.js";
import { createWebstoryPipeline } from "../src/pipeline/webstory_pipeline.js";
import { useTempOutputDir } from "./helpers.js";

const tmp = useTempOutputDir();

const KEY = "webstory/webstories/20250314090507_Market_Rallies.html";

function makeServer(appOptions: AppOptions = {}) {
  const runs = new RunManager();
  const runner = new FakeCompletionRunner();
  const publicDir = path.join(tmp.current(), "public");
  const pipeline = createWebstoryPipeline({
    summarizer: new Summarizer(runner, "test-model"),
    enhancer: new PromptEnhancer(runner, "test-model"),
    synthesizer: new FakeImageSynthesizer(),
    store: new FileStoryStore({ rootDir: publicDir, urlForKey: (key) => localPublicUrl("http://localhost:5050", key) }),
    storage: { keyPrefix: "webstory" },
    defaults: { synthesisConcurrency: 2, autoAdvanceMs: 5000 },
    clock: () => new Date(2025, 2, 14, 9, 5, 7)
  });
  const executor = new RunExecutor(runs, pipeline);
  const app = createApp(runs, executor, { mode: "fake", publicDir, ...appOptions });
  return { runs, executor, app };
}

async function publishedStory() {
  const server = makeServer();
  const res = await request(server.app)
    .post("/api/stories")
    .send({ title: "Market Rallies", bullets: ["Stocks rose", "  ", "Bonds fell"] });
  expect(res.status).toBe(200);
  await server.executor.idle();
  return { ...server, runId: String(res.body.runId) };
}

async function readUntil(reader: ReadableStreamDefaultReader<Uint8Array>, needle: string, timeoutMs = 1000): Promise<string> {
  const decoder = new TextDecoder();
  let text = "";
  const deadline = Date.now() + timeoutMs;
  while (!text.includes(needle)) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) throw new Error(`timeout waiting for ${needle}`);
    let timer: NodeJS.Timeout | undefined;
    const chunk = await Promise.race([
      reader.read(),
      new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => reject(new Error(`timeout waiting for ${needle}`)), remaining);
      })
    ]).finally(() => clearTimeout(timer));
    if (chunk.done) throw new Error("stream ended");
    text += decoder.decode(chunk.value, { stream: true });
  }
  return text;
}

describe("server app", () => {
  it("GET /api/health reports mode and configuration presence", async () => {
    const { app } = makeServer();
    const res = await request(app).get("/api/health");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ ok: true, mode: "fake" });
    expect(typeof res.body.hasSynthesisKey).toBe("boolean");
    expect(typeof res.body.hasLlmKey).toBe("boolean");
    expect(typeof res.body.hasStorage).toBe("boolean");
  });

  it("POST /api/stories validates the body", async () => {
    const { app, runs } = makeServer();

    expect((await request(app).post("/api/stories").send({})).status).toBe(400);
    expect((await request(app).post("/api/stories").send({ title: "T" })).status).toBe(400);
    expect((await request(app).post("/api/stories").send({ title: "T", bullets: ["  "] })).status).toBe(400);
    expect((await request(app).post("/api/stories").send({ title: "T", bullets: ["1", "2", "3", "4", "5", "6"] })).status).toBe(400);
    expect((await request(app).post("/api/stories").send({ title: "T", bullets: ["b"], extra: true })).status).toBe(400);
    expect(
      (await request(app).post("/api/stories").send({ title: "T", bullets: ["b"], settings: { synthesisConcurrency: 9 } })).status
    ).toBe(400);

    expect(runs.listRuns()).toEqual([]);
  });

  it("POST /api/stories runs the pipeline to a published story", async () => {
    const { app, runId } = await publishedStory();

    const res = await request(app).get(`/api/stories/${runId}`);
    expect(res.status).toBe(200);
    expect(res.body.status).toBe("done");
    expect(res.body.request).toEqual({ title: "Market Rallies", bullets: ["Stocks rose", "Bonds fell"] });
    expect(res.body.story.objectKey).toBe(KEY);
    expect(res.body.story.publicUrl).toBe(`http://localhost:5050/public/${KEY}`);
    expect(res.body.story.slides).toHaveLength(3);
  });

  it("accepts article text alone", async () => {
    const { app, executor } = makeServer();
    const res = await request(app)
      .post("/api/stories")
      .send({ article: "Rain finally arrived in the valley. Farmers cheered. Reservoirs rose." });
    expect(res.status).toBe(200);
    await executor.idle();

    const run = await request(app).get(`/api/stories/${res.body.runId}`);
    expect(run.body.status).toBe("done");
    expect(run.body.story.title).toBe("Rain finally arrived in the valley");
  });

  it("GET /api/stories lists runs", async () => {
    const { app, runId } = await publishedStory();
    const res = await request(app).get("/api/stories");
    expect(res.status).toBe(200);
    expect(res.body).toHaveLength(1);
    expect(res.body[0]).toMatchObject({ runId, label: "Market Rallies", status: "done" });
  });

  it("GET /api/stories/:runId/document serves the html", async () => {
    const { app, runId } = await publishedStory();

    const res = await request(app).get(`/api/stories/${runId}/document`);
    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(res.headers["content-disposition"]).toBeUndefined();
    expect(res.text).toContain("<title>Market Rallies - Webstory</title>");

    const download = await request(app).get(`/api/stories/${runId}/document?download=1`);
    expect(download.headers["content-disposition"]).toBe('attachment; filename="20250314090507_Market_Rallies.html"');
  });

  it("serves the published object under /public", async () => {
    const { app, runId } = await publishedStory();
    const doc = await request(app).get(`/api/stories/${runId}/document`);
    const pub = await request(app).get(`/public/${KEY}`);
    expect(pub.status).toBe(200);
    expect(pub.text).toBe(doc.text);
  });

  it("navigation moves with compare-and-set", async () => {
    const { app, runId } = await publishedStory();
    const base = `/api/stories/${runId}/navigation`;

    expect((await request(app).get(base)).body).toEqual({ currentIndex: 0, slideCount: 3 });

    const moved = await request(app).post(base).send({ action: "next", expectedIndex: 0 });
    expect(moved.status).toBe(200);
    expect(moved.body).toEqual({ currentIndex: 1, slideCount: 3 });

    const stale = await request(app).post(base).send({ action: "next", expectedIndex: 0 });
    expect(stale.status).toBe(409);
    expect(stale.body.state).toEqual({ currentIndex: 1, slideCount: 3 });

    const back = await request(app).post(base).send({ action: "prev" });
    expect(back.body).toEqual({ currentIndex: 0, slideCount: 3 });
    const wrap = await request(app).post(base).send({ action: "prev" });
    expect(wrap.body).toEqual({ currentIndex: 2, slideCount: 3 });

    expect((await request(app).post(base).send({ action: "sideways" })).status).toBe(400);
  });

  it("drops the least recently used navigation session past the limit", async () => {
    const { app, executor } = makeServer({ navigationSessionLimit: 1 });
    const ids: string[] = [];
    for (const title of ["First", "Second"]) {
      const res = await request(app).post("/api/stories").send({ title, bullets: ["a", "b"] });
      ids.push(String(res.body.runId));
      await executor.idle();
    }
    const [first, second] = ids;

    expect((await request(app).post(`/api/stories/${first}/navigation`).send({ action: "next" })).body).toEqual({
      currentIndex: 1,
      slideCount: 3
    });
    expect((await request(app).get(`/api/stories/${first}/navigation`)).body).toEqual({ currentIndex: 1, slideCount: 3 });

    expect((await request(app).get(`/api/stories/${second}/navigation`)).body).toEqual({ currentIndex: 0, slideCount: 3 });
    // The first session was evicted, so it starts over.
    expect((await request(app).get(`/api/stories/${first}/navigation`)).body).toEqual({ currentIndex: 0, slideCount: 3 });
  });

  it("navigation and document wait for a published story", async () => {
    const { app, runs } = makeServer();
    const run = await runs.createRun({ title: "T", bullets: ["b"] });

    expect((await request(app).get(`/api/stories/${run.runId}/navigation`)).status).toBe(409);
    expect((await request(app).post(`/api/stories/${run.runId}/navigation`).send({ action: "next" })).status).toBe(409);
    expect((await request(app).get(`/api/stories/${run.runId}/document`)).status).toBe(404);
  });

  it("returns 404 for unknown runs", async () => {
    const { app } = makeServer();
    expect((await request(app).get("/api/stories/nope")).status).toBe(404);
    expect((await request(app).post("/api/stories/nope/cancel")).status).toBe(404);
    expect((await request(app).get("/api/stories/nope/document")).status).toBe(404);
    expect((await request(app).get("/api/stories/nope/navigation")).status).toBe(404);
    expect((await request(app).post("/api/stories/nope/navigation").send({ action: "next" })).status).toBe(404);
    expect((await request(app).get("/api/stories/nope/events")).status).toBe(404);
  });

  it("POST /api/stories/:runId/cancel", async () => {
    const { app, runs, runId } = await publishedStory();
    expect((await request(app).post(`/api/stories/${runId}/cancel`)).status).toBe(409);

    const queued = await runs.createRun({ title: "T", bullets: ["b"] });
    // Not enqueued, so the executor has nothing to cancel.
    expect((await request(app).post(`/api/stories/${queued.runId}/cancel`)).status).toBe(409);
  });

  it("GET /api/stories/:runId/events streams SSE events", async () => {
    const { app, runs } = makeServer();
    const run = await runs.createRun({ title: "T", bullets: ["b"] });

    const server = http.createServer(app);
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const addr = server.address();
    if (!addr || typeof addr === "string") throw new Error("unexpected server address");

    const controller = new AbortController();
    try {
      const res = await fetch(`http://127.0.0.1:${addr.port}/api/stories/${run.runId}/events`, { signal: controller.signal });
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toContain("text/event-stream");

      const reader = res.body?.getReader();
      if (!reader) throw new Error("missing response body reader");

      expect(await readUntil(reader, "SSE connected")).toContain("event: log");

      runs.slideReady(run.runId, { index: 0, kind: "title", imageUrl: "https://img.example.test/0.png" });
      const text = await readUntil(reader, "https://img.example.test/0.png");
      expect(text).toContain("event: slide_ready");
    } finally {
      controller.abort();
      await new Promise<void>((resolve) => {
        server.closeAllConnections();
        server.close(() => resolve());
      });
    }
  });
});

import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { ConfigurationError } = await import("./errors.js");
const { loadConfig } = await import("./config.js");
const { RunManager } = await import("./run_manager.js");
const { RunExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { createWebstoryPipeline } = await import("./pipeline/webstory_pipeline.js");
const { Summarizer } = await import("./pipeline/summarizer.js");
const { PromptEnhancer } = await import("./pipeline/prompt_enhancer.js");
const { ImageSynthesizer } = await import("./pipeline/image_synthesizer.js");
const { ImageEmbedder } = await import("./pipeline/image_embedder.js");
const { AgentsCompletionRunner } = await import("./pipeline/llm.js");
const { FakeCompletionRunner, FakeImageSynthesizer } = await import("./pipeline/fake_clients.js");
const { BucketStoryStore, createS3Client, FileStoryStore, localPublicUrl, publicObjectUrl, s3ObjectBucket } = await import(
  "./pipeline/story_store.js"
);
const { publicRootAbs } = await import("./pipeline/utils.js");

let config: ReturnType<typeof loadConfig>;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigurationError) {
    console.error(err.message);
    process.exit(1);
  }
  throw err;
}

const runs = new RunManager();
await runs.initFromDisk();

const fake = config.mode === "fake";
if (fake) {
  console.log("server pipeline mode: fake (WEBSTORY_PIPELINE_MODE=fake)");
}

const completions = fake ? new FakeCompletionRunner({ delayMs: config.fakeDelayMs }) : new AgentsCompletionRunner(config.llm);
const { storage } = config;
const publicDir = publicRootAbs();

const pipeline = createWebstoryPipeline({
  summarizer: new Summarizer(completions, config.llm.modelId),
  enhancer: new PromptEnhancer(completions, config.llm.modelId),
  synthesizer: fake ? new FakeImageSynthesizer({ delayMs: config.fakeDelayMs }) : new ImageSynthesizer(config.synthesis),
  // Fake images are already data URLs.
  embedder: fake ? undefined : new ImageEmbedder(),
  store: fake
    ? new FileStoryStore({ rootDir: publicDir, urlForKey: (key) => localPublicUrl(`http://localhost:${config.port}`, key) })
    : new BucketStoryStore({
        bucket: s3ObjectBucket(createS3Client(storage), storage.bucket),
        urlForKey: (key) => publicObjectUrl(storage.bucket, storage.endpoint, key)
      }),
  storage: { keyPrefix: storage.keyPrefix },
  defaults: { synthesisConcurrency: config.synthesisConcurrency, autoAdvanceMs: config.autoAdvanceMs }
});

const executor = new RunExecutor(runs, pipeline, { concurrency: config.maxConcurrentRuns });
const app = createApp(runs, executor, { mode: config.mode, publicDir });

app.listen(config.port, () => {
  console.log(`server listening on http://localhost:${config.port}`);
});

import type { RunManager } from "./run_manager.js";
import type { RunSettings, StoryRequest } from "./pipeline/schemas.js";
import { describeError } from "./errors.js";
import { nowIso } from "./pipeline/utils.js";

export type PipelineOptions = {
  signal: AbortSignal;
};

export type PipelineFn = (
  input: { runId: string; request: StoryRequest; settings?: RunSettings },
  runs: RunManager,
  options: PipelineOptions
) => Promise<void>;

export class RunExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: string[] = [];
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly runs: RunManager,
    private readonly pipeline: PipelineFn,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(runId: string): boolean {
    return this.running.has(runId);
  }

  enqueue(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;
    if (run.status !== "queued") return false;

    if (this.queue.includes(runId) || this.running.has(runId)) return true;

    this.queue.push(runId);
    this.runs.log(runId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  cancel(runId: string): boolean {
    if (!this.runs.hasRun(runId)) return false;

    const ctrl = this.running.get(runId);
    if (ctrl) {
      this.runs.log(runId, "Cancellation requested");
      ctrl.abort();
      return true;
    }

    const idx = this.queue.indexOf(runId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.runs.error(runId, "Cancelled while queued");
      this.track(
        this.runs.setRunStatus(runId, "error", {
          finishedAt: nowIso(),
          error: { kind: "cancelled", message: "Cancelled while queued" }
        })
      );
      return true;
    }

    return false;
  }

  /** Resolves once every started run has settled. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private track(work: Promise<void>): void {
    const tracked = work
      .catch((err: unknown) => {
        console.error("run bookkeeping failed:", err);
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (next === undefined) return;
      const controller = new AbortController();
      this.running.set(next, controller);
      this.track(this.start(next, controller));
    }
  }

  private async start(runId: string, controller: AbortController): Promise<void> {
    try {
      const run = this.runs.getRun(runId);
      if (!run) return;

      await this.runs.setRunStatus(runId, "running");
      try {
        await this.pipeline({ runId, request: run.request, settings: run.settings }, this.runs, {
          signal: controller.signal
        });
        await this.runs.setRunStatus(runId, "done", { finishedAt: nowIso() });
      } catch (err) {
        const error = controller.signal.aborted ? { kind: "cancelled", message: "Cancelled" } : describeError(err);
        this.runs.error(runId, error.message);
        await this.runs.setRunStatus(runId, "error", { finishedAt: nowIso(), error });
      }
    } finally {
      this.running.delete(runId);
      this.drain();
    }
  }
}

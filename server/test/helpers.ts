import { afterEach, beforeEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export async function waitFor(fn: () => boolean | Promise<boolean>, timeoutMs = 1500): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await fn()) return;
    await sleep(10);
  }
  throw new Error("timeout");
}

export type Deferred<T = void> = { promise: Promise<T>; resolve: (value: T) => void; reject: (err: Error) => void };

export function deferred<T = void>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (err: Error) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Points WEBSTORY_OUTPUT_DIR at a fresh temp dir for every test in the file. */
export function useTempOutputDir(): { current: () => string } {
  let tmpOut: string | null = null;

  beforeEach(async () => {
    tmpOut = await fs.mkdtemp(path.join(os.tmpdir(), "webstory-out-"));
    process.env.WEBSTORY_OUTPUT_DIR = tmpOut;
  });

  afterEach(async () => {
    delete process.env.WEBSTORY_OUTPUT_DIR;
    if (tmpOut) await fs.rm(tmpOut, { recursive: true, force: true });
    tmpOut = null;
  });

  return {
    current: () => {
      if (!tmpOut) throw new Error("temp output dir is only available inside a test");
      return tmpOut;
    }
  };
}

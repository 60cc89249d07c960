import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const DOCUMENT_ARTIFACT_NAME = "document.html";

export function nowIso(): string {
  return new Date().toISOString();
}

export function repoRoot(): string {
  // This file lives at server/src/pipeline/utils.ts
  // repo root is three levels up: pipeline -> src -> server -> repo
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../../..");
}

export function outputRootAbs(): string {
  const env = process.env.WEBSTORY_OUTPUT_DIR;
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), "output");
}

export function runOutputDirAbs(runId: string): string {
  return path.join(outputRootAbs(), "runs", runId);
}

export function runsRootAbs(): string {
  return path.join(outputRootAbs(), "runs");
}

/** Local mirror of the storage bucket; served under /public. */
export function publicRootAbs(): string {
  const env = process.env.WEBSTORY_PUBLIC_DIR;
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(outputRootAbs(), "public");
}

export function artifactAbsPath(runId: string, name: string): string {
  return path.join(runOutputDirAbs(runId), name);
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function atomicWrite(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  try {
    await fs.writeFile(tmpPath, data);
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true }).catch(() => undefined);
    throw err;
  }
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  const out = text.endsWith("\n") ? text : `${text}\n`;
  await atomicWrite(filePath, out);
}

export async function writeJsonFile(filePath: string, obj: unknown): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(obj, null, 2)}\n`);
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw);
}

export async function tryReadJsonFile(filePath: string): Promise<unknown> {
  try {
    return await readJsonFile(filePath);
  } catch {
    return null;
  }
}

export function slug(input: string): string {
  const s = input
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return s.slice(0, 60) || "untitled";
}

export function wait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("Cancelled"));
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
      reject(new Error("Cancelled"));
    };

    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/** Takes at most `max` characters, counting code points rather than UTF-16 units. */
export function takeCodePoints(input: string, max: number): string {
  const chars = Array.from(input);
  if (chars.length <= max) return input;
  return chars.slice(0, max).join("");
}

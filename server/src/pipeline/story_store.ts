import path from "node:path";
import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { StorageConfig } from "../config.js";
import { StorageWriteError } from "../errors.js";
import { atomicWrite, takeCodePoints } from "./utils.js";

/** Durable, publicly addressable storage for finished story documents. */
export interface StoryStore {
  put(content: Buffer, key: string): Promise<string>;
}

export const TITLE_KEY_MAX_CHARS = 50;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** YYYYMMDDHHMMSS in the process's local time zone. */
export function formatKeyTimestamp(now: Date): string {
  return (
    String(now.getFullYear()).padStart(4, "0") +
    pad2(now.getMonth() + 1) +
    pad2(now.getDate()) +
    pad2(now.getHours()) +
    pad2(now.getMinutes()) +
    pad2(now.getSeconds())
  );
}

export function sanitizeTitleForKey(title: string): string {
  return takeCodePoints(title.replace(/[^\p{L}\p{N}]/gu, "_"), TITLE_KEY_MAX_CHARS);
}

export function buildStoryObjectKey(prefix: string, title: string, now: Date): string {
  const file = `${formatKeyTimestamp(now)}_${sanitizeTitleForKey(title)}.html`;
  const base = prefix.replace(/^\/+|\/+$/g, "");
  return base.length > 0 ? `${base}/webstories/${file}` : `webstories/${file}`;
}

function encodeKey(key: string): string {
  return key.split("/").map(encodeURIComponent).join("/");
}

function endpointHost(endpoint: string): string {
  return endpoint.replace(/^[a-z][a-z0-9+.-]*:\/\//i, "").replace(/\/+$/, "");
}

export function publicObjectUrl(bucket: string, endpoint: string, key: string): string {
  return `https://${bucket}.${endpointHost(endpoint)}/${encodeKey(key)}`;
}

/** Path under /public where a local mirror serves the same key. */
export function localPublicUrl(baseUrl: string, key: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/public/${encodeKey(key)}`;
}

export type FileStoryStoreOptions = {
  rootDir: string;
  urlForKey: (key: string) => string;
};

/** Mirrors the bucket layout on the local filesystem. */
export class FileStoryStore implements StoryStore {
  constructor(private readonly options: FileStoryStoreOptions) {}

  resolveKeyPath(key: string): string {
    const root = path.resolve(this.options.rootDir);
    const target = path.resolve(root, key);
    if (key.length === 0 || path.isAbsolute(key) || !target.startsWith(`${root}${path.sep}`)) {
      throw new StorageWriteError(`invalid object key "${key}"`);
    }
    return target;
  }

  async put(content: Buffer, key: string): Promise<string> {
    const target = this.resolveKeyPath(key);
    try {
      await atomicWrite(target, content);
    } catch (err) {
      throw new StorageWriteError(`failed to write object "${key}"`, err);
    }
    return this.options.urlForKey(key);
  }
}

export type PutObjectInput = {
  key: string;
  body: Buffer;
  contentType: string;
};

/** The one bucket operation publishing needs. */
export interface ObjectBucket {
  putObject(input: PutObjectInput): Promise<void>;
}

/** Anything that can send a PutObject request; `S3Client` in production. */
export type PutObjectSender = {
  send(command: PutObjectCommand): Promise<unknown>;
};

/** S3-compatible client addressing `https://{bucket}.{endpoint}` (virtual-hosted style). */
export function createS3Client(storage: StorageConfig): S3Client {
  return new S3Client({
    region: storage.region,
    endpoint: `https://${endpointHost(storage.endpoint)}`,
    forcePathStyle: false,
    credentials: { accessKeyId: storage.accessKeyId, secretAccessKey: storage.secretAccessKey }
  });
}

export function s3ObjectBucket(client: PutObjectSender, bucket: string): ObjectBucket {
  return {
    async putObject({ key, body, contentType }) {
      await client.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentType: contentType }));
    }
  };
}

export type BucketStoryStoreOptions = {
  bucket: ObjectBucket;
  urlForKey: (key: string) => string;
  contentType?: string;
};

/** Uploads the document to object storage and returns the URL it is served from. */
export class BucketStoryStore implements StoryStore {
  constructor(private readonly options: BucketStoryStoreOptions) {}

  async put(content: Buffer, key: string): Promise<string> {
    if (key.length === 0 || key.startsWith("/")) throw new StorageWriteError(`invalid object key "${key}"`);
    try {
      await this.options.bucket.putObject({ key, body: content, contentType: this.options.contentType ?? "text/html; charset=utf-8" });
    } catch (err) {
      throw new StorageWriteError(`failed to upload object "${key}"`, err);
    }
    return this.options.urlForKey(key);
  }
}

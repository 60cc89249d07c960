import { createHash, randomInt } from "node:crypto";

export type SignedRequest = {
  nonce: number;
  timestampSeconds: number;
  signature: string;
};

const NONCE_LIMIT = 2 ** 31;

function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const n = Math.min(left.length, right.length);
  for (let i = 0; i < n; i++) {
    const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

/**
 * SHA-1 over the three values sorted as strings and joined with no separator.
 * The signature depends on the set of string values, not on argument position.
 */
export function signRequest(secret: string, nonce: number, timestampSeconds: number): string {
  const parts = [String(nonce), secret, String(timestampSeconds)].sort(compareCodePoints);
  return createHash("sha1").update(parts.join(""), "utf8").digest("hex").toLowerCase();
}

export function randomNonce(): number {
  return randomInt(0, NONCE_LIMIT);
}

export function unixSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function createSignedRequest(
  secret: string,
  clock: () => number = unixSeconds,
  nonceSource: () => number = randomNonce
): SignedRequest {
  const nonce = nonceSource();
  const timestampSeconds = clock();
  return { nonce, timestampSeconds, signature: signRequest(secret, nonce, timestampSeconds) };
}

import { describe, expect, it } from "vitest";
import { createHash } from "node:crypto";
import { createSignedRequest, randomNonce, signRequest, unixSeconds } from "../src/pipeline/signer.js";

function sha1(text: string): string {
  return createHash("sha1").update(text, "utf8").digest("hex");
}

describe("pipeline/signer", () => {
  it("hashes the three values sorted as strings", () => {
    // "12345" < "1700000000" < "test-secret"
    expect(signRequest("test-secret", 12345, 1700000000)).toBe(sha1("123451700000000test-secret"));
  });

  it("sorts lexicographically, not numerically", () => {
    // numeric order would be 9, 10; string order puts "10" first
    expect(signRequest("abc", 9, 10)).toBe(sha1("109abc"));
  });

  it("orders uppercase before lowercase by code point", () => {
    expect(signRequest("Zed", 500, 400)).toBe(sha1("400500Zed"));
    expect(signRequest("zed", 500, 400)).toBe(sha1("400500zed"));
  });

  it("depends on the value set, not the argument position", () => {
    expect(signRequest("111", 222, 333)).toBe(signRequest("222", 111, 333));
  });

  it("returns 40 lowercase hex characters", () => {
    expect(signRequest("test-secret", 1, 2)).toMatch(/^[0-9a-f]{40}$/);
  });

  it("createSignedRequest uses the injected clock and nonce", () => {
    const signed = createSignedRequest("test-secret", () => 1700000000, () => 42);
    expect(signed).toEqual({
      nonce: 42,
      timestampSeconds: 1700000000,
      signature: signRequest("test-secret", 42, 1700000000)
    });
  });

  it("draws nonces from the uint31 range", () => {
    for (let i = 0; i < 50; i++) {
      const n = randomNonce();
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(2 ** 31);
    }
  });

  it("unixSeconds is whole seconds", () => {
    const now = unixSeconds();
    expect(Number.isInteger(now)).toBe(true);
    expect(Math.abs(now - Date.now() / 1000)).toBeLessThan(2);
  });
});

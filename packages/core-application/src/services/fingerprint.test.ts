import { describe, it, expect } from "vitest";
import { fingerprintBytes, hasUsableTimestamp, isFingerprint } from "./fingerprint";

describe("fingerprint", () => {
  it("returns the sha256 hex digest of the bytes", () => {
    expect(fingerprintBytes("")).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
    );
    expect(fingerprintBytes(Buffer.from("abc"))).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
  });

  it("gives strings and their utf-8 bytes the same fingerprint", () => {
    expect(fingerprintBytes("olá")).toBe(fingerprintBytes(Buffer.from("olá", "utf-8")));
  });

  it("recognizes fingerprints", () => {
    expect(isFingerprint(fingerprintBytes("x"))).toBe(true);
    expect(isFingerprint("ABC")).toBe(false);
  });

  it("accepts only real timestamps as proof of no change", () => {
    expect(hasUsableTimestamp(1_700_000_000_000)).toBe(true);
    expect(hasUsableTimestamp(0)).toBe(false);
    expect(hasUsableTimestamp(Number.NaN)).toBe(false);
  });
});

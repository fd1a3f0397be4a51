import { createHash } from "node:crypto";
import type { Fingerprint } from "@offsite/core-domain";

export const FINGERPRINT_ALGORITHM = "sha256";

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/;

export function fingerprintBytes(data: Buffer | string): Fingerprint {
  return createHash(FINGERPRINT_ALGORITHM).update(data).digest("hex");
}

export function isFingerprint(value: string): boolean {
  return FINGERPRINT_PATTERN.test(value);
}

/**
 * Size and mtime alone prove a file unchanged only when the timestamp is a
 * real one; some filesystems and archives report 0.
 */
export function hasUsableTimestamp(mtimeMs: number): boolean {
  return Number.isFinite(mtimeMs) && mtimeMs > 0;
}

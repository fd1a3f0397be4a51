import type { Fingerprint } from "@offsite/core-domain";

export interface ContentStore {
  has(fingerprint: Fingerprint): Promise<boolean>;
  /** Returns false when the content was already stored. */
  put(fingerprint: Fingerprint, data: Buffer): Promise<boolean>;
  get(fingerprint: Fingerprint): Promise<Buffer>;
}

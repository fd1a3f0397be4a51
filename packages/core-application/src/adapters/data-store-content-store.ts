import type { Fingerprint } from "@offsite/core-domain";

import type { ContentStore } from "../ports/content-store";
import type { DataStore } from "../ports/data-store";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import { BackupLayout } from "../application/backup-layout";
import { defaultStoreRetryPolicy } from "../application/default-store-retry-policy";
import { ContentCorruptError } from "../application/errors";
import { withRetry } from "../application/with-retry";
import { sleep } from "../infra/sleep";
import { fingerprintBytes } from "../services/fingerprint";

export type ContentStoreDeps = {
  retryPolicy?: RetryPolicy;
  sleeper?: Sleeper;
};

/** Content-addressed file bodies of one backup. */
export class DataStoreContentStore implements ContentStore {
  readonly layout: BackupLayout;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleeper: Sleeper;

  constructor(private readonly store: DataStore, backupName: string, deps: ContentStoreDeps = {}) {
    this.layout = new BackupLayout(backupName);
    this.retryPolicy = deps.retryPolicy ?? defaultStoreRetryPolicy();
    this.sleeper = deps.sleeper ?? sleep;
  }

  async has(fingerprint: Fingerprint): Promise<boolean> {
    const key = this.layout.contentKey(fingerprint);
    return withRetry(() => this.store.exists(key), this.retryPolicy, this.sleeper);
  }

  async put(fingerprint: Fingerprint, data: Buffer): Promise<boolean> {
    const actual = fingerprintBytes(data);
    if (actual !== fingerprint) throw new ContentCorruptError(fingerprint, actual);

    const key = this.layout.contentKey(fingerprint);
    return withRetry(() => this.store.putIfAbsent(key, data), this.retryPolicy, this.sleeper);
  }

  async get(fingerprint: Fingerprint): Promise<Buffer> {
    const key = this.layout.contentKey(fingerprint);
    const data = await withRetry(() => this.store.get(key), this.retryPolicy, this.sleeper);
    const actual = fingerprintBytes(data);
    if (actual !== fingerprint) throw new ContentCorruptError(fingerprint, actual);
    return data;
  }
}

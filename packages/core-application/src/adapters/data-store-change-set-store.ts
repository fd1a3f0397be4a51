import type { ChangeSet, ChangeSetDraft, ChangeSetRef, SequenceNumber } from "@offsite/core-domain";

import type { ChangeSetStore } from "../ports/change-set-store";
import type { DataStore } from "../ports/data-store";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import { BackupLayout } from "../application/backup-layout";
import { decodeChangeSet, encodeChangeSet } from "../application/change-set-codec";
import { defaultStoreRetryPolicy } from "../application/default-store-retry-policy";
import { ConflictingSequenceError, describeError } from "../application/errors";
import { withRetry } from "../application/with-retry";
import { sleep } from "../infra/sleep";

export const FIRST_SEQUENCE: SequenceNumber = 0;

export type ChangeSetStoreDeps = {
  retryPolicy?: RetryPolicy;
  sleeper?: Sleeper;
  logger?: Logger;
};

/**
 * Change-set chain of one backup kept in a DataStore. The store owns the
 * counter: a writer picks latest + 1 and publishes with `putIfAbsent`; a
 * writer that loses the race re-reads the counter and tries again.
 */
export class DataStoreChangeSetStore implements ChangeSetStore {
  readonly layout: BackupLayout;
  readonly backupName: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleeper: Sleeper;
  private readonly logger: Logger;

  constructor(
    private readonly store: DataStore,
    backupName: string,
    deps: ChangeSetStoreDeps = {}
  ) {
    this.layout = new BackupLayout(backupName);
    this.backupName = backupName;
    this.logger = deps.logger ?? silentLogger;
    this.sleeper = deps.sleeper ?? sleep;
    const policy = deps.retryPolicy ?? defaultStoreRetryPolicy();
    this.retryPolicy = {
      ...policy,
      onRetry: (ctx) => {
        this.logger.warn("change-set store call failed, retrying", {
          backup: backupName,
          attempt: ctx.attempt,
          delayMs: ctx.delayMs,
          error: describeError(ctx.lastError),
        });
        policy.onRetry?.(ctx);
      },
    };
  }

  async list(): Promise<ChangeSetRef[]> {
    const keys = await withRetry(
      () => this.store.list(this.layout.changeSetsPrefix()),
      this.retryPolicy,
      this.sleeper
    );

    const refs: ChangeSetRef[] = [];
    for (const key of keys) {
      const sequence = this.layout.parseChangeSetKey(key);
      if (sequence !== null) refs.push({ sequence, key });
    }
    return refs.sort((a, b) => a.sequence - b.sequence);
  }

  async latest(): Promise<ChangeSetRef | null> {
    const refs = await this.list();
    return refs.at(-1) ?? null;
  }

  async read(ref: ChangeSetRef): Promise<ChangeSet> {
    const data = await withRetry(() => this.store.get(ref.key), this.retryPolicy, this.sleeper);
    return decodeChangeSet(ref.key, data, ref.sequence);
  }

  async append(draft: ChangeSetDraft): Promise<ChangeSetRef> {
    // earliest sequence this draft could have been published under
    let scanFrom: SequenceNumber | null = draft.parent === null ? null : draft.parent + 1;

    return withRetry(
      async () => {
        const refs = await this.list();
        const latest = refs.at(-1);
        const sequence = latest ? latest.sequence + 1 : FIRST_SEQUENCE;
        scanFrom ??= sequence;

        const published = await this.findPublished(draft.snapshotId, refs, scanFrom);
        if (published) {
          this.logger.info("change-set already published", {
            snapshotId: draft.snapshotId,
            sequence: published.sequence,
          });
          return published;
        }

        const changeSet: ChangeSet = { ...draft, sequence };
        const key = this.layout.changeSetKey(sequence);
        const won = await this.store.putIfAbsent(key, encodeChangeSet(changeSet));
        if (!won) throw new ConflictingSequenceError(sequence);

        this.logger.debug("change-set published", { key, sequence });
        return { sequence, key };
      },
      this.retryPolicy,
      this.sleeper
    );
  }

  private async findPublished(
    snapshotId: string,
    refs: ChangeSetRef[],
    from: SequenceNumber
  ): Promise<ChangeSetRef | null> {
    for (const ref of refs) {
      if (ref.sequence < from) continue;
      const existing = await this.read(ref);
      if (existing.snapshotId === snapshotId) return ref;
    }
    return null;
  }
}

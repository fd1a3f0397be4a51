import {
  comparePaths,
  countOperations,
  EMPTY_MANIFEST,
  fileFingerprints,
  isFullSnapshot,
  type ChangeOperationKind,
  type ChangeSetDraft,
  type EntryPath,
  type Fingerprint,
  type Manifest,
  type SequenceNumber,
} from "@offsite/core-domain";

import type { DataStore } from "../ports/data-store";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import type { ManifestCache } from "../ports/manifest-cache";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import type { RunLock } from "../ports/run-lock";
import type { SourceTree } from "../ports/source-tree";
import { BrokenChainError, describeError, errorCode } from "../application/errors";
import { mapWithConcurrency } from "../infra/concurrency";
import { DataStoreChangeSetStore } from "../adapters/data-store-change-set-store";
import { DataStoreContentStore } from "../adapters/data-store-content-store";
import type { PathFilter } from "../adapters/path-filter";
import { revertPaths } from "./change-diff";
import { fingerprintBytes } from "./fingerprint";
import { ReplayEngine } from "./replay-engine";
import {
  DEFAULT_CONCURRENCY,
  SnapshotBuilder,
  type SnapshotIssue,
} from "./snapshot-builder";

export type BackupRequest = {
  backupName: string;
  source: SourceTree;
  /** Take a full snapshot even when the chain has an earlier one. */
  force?: boolean;
  filter?: PathFilter;
  alwaysFingerprint?: boolean;
  signal?: AbortSignal;
};

export type BackupSummary =
  | {
      status: "unchanged";
      backupName: string;
      sequence: SequenceNumber;
      issues: SnapshotIssue[];
    }
  | {
      status: "committed";
      backupName: string;
      sequence: SequenceNumber;
      parent: SequenceNumber | null;
      snapshotId: string;
      counts: Record<ChangeOperationKind, number>;
      uploaded: number;
      uploadedBytes: number;
      issues: SnapshotIssue[];
    };

export type BackupServiceDeps = {
  store: DataStore;
  manifestCache: ManifestCache;
  runLock: RunLock;
  builder?: SnapshotBuilder;
  logger?: Logger;
  concurrency?: number;
  retryPolicy?: RetryPolicy;
  sleeper?: Sleeper;
};

type Prior = { manifest: Manifest; parent: SequenceNumber | null; fromCache: boolean };

export class BackupService {
  private readonly builder: SnapshotBuilder;
  private readonly logger: Logger;
  private readonly concurrency: number;

  constructor(private readonly deps: BackupServiceDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.builder = deps.builder ?? new SnapshotBuilder({ logger: this.logger });
    this.concurrency = deps.concurrency ?? DEFAULT_CONCURRENCY;
  }

  async run(request: BackupRequest): Promise<BackupSummary> {
    const lock = await this.deps.runLock.acquire(request.backupName);
    try {
      return await this.runLocked(request);
    } finally {
      await lock.release();
    }
  }

  private async runLocked(request: BackupRequest): Promise<BackupSummary> {
    const { backupName, source } = request;
    const storeDeps = {
      retryPolicy: this.deps.retryPolicy,
      sleeper: this.deps.sleeper,
      logger: this.logger,
    };
    const changeSets = new DataStoreChangeSetStore(this.deps.store, backupName, storeDeps);
    const content = new DataStoreContentStore(this.deps.store, backupName, storeDeps);

    this.logger.info("backup started", {
      backup: backupName,
      source: source.root,
      destination: this.deps.store.description,
    });

    const engine = new ReplayEngine({ changeSets, content, logger: this.logger });
    const prior = await this.loadPrior(request, changeSets, engine);
    const built = await this.builder.build(source, prior.manifest, {
      parent: prior.parent,
      filter: request.filter,
      alwaysFingerprint: request.alwaysFingerprint,
      concurrency: this.concurrency,
      signal: request.signal,
    });
    const issues = [...built.issues];

    if (prior.parent !== null && built.changeSet.operations.length === 0) {
      return this.unchanged(backupName, prior.parent, prior.fromCache, built.manifest, issues);
    }

    const upload = await this.uploadContent(source, built.changeSet, prior.manifest, content, request.signal);
    issues.push(...upload.issues);
    issues.sort((a, b) => comparePaths(a.path, b.path));

    const { draft, manifest } = revertPaths({
      draft: built.changeSet,
      manifest: built.manifest,
      prior: prior.manifest,
      paths: new Set(upload.issues.map((i) => i.path)),
    });
    if (prior.parent !== null && draft.operations.length === 0) {
      return this.unchanged(backupName, prior.parent, prior.fromCache, manifest, issues);
    }

    const ref = await changeSets.append(draft);

    // a change-set that landed after someone else's no longer describes the cache
    const expected = prior.parent === null ? null : prior.parent + 1;
    if (expected === null || ref.sequence === expected) {
      await this.deps.manifestCache.save({ backupName, sequence: ref.sequence, manifest });
    } else {
      this.logger.warn("another writer appended concurrently; manifest cache dropped", {
        backup: backupName,
        sequence: ref.sequence,
        parent: prior.parent,
      });
      await this.deps.manifestCache.clear(backupName);
    }

    const summary: BackupSummary = {
      status: "committed",
      backupName,
      sequence: ref.sequence,
      parent: draft.parent,
      snapshotId: draft.snapshotId,
      counts: countOperations(draft.operations),
      uploaded: upload.uploaded,
      uploadedBytes: upload.bytes,
      issues,
    };
    this.logIssues(issues);
    this.logger.info("backup committed", {
      backup: backupName,
      sequence: summary.sequence,
      full: isFullSnapshot(draft),
      ...summary.counts,
      uploaded: summary.uploaded,
      issues: issues.length,
    });
    return summary;
  }

  private async loadPrior(
    request: BackupRequest,
    changeSets: DataStoreChangeSetStore,
    engine: ReplayEngine
  ): Promise<Prior> {
    const latest = await changeSets.latest();
    if (!latest || request.force) {
      return { manifest: EMPTY_MANIFEST, parent: null, fromCache: false };
    }

    const cached = await this.deps.manifestCache.load(request.backupName);
    if (cached && cached.sequence === latest.sequence) {
      return { manifest: cached.manifest, parent: latest.sequence, fromCache: true };
    }

    try {
      const restored = await engine.restore(latest.sequence);
      return { manifest: restored.state, parent: restored.sequence, fromCache: false };
    } catch (err) {
      if (!(err instanceof BrokenChainError)) throw err;
      this.logger.warn("change-set chain is broken; taking a full snapshot", {
        backup: request.backupName,
        error: err.message,
      });
      return { manifest: EMPTY_MANIFEST, parent: null, fromCache: false };
    }
  }

  private async unchanged(
    backupName: string,
    sequence: SequenceNumber,
    fromCache: boolean,
    manifest: Manifest,
    issues: SnapshotIssue[]
  ): Promise<BackupSummary> {
    if (!fromCache) {
      await this.deps.manifestCache.save({ backupName, sequence, manifest });
    }
    this.logIssues(issues);
    this.logger.info("nothing changed", { backup: backupName, sequence });
    return { status: "unchanged", backupName, sequence, issues };
  }

  /**
   * Stores the bytes of every file fingerprint the prior manifest does not
   * already reference. A file whose bytes no longer hash to its fingerprint
   * changed after the walk and is reported instead.
   */
  private async uploadContent(
    source: SourceTree,
    draft: ChangeSetDraft,
    prior: Manifest,
    content: DataStoreContentStore,
    signal: AbortSignal | undefined
  ): Promise<{ uploaded: number; bytes: number; issues: SnapshotIssue[] }> {
    const known = fileFingerprints(prior);
    const pathsByFingerprint = new Map<Fingerprint, EntryPath[]>();
    for (const operation of draft.operations) {
      if (operation.op === "remove" || operation.entry.type !== "file") continue;
      const fp = operation.entry.fingerprint;
      if (fp === null || known.has(fp)) continue;
      const paths = pathsByFingerprint.get(fp) ?? [];
      paths.push(operation.entry.path);
      pathsByFingerprint.set(fp, paths);
    }

    const issues: SnapshotIssue[] = [];
    const results = await mapWithConcurrency(
      [...pathsByFingerprint],
      this.concurrency,
      async ([fp, paths]): Promise<{ stored: boolean; bytes: number }> => {
        if (await content.has(fp)) return { stored: false, bytes: 0 };

        for (const p of paths) {
          let data: Buffer;
          try {
            data = await source.readFile(p);
          } catch (err) {
            const code = errorCode(err);
            const kind = code === "ENOENT" || code === "ENOTDIR" ? "changed" : "unreadable";
            issues.push({ kind, path: p, message: describeError(err) });
            continue;
          }
          if (fingerprintBytes(data) !== fp) {
            issues.push({ kind: "changed", path: p, message: `"${p}" changed while it was backed up` });
            continue;
          }
          const stored = await content.put(fp, data);
          return { stored, bytes: stored ? data.length : 0 };
        }
        return { stored: false, bytes: 0 };
      },
      signal
    );

    return {
      uploaded: results.filter((r) => r.stored).length,
      bytes: results.reduce((sum, r) => sum + r.bytes, 0),
      issues,
    };
  }

  private logIssues(issues: SnapshotIssue[]) {
    for (const issue of issues) {
      this.logger.warn(`entry ${issue.kind}`, { path: issue.path, error: issue.message });
    }
  }
}

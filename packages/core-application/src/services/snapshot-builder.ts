import { randomUUID } from "node:crypto";
import {
  comparePaths,
  EMPTY_MANIFEST,
  type ChangeSetDraft,
  type Entry,
  type EntryPath,
  type Manifest,
  type SequenceNumber,
} from "@offsite/core-domain";

import type { Clock } from "../ports/clock";
import { systemClock } from "../ports/clock";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import type { SourceStat, SourceTree } from "../ports/source-tree";
import { describeError, EntryUnreadableError, SourceUnavailableError } from "../application/errors";
import { mapWithConcurrency, throwIfCancelled } from "../infra/concurrency";
import type { PathFilter } from "../adapters/path-filter";
import { createPathFilter } from "../adapters/path-filter";
import { diffManifests } from "./change-diff";
import { fingerprintBytes, hasUsableTimestamp } from "./fingerprint";

export const DEFAULT_CONCURRENCY = 4;

export type SnapshotIssueKind = "unreadable" | "changed";

export type SnapshotIssue = {
  kind: SnapshotIssueKind;
  path: EntryPath;
  message: string;
};

export type BuildOptions = {
  /** Sequence `prior` was restored at; `null` builds a full snapshot. */
  parent: SequenceNumber | null;
  filter?: PathFilter;
  alwaysFingerprint?: boolean;
  concurrency?: number;
  signal?: AbortSignal;
};

export type BuildResult = {
  changeSet: ChangeSetDraft;
  manifest: Manifest;
  issues: SnapshotIssue[];
};

export type SnapshotBuilderDeps = {
  clock?: Clock;
  newId?: () => string;
  logger?: Logger;
};

type PendingFile = { path: EntryPath; stat: SourceStat };

export class SnapshotBuilder {
  private readonly clock: Clock;
  private readonly newId: () => string;
  private readonly logger: Logger;

  constructor(deps: SnapshotBuilderDeps = {}) {
    this.clock = deps.clock ?? systemClock;
    this.newId = deps.newId ?? randomUUID;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Walks `tree` and diffs it against `prior`. `prior` is also where
   * fingerprints are reused from when size and mtime match, even for a full
   * snapshot.
   */
  async build(tree: SourceTree, prior: Manifest, options: BuildOptions): Promise<BuildResult> {
    const filter = options.filter ?? createPathFilter();
    const issues: SnapshotIssue[] = [];
    const unreadable = (p: EntryPath, err: unknown) => {
      const issue = new EntryUnreadableError(p, err);
      issues.push({ kind: "unreadable", path: p, message: issue.message });
      this.logger.warn("skipping unreadable entry", { path: p, error: describeError(err) });
    };

    await this.assertRoot(tree);

    const entries = new Map<EntryPath, Entry>();
    const files: PendingFile[] = [];
    const unreadableDirs: EntryPath[] = [];
    const stack: EntryPath[] = [""];

    while (stack.length > 0) {
      throwIfCancelled(options.signal);
      const dir = stack.pop() ?? "";

      let names: string[] | null;
      try {
        names = await tree.readDirectory(dir);
      } catch (err) {
        if (dir === "") throw new SourceUnavailableError(tree.root, err);
        unreadable(dir, err);
        entries.delete(dir);
        unreadableDirs.push(dir);
        continue;
      }
      if (names === null) {
        if (dir === "") throw new SourceUnavailableError(tree.root);
        entries.delete(dir);
        continue;
      }

      const subdirs: EntryPath[] = [];
      for (const name of names) {
        throwIfCancelled(options.signal);
        const rel = dir === "" ? name : `${dir}/${name}`;

        let stat: SourceStat | null;
        try {
          stat = await tree.stat(rel);
        } catch (err) {
          unreadable(rel, err);
          continue;
        }
        if (!stat || !filter(rel, stat.type)) continue;

        switch (stat.type) {
          case "directory":
            entries.set(rel, { path: rel, type: "directory", fingerprint: null, size: 0, mtimeMs: 0 });
            subdirs.push(rel);
            break;
          case "file":
            files.push({ path: rel, stat });
            break;
          case "symlink": {
            let linkTarget: string | null;
            try {
              linkTarget = await tree.readLink(rel);
            } catch (err) {
              unreadable(rel, err);
              continue;
            }
            if (linkTarget === null) continue;
            entries.set(rel, {
              path: rel,
              type: "symlink",
              fingerprint: fingerprintBytes(linkTarget),
              size: Buffer.byteLength(linkTarget),
              mtimeMs: stat.mtimeMs,
              linkTarget,
            });
            break;
          }
          case "special":
            entries.set(rel, {
              path: rel,
              type: "special",
              fingerprint: null,
              size: stat.size,
              mtimeMs: stat.mtimeMs,
            });
            break;
        }
      }

      // pushed in reverse so children pop in lexicographic order
      for (let i = subdirs.length - 1; i >= 0; i--) {
        const sub = subdirs[i];
        if (sub !== undefined) stack.push(sub);
      }
    }

    const fingerprinted = await mapWithConcurrency(
      files,
      options.concurrency ?? DEFAULT_CONCURRENCY,
      async (file): Promise<Entry | null> => {
        const before = prior.get(file.path);
        if (
          !options.alwaysFingerprint &&
          before?.type === "file" &&
          before.fingerprint !== null &&
          before.size === file.stat.size &&
          before.mtimeMs === file.stat.mtimeMs &&
          hasUsableTimestamp(file.stat.mtimeMs)
        ) {
          return { ...before };
        }

        let fingerprint: string | null;
        try {
          fingerprint = await tree.hashFile(file.path);
        } catch (err) {
          unreadable(file.path, err);
          return null;
        }
        if (fingerprint === null) return null;
        return {
          path: file.path,
          type: "file",
          fingerprint,
          size: file.stat.size,
          mtimeMs: file.stat.mtimeMs,
        };
      },
      options.signal
    );
    for (const entry of fingerprinted) {
      if (entry) entries.set(entry.path, entry);
    }

    // an incremental snapshot keeps what it could not read as it was
    if (options.parent !== null) {
      for (const issue of issues) this.carryForward(prior, entries, issue.path);
      for (const dir of unreadableDirs) {
        for (const [p, entry] of prior) {
          if (p.startsWith(`${dir}/`)) entries.set(p, entry);
        }
      }
    }

    const manifest: Manifest = entries;
    const operations = diffManifests(options.parent === null ? EMPTY_MANIFEST : prior, manifest);
    const changeSet: ChangeSetDraft = {
      snapshotId: this.newId(),
      parent: options.parent,
      createdAtIso: this.clock.now().toISOString(),
      operations,
    };

    issues.sort((a, b) => comparePaths(a.path, b.path));
    this.logger.debug("snapshot built", {
      entries: manifest.size,
      operations: operations.length,
      issues: issues.length,
    });
    return { changeSet, manifest, issues };
  }

  private async assertRoot(tree: SourceTree): Promise<void> {
    let stat: SourceStat | null;
    try {
      stat = await tree.stat("");
    } catch (err) {
      throw new SourceUnavailableError(tree.root, err);
    }
    if (stat?.type !== "directory") throw new SourceUnavailableError(tree.root);
  }

  private carryForward(prior: Manifest, entries: Map<EntryPath, Entry>, p: EntryPath): void {
    const before = prior.get(p);
    if (before) entries.set(p, before);
  }
}

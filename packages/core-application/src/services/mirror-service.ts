import path from "node:path";
import {
  comparePaths,
  countOperations,
  EMPTY_MANIFEST,
  parentPath,
  type ChangeOperationKind,
  type Entry,
  type EntryPath,
  type Manifest,
} from "@offsite/core-domain";

import type { DestinationWriter } from "../ports/destination-writer";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import type { ManifestCache } from "../ports/manifest-cache";
import type { SourceTree } from "../ports/source-tree";
import { InvalidDestinationError, MirrorRecordNotFoundError } from "../application/errors";
import type { PathFilter } from "../adapters/path-filter";
import { applyOperations, reconcile, type ApplyResult } from "./replay-engine";
import { sameContent } from "./replay";
import { DEFAULT_CONCURRENCY, SnapshotBuilder, type SnapshotIssue } from "./snapshot-builder";

/** Name the mirrored manifest is kept under in the mirror's ManifestCache. */
export const MIRROR_RECORD = "mirror";

export type MirrorRequest = {
  source: SourceTree;
  destination: DestinationWriter;
  filter?: PathFilter;
  signal?: AbortSignal;
};

export type MirrorSummary = {
  counts: Record<ChangeOperationKind, number>;
  applied: ApplyResult;
  issues: SnapshotIssue[];
  /** Leftovers of an interrupted run removed before mirroring. */
  cleaned: EntryPath[];
};

/** `standard` trusts size and mtime; `complete` reads every file. */
export type MirrorValidateMode = "standard" | "complete";

export type MirrorDifference = {
  kind: "added" | "removed" | "modified";
  path: EntryPath;
  expected?: Entry;
  actual?: Entry;
};

export type MirrorServiceDeps = {
  builder?: SnapshotBuilder;
  logger?: Logger;
  concurrency?: number;
  /** Where the mirrored manifest is kept between runs; without it every run reads all content. */
  records?: ManifestCache;
};

function isInside(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

function coveredBy(p: EntryPath, roots: ReadonlySet<EntryPath>): boolean {
  for (let at: EntryPath | null = p; at !== null; at = parentPath(at)) {
    if (roots.has(at)) return true;
  }
  return false;
}

/** Destination entries at or below an unreadable source path stay as they are. */
function keepUnreadable(target: Manifest, current: Manifest, issues: readonly SnapshotIssue[]): Manifest {
  if (issues.length === 0) return target;

  const unreadable = new Set(issues.map((issue) => issue.path));
  const kept = new Map<EntryPath, Entry>(target);
  for (const [p, entry] of current) {
    if (coveredBy(p, unreadable)) kept.set(p, entry);
  }
  return kept;
}

function differs(expected: Entry, actual: Entry): boolean {
  if (!sameContent(expected, actual)) return true;
  return expected.type === "file" && expected.size !== actual.size;
}

/**
 * Keeps a destination directory identical to the source. No history: the
 * manifest of the last run is kept so unchanged files are not read again on
 * either side.
 */
export class MirrorService {
  private readonly builder: SnapshotBuilder;
  private readonly logger: Logger;

  constructor(private readonly deps: MirrorServiceDeps = {}) {
    this.logger = deps.logger ?? silentLogger;
    this.builder = deps.builder ?? new SnapshotBuilder({ logger: this.logger });
  }

  async run(request: MirrorRequest): Promise<MirrorSummary> {
    const { source, destination } = request;
    const src = path.resolve(source.root);
    const dst = path.resolve(destination.root);
    if (isInside(src, dst) || isInside(dst, src)) {
      throw new InvalidDestinationError(dst, `overlaps the mirrored source ${src}`);
    }

    const cleaned = await destination.cleanup();
    if (cleaned.length > 0) {
      this.logger.warn("removed leftovers of an interrupted mirror", { destination: dst, count: cleaned.length });
    }

    const record = await this.deps.records?.load(MIRROR_RECORD);
    const prior = record?.manifest ?? EMPTY_MANIFEST;

    const concurrency = this.deps.concurrency ?? DEFAULT_CONCURRENCY;
    const built = await this.builder.build(source, prior, {
      parent: null,
      filter: request.filter,
      concurrency,
      signal: request.signal,
    });
    const current = await destination.scan(prior);
    const target = keepUnreadable(built.manifest, current, built.issues);
    const operations = reconcile(current, target, { prune: true });

    const applied = await applyOperations(
      destination,
      operations,
      (entry) => source.readFile(entry.path),
      { concurrency, signal: request.signal, logger: this.logger }
    );
    await this.deps.records?.save({ backupName: MIRROR_RECORD, sequence: 0, manifest: target });

    const counts = countOperations(operations);
    this.logger.info("mirror finished", {
      source: src,
      destination: dst,
      ...counts,
      issues: built.issues.length,
    });
    return { counts, applied, issues: built.issues, cleaned };
  }

  /** Compares the destination with the manifest the last run left it at. */
  async validate(destination: DestinationWriter, mode: MirrorValidateMode = "standard"): Promise<MirrorDifference[]> {
    const record = await this.deps.records?.load(MIRROR_RECORD);
    if (!record) throw new MirrorRecordNotFoundError(path.resolve(destination.root));

    // special files are recorded but never created
    const expected = new Map([...record.manifest].filter(([, entry]) => entry.type !== "special"));
    const actual = await destination.scan(mode === "standard" ? expected : undefined);

    const differences: MirrorDifference[] = [];
    for (const [p, entry] of expected) {
      const found = actual.get(p);
      if (!found) differences.push({ kind: "removed", path: p, expected: entry });
      else if (differs(entry, found)) differences.push({ kind: "modified", path: p, expected: entry, actual: found });
    }
    for (const [p, entry] of actual) {
      if (!expected.has(p) && entry.type !== "special") differences.push({ kind: "added", path: p, actual: entry });
    }

    differences.sort((a, b) => comparePaths(a.path, b.path));
    this.logger.info("mirror validated", { destination: destination.root, mode, differences: differences.length });
    return differences;
  }

  /** Removes what an interrupted run left in the destination. */
  async cleanup(destination: DestinationWriter): Promise<EntryPath[]> {
    const removed = await destination.cleanup();
    this.logger.info("mirror cleaned", { destination: destination.root, removed: removed.length });
    return removed;
  }
}

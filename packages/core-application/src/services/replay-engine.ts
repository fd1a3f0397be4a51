import {
  countOperations,
  isFullSnapshot,
  type ChangeOperation,
  type ChangeOperationKind,
  type ChangeSet,
  type ChangeSetRef,
  type Entry,
  type EntryPath,
  type RestoredState,
  type SequenceNumber,
} from "@offsite/core-domain";

import type { ChangeSetStore } from "../ports/change-set-store";
import type { ContentStore } from "../ports/content-store";
import type { DestinationWriter } from "../ports/destination-writer";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import {
  BackupNotFoundError,
  BrokenChainError,
  RestoreConflictError,
} from "../application/errors";
import { mapWithConcurrency, throwIfCancelled } from "../infra/concurrency";
import { diffManifests } from "./change-diff";
import { foldChain, planOperations, sameContent, substitutePaths, type PathSubstitution } from "./replay";
import { DEFAULT_CONCURRENCY } from "./snapshot-builder";

/** Supplies the bytes of a file entry being materialized. */
export type ContentReader = (entry: Entry) => Promise<Buffer>;

export type ApplyOptions = {
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
};

export type ApplyResult = {
  removed: number;
  directories: number;
  written: number;
  /** Entries already present with the same content. */
  unchanged: number;
  /** Special files, which are recorded but never recreated. */
  skipped: EntryPath[];
};

export type Restored = RestoredState & { changeSets: ChangeSet[] };

export type RestoreOptions = {
  upTo?: SequenceNumber;
  overwrite?: boolean;
  prune?: boolean;
  dryRun?: boolean;
  /** Restore parts of the backup under other paths. */
  substitutions?: readonly PathSubstitution[];
  concurrency?: number;
  signal?: AbortSignal;
};

export type RestoreResult = {
  sequence: SequenceNumber;
  base: SequenceNumber;
  operations: ChangeOperation[];
  counts: Record<ChangeOperationKind, number>;
  /** Existing destination paths whose content differs from the backup. */
  conflicts: EntryPath[];
  /** `null` for a dry run. */
  applied: ApplyResult | null;
};

/**
 * Materializes a list of operations into a destination: removals deepest
 * first, then directories in order, then files and symlinks in parallel.
 */
export async function applyOperations(
  destination: DestinationWriter,
  operations: readonly ChangeOperation[],
  content: ContentReader,
  options: ApplyOptions = {}
): Promise<ApplyResult> {
  const logger = options.logger ?? silentLogger;
  const plan = planOperations(operations);
  const result: ApplyResult = { removed: 0, directories: 0, written: 0, unchanged: 0, skipped: [] };

  for (const removal of plan.removals) {
    throwIfCancelled(options.signal);
    await destination.remove(removal.path, removal.type);
    result.removed += 1;
  }

  for (const dir of plan.directories) {
    throwIfCancelled(options.signal);
    await destination.makeDirectory(dir);
    result.directories += 1;
  }

  const outcomes = await mapWithConcurrency(
    plan.writes,
    options.concurrency ?? DEFAULT_CONCURRENCY,
    async (entry): Promise<"written" | "unchanged" | "skipped"> => {
      if (entry.type === "special") {
        logger.warn("special file not restored", { path: entry.path });
        return "skipped";
      }

      const current = await destination.inspect(entry.path);
      if (current && sameContent(current, entry)) return "unchanged";

      if (entry.type === "symlink") await destination.writeSymlink(entry);
      else await destination.writeFile(entry, await content(entry));
      return "written";
    },
    options.signal
  );

  plan.writes.forEach((entry, i) => {
    const outcome = outcomes[i];
    if (outcome === "written") result.written += 1;
    else if (outcome === "unchanged") result.unchanged += 1;
    else result.skipped.push(entry.path);
  });

  return result;
}

/**
 * Operations that bring `current` to `target`, leaving out entries whose
 * content already matches.
 */
export function reconcile(
  current: ReadonlyMap<EntryPath, Entry>,
  target: ReadonlyMap<EntryPath, Entry>,
  options: { prune: boolean }
): ChangeOperation[] {
  return diffManifests(current, target).filter((operation) => {
    if (operation.op === "remove") return options.prune;
    if (operation.op === "add") return true;
    const before = current.get(operation.entry.path);
    return !before || !sameContent(before, operation.entry);
  });
}

export type ReplayEngineDeps = {
  changeSets: ChangeSetStore;
  content: ContentStore;
  logger?: Logger;
};

export class ReplayEngine {
  private readonly changeSets: ChangeSetStore;
  private readonly content: ContentStore;
  private readonly logger: Logger;

  constructor(deps: ReplayEngineDeps) {
    this.changeSets = deps.changeSets;
    this.content = deps.content;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Change-sets from the nearest full snapshot at or before `upTo` (default:
   * latest) through `upTo`, ascending. Every sequence in that range must be
   * present and every parent must fall inside it.
   */
  async resolveChain(upTo?: SequenceNumber): Promise<ChangeSet[]> {
    const refs = await this.changeSets.list();
    const first = refs[0];
    const last = refs.at(-1);
    if (!first || !last) throw new BackupNotFoundError(this.changeSets.backupName);

    const bySequence = new Map<SequenceNumber, ChangeSetRef>(refs.map((r) => [r.sequence, r]));
    const target = upTo ?? last.sequence;

    const chain: ChangeSet[] = [];
    for (let sequence = target; ; sequence--) {
      const ref = bySequence.get(sequence);
      if (!ref) {
        let message = `Change-set ${sequence} is missing from the chain ending at ${target}`;
        if (sequence === target) message = `Change-set ${sequence} does not exist`;
        else if (sequence < first.sequence) message = `No full snapshot precedes change-set ${target}`;
        throw new BrokenChainError(message, sequence);
      }
      const changeSet = await this.changeSets.read(ref);
      chain.unshift(changeSet);
      if (isFullSnapshot(changeSet)) break;
    }

    const base = chain[0]?.sequence ?? target;
    for (const changeSet of chain) {
      const parent = changeSet.parent;
      if (parent === null) continue;
      if (parent >= changeSet.sequence) {
        throw new BrokenChainError(
          `Change-set ${changeSet.sequence} names parent ${parent}, which is not older than itself`,
          parent
        );
      }
      if (parent < base) {
        throw new BrokenChainError(
          `Change-set ${changeSet.sequence} names parent ${parent}, older than the full snapshot ${base}`,
          parent
        );
      }
    }

    return chain;
  }

  async restore(upTo?: SequenceNumber): Promise<Restored> {
    const changeSets = await this.resolveChain(upTo);
    const first = changeSets[0];
    const last = changeSets.at(-1);
    if (!first || !last) throw new BackupNotFoundError(this.changeSets.backupName);

    const state = foldChain(changeSets);
    this.logger.debug("chain replayed", {
      base: first.sequence,
      sequence: last.sequence,
      entries: state.size,
    });
    return { state, sequence: last.sequence, base: first.sequence, changeSets };
  }

  /** Applies one change-set's operations with content from the store. */
  async apply(
    destination: DestinationWriter,
    changeSet: Pick<ChangeSet, "operations">,
    options: ApplyOptions = {}
  ): Promise<ApplyResult> {
    return applyOperations(destination, changeSet.operations, this.readContent, {
      logger: this.logger,
      ...options,
    });
  }

  async restoreTo(destination: DestinationWriter, options: RestoreOptions = {}): Promise<RestoreResult> {
    const restored = await this.restore(options.upTo);
    throwIfCancelled(options.signal);

    const target = substitutePaths(restored.state, options.substitutions ?? []);
    const current = await destination.scan();
    const operations = reconcile(current, target, { prune: options.prune ?? false });
    const conflicts = operations.flatMap((o) => (o.op === "modify" ? [o.entry.path] : []));

    const result: RestoreResult = {
      sequence: restored.sequence,
      base: restored.base,
      operations,
      counts: countOperations(operations),
      conflicts,
      applied: null,
    };

    if (options.dryRun) return result;
    if (conflicts.length > 0 && !options.overwrite) throw new RestoreConflictError(conflicts);

    result.applied = await this.apply(
      destination,
      { operations },
      { concurrency: options.concurrency, signal: options.signal }
    );
    this.logger.info("restore finished", {
      destination: destination.root,
      sequence: restored.sequence,
      written: result.applied.written,
      removed: result.applied.removed,
    });
    return result;
  }

  private readonly readContent: ContentReader = (entry) => {
    if (entry.fingerprint === null) {
      return Promise.reject(new Error(`File entry "${entry.path}" has no fingerprint`));
    }
    return this.content.get(entry.fingerprint);
  };
}

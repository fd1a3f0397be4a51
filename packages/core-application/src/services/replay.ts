import {
  comparePaths,
  EMPTY_MANIFEST,
  isFullSnapshot,
  parentPath,
  type ChangeOperation,
  type ChangeSetDraft,
  type DestinationState,
  type Entry,
  type EntryPath,
} from "@offsite/core-domain";

/**
 * One step of the replay fold. A full snapshot starts from an empty state;
 * otherwise adds and modifies upsert and removes delete. Applying the same
 * change-set twice gives the same state as applying it once.
 */
export function applyChangeSet(
  state: DestinationState,
  changeSet: Pick<ChangeSetDraft, "parent" | "operations">
): DestinationState {
  const next = new Map<EntryPath, Entry>(isFullSnapshot(changeSet) ? [] : state);

  for (const operation of changeSet.operations) {
    if (operation.op === "remove") next.delete(operation.path);
    else next.set(operation.entry.path, operation.entry);
  }

  return next;
}

export function foldChain(
  changeSets: readonly Pick<ChangeSetDraft, "parent" | "operations">[]
): DestinationState {
  return changeSets.reduce(applyChangeSet, EMPTY_MANIFEST);
}

export type OperationPlan = {
  /** Deepest path first, so children go before their directory. */
  removals: Extract<ChangeOperation, { op: "remove" }>[];
  /** Ascending, so parents exist before their children. */
  directories: Entry[];
  /** Files, symlinks and special entries; independent of each other. */
  writes: Entry[];
};

export function planOperations(operations: readonly ChangeOperation[]): OperationPlan {
  const plan: OperationPlan = { removals: [], directories: [], writes: [] };

  for (const operation of operations) {
    if (operation.op === "remove") plan.removals.push(operation);
    else if (operation.entry.type === "directory") plan.directories.push(operation.entry);
    else plan.writes.push(operation.entry);
  }

  plan.removals.sort((a, b) => comparePaths(b.path, a.path));
  plan.directories.sort((a, b) => comparePaths(a.path, b.path));
  plan.writes.sort((a, b) => comparePaths(a.path, b.path));
  return plan;
}

/** Same bytes at the same path: timestamps and sizes are not compared. */
export function sameContent(a: Entry, b: Entry): boolean {
  return a.type === b.type && a.fingerprint === b.fingerprint && a.linkTarget === b.linkTarget;
}

/** Restores everything at or below `from` at the same place below `to`. */
export type PathSubstitution = { from: EntryPath; to: EntryPath };

function substitutePath(p: EntryPath, substitutions: readonly PathSubstitution[]): EntryPath {
  for (const { from, to } of substitutions) {
    if (p === from) return to;
    if (p.startsWith(`${from}/`)) return `${to}${p.slice(from.length)}`;
  }
  return p;
}

/**
 * Moves entries of a restored state by path prefix; the first matching
 * substitution wins. Parent directories a moved entry lacks are added.
 */
export function substitutePaths(
  state: DestinationState,
  substitutions: readonly PathSubstitution[]
): DestinationState {
  if (substitutions.length === 0) return state;

  const moved = new Map<EntryPath, Entry>();
  for (const [p, entry] of state) {
    const at = substitutePath(p, substitutions);
    if (moved.has(at)) {
      throw new Error(`Restoring "${p}" as "${at}" collides with another restored entry`);
    }
    moved.set(at, at === p ? entry : { ...entry, path: at });
  }

  for (const p of [...moved.keys()]) {
    for (let dir = parentPath(p); dir !== null && !moved.has(dir); dir = parentPath(dir)) {
      moved.set(dir, { path: dir, type: "directory", fingerprint: null, size: 0, mtimeMs: 0 });
    }
  }
  return moved;
}


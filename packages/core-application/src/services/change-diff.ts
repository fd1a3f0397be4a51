import {
  comparePaths,
  isFullSnapshot,
  sameEntry,
  type ChangeOperation,
  type ChangeSetDraft,
  type Entry,
  type EntryPath,
  type Manifest,
} from "@offsite/core-domain";

/**
 * Operations that turn `prior` into `current`, sorted by path.
 * Entries equal in type, fingerprint, size, mtime and link target produce
 * nothing.
 */
export function diffManifests(prior: Manifest, current: Manifest): ChangeOperation[] {
  const ops: ChangeOperation[] = [];

  for (const entry of current.values()) {
    const before = prior.get(entry.path);
    if (!before) {
      ops.push({ op: "add", entry });
    } else if (!sameEntry(before, entry)) {
      ops.push({ op: "modify", entry, previousFingerprint: before.fingerprint });
    }
  }

  for (const before of prior.values()) {
    if (!current.has(before.path)) {
      ops.push({
        op: "remove",
        path: before.path,
        type: before.type,
        previousFingerprint: before.fingerprint,
      });
    }
  }

  return sortOperations(ops);
}

export function sortOperations(ops: ChangeOperation[]): ChangeOperation[] {
  return ops.sort((a, b) => comparePaths(pathOf(a), pathOf(b)));
}

function pathOf(op: ChangeOperation): EntryPath {
  return op.op === "remove" ? op.path : op.entry.path;
}

/**
 * Drops the operations for `paths` from a draft and puts the prior entries
 * back into the manifest, as if those paths had not been looked at.
 */
export function revertPaths(params: {
  draft: ChangeSetDraft;
  manifest: Manifest;
  prior: Manifest;
  paths: ReadonlySet<EntryPath>;
}): { draft: ChangeSetDraft; manifest: Manifest } {
  const { draft, prior, paths } = params;
  if (paths.size === 0) return { draft, manifest: params.manifest };

  const manifest = new Map<EntryPath, Entry>(params.manifest);
  for (const p of paths) {
    const before = isFullSnapshot(draft) ? undefined : prior.get(p);
    if (before) manifest.set(p, before);
    else manifest.delete(p);
  }

  return {
    draft: { ...draft, operations: draft.operations.filter((o) => !paths.has(pathOf(o))) },
    manifest,
  };
}

import type { Entry, EntryPath, EntryType, Fingerprint } from "./entry";

export type ChangeOperation =
  | { op: "add"; entry: Entry }
  | { op: "modify"; entry: Entry; previousFingerprint: Fingerprint | null }
  | {
      op: "remove";
      path: EntryPath;
      type: EntryType;
      previousFingerprint: Fingerprint | null;
    };

export type ChangeOperationKind = ChangeOperation["op"];

export type SequenceNumber = number;

/** What the snapshot builder emits; the store assigns the sequence. */
export interface ChangeSetDraft {
  snapshotId: string;
  /** Sequence the draft was diffed against; `null` marks a full snapshot. */
  parent: SequenceNumber | null;
  createdAtIso: string;
  operations: ChangeOperation[];
}

export interface ChangeSet extends ChangeSetDraft {
  sequence: SequenceNumber;
}

export interface ChangeSetRef {
  sequence: SequenceNumber;
  key: string;
}

export function operationPath(operation: ChangeOperation): EntryPath {
  return operation.op === "remove" ? operation.path : operation.entry.path;
}

export function isFullSnapshot(changeSet: Pick<ChangeSetDraft, "parent">): boolean {
  return changeSet.parent === null;
}

export function countOperations(
  operations: readonly ChangeOperation[]
): Record<ChangeOperationKind, number> {
  const counts: Record<ChangeOperationKind, number> = { add: 0, modify: 0, remove: 0 };
  for (const o of operations) counts[o.op] += 1;
  return counts;
}

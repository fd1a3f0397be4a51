import type { ChangeSet, ChangeSetDraft, ChangeSetRef } from "@offsite/core-domain";

export interface ChangeSetStore {
  readonly backupName: string;
  /** Publishes the draft under the next free sequence number. */
  append(draft: ChangeSetDraft): Promise<ChangeSetRef>;
  /** Every published change-set, ascending by sequence. */
  list(): Promise<ChangeSetRef[]>;
  latest(): Promise<ChangeSetRef | null>;
  read(ref: ChangeSetRef): Promise<ChangeSet>;
}

export type LockHandle = {
  path: string;
  release(): Promise<void>;
};

/** Keeps two local runs of the same backup from overlapping. */
export interface RunLock {
  acquire(backupName: string): Promise<LockHandle>;
}

import fs from "fs/promises";
import path from "path";

import type { LockHandle, RunLock } from "../ports/run-lock";
import { BackupLockedError, errorCode } from "../application/errors";

export function runLockPath(stateDir: string, backupName: string) {
  return path.join(stateDir, "locks", `${backupName}.lock`);
}

/**
 * Lock file created with `wx`: the second run of a backup fails instead of
 * waiting. A stale lock left by a crashed run has to be removed by hand.
 */
export class FileRunLock implements RunLock {
  constructor(private readonly stateDir: string) {}

  async acquire(backupName: string): Promise<LockHandle> {
    const fp = runLockPath(this.stateDir, backupName);
    await fs.mkdir(path.dirname(fp), { recursive: true });

    try {
      await fs.writeFile(fp, JSON.stringify({ pid: process.pid, at: Date.now() }), {
        encoding: "utf-8",
        flag: "wx",
      });
    } catch (err) {
      if (errorCode(err) === "EEXIST") throw new BackupLockedError(backupName, fp);
      throw err;
    }

    let released = false;
    return {
      path: fp,
      release: async () => {
        if (released) return;
        released = true;
        await fs.rm(fp, { force: true });
      },
    };
  }
}

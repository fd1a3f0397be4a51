import type { Fingerprint, SequenceNumber } from "@offsite/core-domain";

import { isFingerprint } from "../services/fingerprint";

const BACKUP_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;
const SEQUENCE_DIGITS = 12;

export function isValidBackupName(name: string): boolean {
  return BACKUP_NAME_PATTERN.test(name);
}

/**
 * Key layout of one backup inside a data store:
 *
 *   <backup>/changesets/000000000000.json
 *   <backup>/content/ab/cd/abcd...
 */
export class BackupLayout {
  constructor(public readonly backupName: string) {
    if (!isValidBackupName(backupName)) {
      throw new Error(
        `Invalid backup name "${backupName}": use letters, digits, ".", "_" or "-"`
      );
    }
  }

  changeSetsPrefix(): string {
    return `${this.backupName}/changesets/`;
  }

  changeSetKey(sequence: SequenceNumber): string {
    return `${this.changeSetsPrefix()}${String(sequence).padStart(SEQUENCE_DIGITS, "0")}.json`;
  }

  parseChangeSetKey(key: string): SequenceNumber | null {
    const prefix = this.changeSetsPrefix();
    if (!key.startsWith(prefix)) return null;
    const match = /^(\d+)\.json$/.exec(key.slice(prefix.length));
    if (!match?.[1]) return null;
    const sequence = Number(match[1]);
    return Number.isSafeInteger(sequence) ? sequence : null;
  }

  contentPrefix(): string {
    return `${this.backupName}/content/`;
  }

  contentKey(fingerprint: Fingerprint): string {
    if (!isFingerprint(fingerprint)) throw new Error(`Invalid content fingerprint "${fingerprint}"`);
    return `${this.contentPrefix()}${fingerprint.slice(0, 2)}/${fingerprint.slice(2, 4)}/${fingerprint}`;
  }
}

export function assertSafeKey(key: string): void {
  const segments = key.split("/");
  if (
    key.length === 0 ||
    key.startsWith("/") ||
    key.includes("\\") ||
    segments.some((s) => s === "" || s === "." || s === "..")
  ) {
    throw new Error(`Invalid data store key "${key}"`);
  }
}

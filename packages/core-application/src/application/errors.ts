import type { SequenceNumber } from "@offsite/core-domain";

export class NetworkError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "NetworkError";
  }
}

/** A data store call did not answer within the configured timeout. */
export class StoreTimeoutError extends Error {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`Data store ${operation} timed out after ${timeoutMs}ms`);
    this.name = "StoreTimeoutError";
  }
}

/** Another writer published the sequence number first. */
export class ConflictingSequenceError extends Error {
  constructor(public readonly sequence: SequenceNumber) {
    super(`Sequence ${sequence} was already published by another writer`);
    this.name = "ConflictingSequenceError";
  }
}

export class BrokenChainError extends Error {
  constructor(message: string, public readonly missingSequence: SequenceNumber) {
    super(message);
    this.name = "BrokenChainError";
  }
}

export class ChangeSetCorruptError extends Error {
  constructor(public readonly key: string, reason: string, public cause?: unknown) {
    super(`Change-set "${key}" is corrupt: ${reason}`);
    this.name = "ChangeSetCorruptError";
  }
}

export class ContentCorruptError extends Error {
  constructor(public readonly fingerprint: string, public readonly actual: string) {
    super(`Content ${fingerprint} failed verification (got ${actual})`);
    this.name = "ContentCorruptError";
  }
}

export class KeyNotFoundError extends Error {
  constructor(public readonly key: string) {
    super(`Key "${key}" was not found in the data store`);
    this.name = "KeyNotFoundError";
  }
}

export class EntryUnreadableError extends Error {
  constructor(public readonly path: string, public cause?: unknown) {
    super(`Unable to read "${path}": ${describeError(cause)}`);
    this.name = "EntryUnreadableError";
  }
}

export class SourceUnavailableError extends Error {
  constructor(public readonly sourceRoot: string, public cause?: unknown) {
    super(`Source "${sourceRoot}" is not an accessible directory`);
    this.name = "SourceUnavailableError";
  }
}

export class OperationCancelledError extends Error {
  constructor(message = "Operation cancelled") {
    super(message);
    this.name = "OperationCancelledError";
  }
}

export class RestoreConflictError extends Error {
  constructor(public readonly paths: string[]) {
    super(
      `Restore would overwrite ${paths.length} existing item(s): ${paths.slice(0, 5).join(", ")}` +
        (paths.length > 5 ? ", ..." : "")
    );
    this.name = "RestoreConflictError";
  }
}

export class InvalidDestinationError extends Error {
  constructor(public readonly destination: string, reason: string) {
    super(`Invalid destination "${destination}": ${reason}`);
    this.name = "InvalidDestinationError";
  }
}

export class UnsupportedDestinationError extends Error {
  constructor(public readonly scheme: string) {
    super(`No data store adapter is registered for "${scheme}" destinations`);
    this.name = "UnsupportedDestinationError";
  }
}

export class BackupLockedError extends Error {
  constructor(public readonly backupName: string, public readonly lockPath: string) {
    super(`Backup "${backupName}" is already running (lock: ${lockPath})`);
    this.name = "BackupLockedError";
  }
}

export class BackupNotFoundError extends Error {
  constructor(public readonly backupName: string) {
    super(`No change-sets were found for backup "${backupName}"`);
    this.name = "BackupNotFoundError";
  }
}

export class MirrorRecordNotFoundError extends Error {
  constructor(public readonly destination: string) {
    super(`No mirror run has been recorded for "${destination}"`);
    this.name = "MirrorRecordNotFoundError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isRetryableStoreError(err: unknown): boolean {
  return (
    err instanceof StoreTimeoutError ||
    err instanceof ConflictingSequenceError ||
    err instanceof NetworkError
  );
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// Public API of the core-application package: ports, application helpers,
// services and the Node adapters, so apps never reach into internal paths.

// Ports (interfaces)
export * from "./ports/clock";
export * from "./ports/logger";
export type { RetryContext, RetryPolicy, Sleeper } from "./ports/retry-policy";
export type { DataStore } from "./ports/data-store";
export type { ChangeSetStore } from "./ports/change-set-store";
export type { ContentStore } from "./ports/content-store";
export type { SourceStat, SourceTree } from "./ports/source-tree";
export type { DestinationWriter } from "./ports/destination-writer";
export type { CachedManifest, ManifestCache } from "./ports/manifest-cache";
export type { LockHandle, RunLock } from "./ports/run-lock";
export type { FileHash, FileHasher } from "./ports/file-hasher";
export type {
  FileChangeType,
  FileChangeEvent,
  FileWatcherOptions,
  FileWatcher,
} from "./ports/file-watcher";

// Application
export * from "./application/errors";
export * from "./application/with-retry";
export * from "./application/with-timeout";
export * from "./application/default-store-retry-policy";
export * from "./application/backup-layout";
export * from "./application/change-set-codec";
export * from "./application/destination";
export { EntryPathSchema } from "./application/schemas";

// Infra
export * from "./infra/sleep";
export * from "./infra/concurrency";
export * from "./infra/home";

// Services
export * from "./services/fingerprint";
export * from "./services/change-diff";
export * from "./services/snapshot-builder";
export * from "./services/replay";
export * from "./services/replay-engine";
export * from "./services/backup-service";
export * from "./services/mirror-service";
export * from "./services/verify-service";
export * from "./services/watch-service";

// Node adapters
export * from "./adapters/console-logger";
export * from "./adapters/path-filter";
export * from "./adapters/node-file-hasher";
export * from "./adapters/node-source-tree";
export * from "./adapters/node-destination-writer";
export * from "./adapters/node-manifest-cache";
export * from "./adapters/run-lock";
export * from "./adapters/file-system-data-store";
export * from "./adapters/memory-data-store";
export * from "./adapters/sftp-data-store";
export * from "./adapters/timed-data-store";
export * from "./adapters/data-store-change-set-store";
export * from "./adapters/data-store-content-store";
export * from "./adapters/data-store-factory";
export * from "./adapters/google-drive-files";
export * from "./adapters/google-drive-data-store";
export * from "./adapters/chokidar-file-watcher";

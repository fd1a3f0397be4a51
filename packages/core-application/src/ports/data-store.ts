/**
 * Capability set every storage backend provides. Keys are relative POSIX
 * paths (`backups/home/changesets/000000000003.json`).
 *
 * - `put` replaces the value atomically: readers see the old or the new
 *   bytes, never a partial write.
 * - `putIfAbsent` publishes only when the key does not exist yet and reports
 *   whether it did; two concurrent callers for the same key never both win.
 * - `get` rejects with `KeyNotFoundError` for a missing key.
 * - `exists` looks up one key without listing its neighbours.
 * - `list` returns every key starting with `prefix`, sorted.
 */
export interface DataStore {
  readonly description: string;
  put(key: string, data: Buffer): Promise<void>;
  putIfAbsent(key: string, data: Buffer): Promise<boolean>;
  get(key: string): Promise<Buffer>;
  exists(key: string): Promise<boolean>;
  list(prefix: string): Promise<string[]>;
  delete(key: string): Promise<void>;
  close?(): Promise<void>;
}

import type { EntryPath, EntryType } from "@offsite/core-domain";

export type SourceStat = {
  type: EntryType;
  size: number;
  mtimeMs: number;
};

/**
 * Read-only view of a directory tree. Paths are relative POSIX paths, `""`
 * being the root itself. Methods resolve `null` when the item vanished.
 */
export interface SourceTree {
  readonly root: string;
  stat(path: EntryPath): Promise<SourceStat | null>;
  readDirectory(path: EntryPath): Promise<string[] | null>;
  readLink(path: EntryPath): Promise<string | null>;
  hashFile(path: EntryPath): Promise<string | null>;
  readFile(path: EntryPath): Promise<Buffer>;
}

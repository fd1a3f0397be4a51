import type { Entry, EntryPath, EntryType, Manifest } from "@offsite/core-domain";

/**
 * Filesystem-like target the replay engine materializes entries into.
 * Every write is atomic per entry.
 */
export interface DestinationWriter {
  readonly root: string;
  /**
   * Current entry at `path`, fingerprinted, or null when absent. A file
   * whose size and mtime still match `known` keeps its fingerprint unread.
   */
  inspect(path: EntryPath, known?: Entry): Promise<Entry | null>;
  scan(known?: Manifest): Promise<Manifest>;
  /** Deletes what interrupted writes left behind; returns the removed paths. */
  cleanup(): Promise<EntryPath[]>;
  makeDirectory(entry: Entry): Promise<void>;
  writeFile(entry: Entry, content: Buffer): Promise<void>;
  writeSymlink(entry: Entry): Promise<void>;
  remove(path: EntryPath, type: EntryType): Promise<void>;
}

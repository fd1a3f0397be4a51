/** SHA-256 hex digest of a file's content (or of a symlink's target text). */
export type Fingerprint = string;

/** Relative POSIX path inside a source tree, e.g. `docs/notes.md`. */
export type EntryPath = string;

export type EntryType = "file" | "directory" | "symlink" | "special";

export interface Entry {
  path: EntryPath;
  type: EntryType;
  fingerprint: Fingerprint | null;
  size: number;
  mtimeMs: number;
  linkTarget?: string;
}

export function sameEntry(a: Entry, b: Entry): boolean {
  return (
    a.path === b.path &&
    a.type === b.type &&
    a.fingerprint === b.fingerprint &&
    a.size === b.size &&
    a.mtimeMs === b.mtimeMs &&
    a.linkTarget === b.linkTarget
  );
}

/** Code-unit ordering; a parent path always sorts before its children. */
export function comparePaths(a: EntryPath, b: EntryPath): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function parentPath(p: EntryPath): EntryPath | null {
  const idx = p.lastIndexOf("/");
  return idx === -1 ? null : p.slice(0, idx);
}

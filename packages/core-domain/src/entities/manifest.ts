import { comparePaths, type Entry, type EntryPath } from "./entry";

/**
 * Full state of a source tree at one point in time. Never mutated once
 * built; a new state is always a new map.
 */
export type Manifest = ReadonlyMap<EntryPath, Entry>;

export const EMPTY_MANIFEST: Manifest = new Map();

export function manifestFromEntries(entries: Iterable<Entry>): Manifest {
  const map = new Map<EntryPath, Entry>();
  for (const e of entries) map.set(e.path, e);
  return map;
}

export function sortedEntries(manifest: Manifest): Entry[] {
  return [...manifest.values()].sort((a, b) => comparePaths(a.path, b.path));
}

export function fileFingerprints(manifest: Manifest): Set<string> {
  const out = new Set<string>();
  for (const e of manifest.values()) {
    if (e.type === "file" && e.fingerprint) out.add(e.fingerprint);
  }
  return out;
}

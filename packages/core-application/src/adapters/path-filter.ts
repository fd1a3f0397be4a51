import path from "node:path";
import type { EntryPath, EntryType } from "@offsite/core-domain";

/** Marker in the names of the engine's own in-flight temporary files. */
export const TEMP_MARKER = ".offsite-tmp-";

export type PathFilter = (relPath: EntryPath, type: EntryType) => boolean;

export type PathFilterOptions = {
  includes?: readonly RegExp[];
  excludes?: readonly RegExp[];
};

export function isEngineTempName(name: string): boolean {
  return name.includes(TEMP_MARKER);
}

/**
 * Excludes apply to every entry (an excluded directory is not descended);
 * includes only to non-directories, so matching files deep in the tree stay
 * reachable.
 */
export function createPathFilter(options: PathFilterOptions = {}): PathFilter {
  const includes = options.includes ?? [];
  const excludes = options.excludes ?? [];

  return (relPath, type) => {
    const name = relPath.slice(relPath.lastIndexOf("/") + 1);
    if (isEngineTempName(name)) return false;
    if (excludes.some((re) => re.test(relPath))) return false;
    if (type === "directory" || includes.length === 0) return true;
    return includes.some((re) => re.test(relPath));
  };
}

/** Adapts a PathFilter to the absolute paths a file watcher reports. */
export function createWatchIgnore(rootDir: string, filter: PathFilter) {
  const root = path.resolve(rootDir);

  return (absPath: string) => {
    const p = path.resolve(absPath);
    if (p === root) return false;

    // só observa dentro do root
    const rel = path.relative(root, p);
    if (rel.startsWith("..") || path.isAbsolute(rel)) return true;

    const relPosix = rel.replaceAll("\\", "/");
    // includes are not applied: the ignore callback cannot tell directories from files
    return !filter(relPosix, "directory") || isEngineTempName(path.basename(p));
  };
}

export function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map((p) => new RegExp(p));
}

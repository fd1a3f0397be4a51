import fs from "node:fs/promises";
import path from "node:path";
import type { Stats } from "node:fs";
import type { EntryPath, EntryType } from "@offsite/core-domain";

import type { FileHasher } from "../ports/file-hasher";
import type { SourceStat, SourceTree } from "../ports/source-tree";
import { errorCode } from "../application/errors";
import { NodeFileHasher } from "./node-file-hasher";

const VANISHED_CODES = new Set(["ENOENT", "ENOTDIR"]);

function isVanished(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && VANISHED_CODES.has(code);
}

export function entryTypeOf(stat: Stats): EntryType {
  if (stat.isSymbolicLink()) return "symlink";
  if (stat.isDirectory()) return "directory";
  if (stat.isFile()) return "file";
  return "special";
}

export function toAbsolute(root: string, relPath: EntryPath): string {
  return relPath === "" ? root : path.join(root, ...relPath.split("/"));
}

/**
 * SourceTree over a local directory. Nothing is followed through symlinks:
 * every stat is an lstat.
 */
export class NodeSourceTree implements SourceTree {
  readonly root: string;

  constructor(root: string, private readonly hasher: FileHasher = new NodeFileHasher()) {
    this.root = path.resolve(root);
  }

  async stat(relPath: EntryPath): Promise<SourceStat | null> {
    try {
      const st = await fs.lstat(toAbsolute(this.root, relPath));
      return { type: entryTypeOf(st), size: st.size, mtimeMs: st.mtimeMs };
    } catch (err) {
      if (isVanished(err)) return null;
      throw err;
    }
  }

  async readDirectory(relPath: EntryPath): Promise<string[] | null> {
    try {
      const names = await fs.readdir(toAbsolute(this.root, relPath));
      return names.sort();
    } catch (err) {
      if (isVanished(err)) return null;
      throw err;
    }
  }

  async readLink(relPath: EntryPath): Promise<string | null> {
    try {
      return await fs.readlink(toAbsolute(this.root, relPath));
    } catch (err) {
      if (isVanished(err)) return null;
      throw err;
    }
  }

  async hashFile(relPath: EntryPath): Promise<string | null> {
    try {
      const hash = await this.hasher.hashFile(toAbsolute(this.root, relPath));
      return hash.value;
    } catch (err) {
      if (isVanished(err)) return null;
      throw err;
    }
  }

  async readFile(relPath: EntryPath): Promise<Buffer> {
    return fs.readFile(toAbsolute(this.root, relPath));
  }
}

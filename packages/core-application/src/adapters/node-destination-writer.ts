import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import type { Stats } from "node:fs";
import { comparePaths, type Entry, type EntryPath, type EntryType, type Manifest } from "@offsite/core-domain";

import type { DestinationWriter } from "../ports/destination-writer";
import type { FileHasher } from "../ports/file-hasher";
import { errorCode } from "../application/errors";
import { fingerprintBytes, hasUsableTimestamp } from "../services/fingerprint";
import { NodeFileHasher } from "./node-file-hasher";
import { entryTypeOf, toAbsolute } from "./node-source-tree";
import { isEngineTempName, TEMP_MARKER } from "./path-filter";

/** Timestamps set through a Date keep whole milliseconds only. */
function unchangedSince(known: Entry, st: Stats): boolean {
  return (
    known.type === "file" &&
    known.fingerprint !== null &&
    known.size === st.size &&
    hasUsableTimestamp(known.mtimeMs) &&
    Math.trunc(known.mtimeMs) === Math.trunc(st.mtimeMs)
  );
}

/**
 * Materializes entries under a local directory. Files and symlinks are
 * written to a temporary sibling and renamed over the target.
 */
export class NodeDestinationWriter implements DestinationWriter {
  readonly root: string;

  constructor(root: string, private readonly hasher: FileHasher = new NodeFileHasher()) {
    this.root = path.resolve(root);
  }

  private abs(relPath: EntryPath): string {
    return toAbsolute(this.root, relPath);
  }

  async inspect(relPath: EntryPath, known?: Entry): Promise<Entry | null> {
    const abs = this.abs(relPath);
    let st: Stats;
    try {
      st = await fs.lstat(abs);
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOENT" || code === "ENOTDIR") return null;
      throw err;
    }

    const type = entryTypeOf(st);
    switch (type) {
      case "directory":
        return { path: relPath, type, fingerprint: null, size: 0, mtimeMs: 0 };
      case "file": {
        if (known && unchangedSince(known, st)) {
          return { path: relPath, type, fingerprint: known.fingerprint, size: st.size, mtimeMs: st.mtimeMs };
        }
        const hash = await this.hasher.hashFile(abs);
        return { path: relPath, type, fingerprint: hash.value, size: st.size, mtimeMs: st.mtimeMs };
      }
      case "symlink": {
        const linkTarget = await fs.readlink(abs);
        return {
          path: relPath,
          type,
          fingerprint: fingerprintBytes(linkTarget),
          size: Buffer.byteLength(linkTarget),
          mtimeMs: st.mtimeMs,
          linkTarget,
        };
      }
      case "special":
        return { path: relPath, type, fingerprint: null, size: st.size, mtimeMs: st.mtimeMs };
    }
  }

  async scan(known?: Manifest): Promise<Manifest> {
    const out = new Map<EntryPath, Entry>();
    await this.walk(async (rel, name) => {
      if (isEngineTempName(name)) return false;
      const entry = await this.inspect(rel, known?.get(rel));
      if (!entry) return false;
      out.set(rel, entry);
      return entry.type === "directory";
    });
    return out;
  }

  async cleanup(): Promise<EntryPath[]> {
    const removed: EntryPath[] = [];
    await this.walk(async (rel, name) => {
      if (isEngineTempName(name)) {
        await fs.rm(this.abs(rel), { recursive: true, force: true });
        removed.push(rel);
        return false;
      }
      const st = await fs.lstat(this.abs(rel));
      return st.isDirectory();
    });
    return removed.sort(comparePaths);
  }

  /** Visits every name below the root; `visit` answers whether to descend. */
  private async walk(visit: (rel: EntryPath, name: string) => Promise<boolean>): Promise<void> {
    const stack: EntryPath[] = [""];

    while (stack.length > 0) {
      const dir = stack.pop() ?? "";
      let names: string[];
      try {
        names = await fs.readdir(this.abs(dir));
      } catch (err) {
        const code = errorCode(err);
        if (code === "ENOENT" || code === "ENOTDIR") continue;
        throw err;
      }

      for (const name of names) {
        const rel = dir === "" ? name : `${dir}/${name}`;
        if (await visit(rel, name)) stack.push(rel);
      }
    }
  }

  async makeDirectory(entry: Entry): Promise<void> {
    const abs = this.abs(entry.path);
    const current = await this.inspect(entry.path);
    if (current?.type === "directory") return;
    if (current) await fs.rm(abs, { force: true });
    await fs.mkdir(abs, { recursive: true });
  }

  async writeFile(entry: Entry, content: Buffer): Promise<void> {
    await this.replace(entry, async (tmp) => {
      await fs.writeFile(tmp, content);
      if (hasUsableTimestamp(entry.mtimeMs)) {
        const at = new Date(entry.mtimeMs);
        await fs.utimes(tmp, at, at);
      }
    });
  }

  async writeSymlink(entry: Entry): Promise<void> {
    const target = entry.linkTarget;
    if (target === undefined) {
      throw new Error(`Symlink entry "${entry.path}" has no link target`);
    }
    await this.replace(entry, async (tmp) => {
      await fs.symlink(target, tmp);
      if (hasUsableTimestamp(entry.mtimeMs)) {
        const at = new Date(entry.mtimeMs);
        await fs.lutimes(tmp, at, at);
      }
    });
  }

  async remove(relPath: EntryPath, type: EntryType): Promise<void> {
    await fs.rm(this.abs(relPath), { recursive: type === "directory", force: true });
  }

  private async replace(entry: Entry, create: (tmp: string) => Promise<void>): Promise<void> {
    const abs = this.abs(entry.path);
    await fs.mkdir(path.dirname(abs), { recursive: true });

    // rename() cannot replace a directory with a file
    const current = await fs.lstat(abs).catch((err: unknown) => {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    });
    if (current?.isDirectory()) await fs.rm(abs, { recursive: true, force: true });

    const tmp = path.join(path.dirname(abs), `.${path.basename(abs)}${TEMP_MARKER}${randomUUID()}`);
    try {
      await create(tmp);
      await fs.rename(tmp, abs);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }
}

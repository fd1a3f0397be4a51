import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import type { Dirent } from "node:fs";

import type { DataStore } from "../ports/data-store";
import { assertSafeKey } from "../application/backup-layout";
import { errorCode, KeyNotFoundError } from "../application/errors";

const STAGING_DIR = ".staging";

async function exists(p: string) {
  try {
    await fs.stat(p);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
}

/**
 * DataStore over a local directory. Values are staged under `.staging/` and
 * then renamed (`put`) or hard-linked (`putIfAbsent`) into place, so a key is
 * either absent or complete.
 */
export class FileSystemDataStore implements DataStore {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  get description(): string {
    return `file://${this.rootDir}`;
  }

  private keyPath(key: string): string {
    assertSafeKey(key);
    return path.join(this.rootDir, ...key.split("/"));
  }

  private async stage(data: Buffer): Promise<string> {
    const dir = path.join(this.rootDir, STAGING_DIR);
    await fs.mkdir(dir, { recursive: true });
    const tmp = path.join(dir, randomUUID());
    await fs.writeFile(tmp, data);
    return tmp;
  }

  async put(key: string, data: Buffer): Promise<void> {
    const target = this.keyPath(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    const tmp = await this.stage(data);
    try {
      await fs.rename(tmp, target);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }

  async putIfAbsent(key: string, data: Buffer): Promise<boolean> {
    const target = this.keyPath(key);
    if (await exists(target)) return false;

    await fs.mkdir(path.dirname(target), { recursive: true });
    const tmp = await this.stage(data);
    try {
      // link() fails with EEXIST instead of replacing the target
      await fs.link(tmp, target);
      return true;
    } catch (err) {
      if (errorCode(err) === "EEXIST") return false;
      throw err;
    } finally {
      await fs.rm(tmp, { force: true });
    }
  }

  async get(key: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.keyPath(key));
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOENT" || code === "ENOTDIR" || code === "EISDIR") {
        throw new KeyNotFoundError(key);
      }
      throw err;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      return (await fs.stat(this.keyPath(key))).isFile();
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOENT" || code === "ENOTDIR") return false;
      throw err;
    }
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    const stack: string[] = [""];

    while (stack.length > 0) {
      const rel = stack.pop() ?? "";
      const abs = rel === "" ? this.rootDir : path.join(this.rootDir, ...rel.split("/"));

      let dirents: Dirent[];
      try {
        dirents = await fs.readdir(abs, { withFileTypes: true });
      } catch (err) {
        const code = errorCode(err);
        if (code === "ENOENT" || code === "ENOTDIR") continue;
        throw err;
      }

      for (const d of dirents) {
        if (rel === "" && d.name === STAGING_DIR) continue;
        const key = rel === "" ? d.name : `${rel}/${d.name}`;
        if (d.isDirectory()) {
          // only descend where the prefix can still match
          if (prefix.startsWith(`${key}/`) || `${key}/`.startsWith(prefix)) stack.push(key);
        } else if (d.isFile() && key.startsWith(prefix)) {
          keys.push(key);
        }
      }
    }

    return keys.sort();
  }

  async delete(key: string): Promise<void> {
    await fs.rm(this.keyPath(key), { force: true });
  }
}

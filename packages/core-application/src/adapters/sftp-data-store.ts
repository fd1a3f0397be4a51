import path from "node:path";
import { randomUUID } from "node:crypto";

import type { DataStore } from "../ports/data-store";
import { assertSafeKey } from "../application/backup-layout";
import { KeyNotFoundError, NetworkError } from "../application/errors";

const STAGING_DIR = ".staging";

/**
 * The calls the store makes on an ssh2-sftp-client connection; tests supply
 * an in-memory implementation.
 */
export interface SftpSession {
  /** `"d"` for a directory, `"-"` for a file. */
  exists(remotePath: string): Promise<false | string>;
  mkdir(remotePath: string, recursive?: boolean): Promise<unknown>;
  put(data: Buffer, remotePath: string): Promise<unknown>;
  get(remotePath: string): Promise<unknown>;
  /** Plain SFTP rename; fails when the target exists. */
  rename(from: string, to: string): Promise<unknown>;
  /** posix-rename@openssh.com; replaces the target. */
  posixRename(from: string, to: string): Promise<unknown>;
  delete(remotePath: string, noErrorOK?: boolean): Promise<unknown>;
  list(remotePath: string): Promise<Array<{ name: string; type: string }>>;
  end(): Promise<unknown>;
}

const TRANSIENT_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EPIPE", "ERR_NOT_CONNECTED"]);

/** Dropped connections become retryable NetworkErrors. */
export function toSftpError(err: unknown, what: string): unknown {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    if (TRANSIENT_CODES.has(err.code)) return new NetworkError(`SFTP ${what} failed (${err.code})`, err);
  }
  return err;
}

/**
 * DataStore under a directory of an SFTP server. Values are uploaded to
 * `.staging/` and renamed into place: `put` through posix-rename, which
 * replaces; `putIfAbsent` through plain rename, which refuses an existing
 * target.
 */
export class SftpDataStore implements DataStore {
  constructor(
    private readonly session: SftpSession,
    private readonly rootDir: string,
    readonly description = `sftp://${rootDir}`
  ) {}

  private keyPath(key: string): string {
    assertSafeKey(key);
    return path.posix.join(this.rootDir, key);
  }

  private async call<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toSftpError(err, what);
    }
  }

  private async stage(data: Buffer): Promise<string> {
    const dir = path.posix.join(this.rootDir, STAGING_DIR);
    await this.session.mkdir(dir, true);
    const tmp = path.posix.join(dir, randomUUID());
    await this.session.put(data, tmp);
    return tmp;
  }

  async put(key: string, data: Buffer): Promise<void> {
    const target = this.keyPath(key);
    await this.call(`put ${key}`, async () => {
      await this.session.mkdir(path.posix.dirname(target), true);
      const tmp = await this.stage(data);
      try {
        await this.session.posixRename(tmp, target);
      } catch (err) {
        await this.session.delete(tmp, true);
        throw err;
      }
    });
  }

  async putIfAbsent(key: string, data: Buffer): Promise<boolean> {
    const target = this.keyPath(key);
    return this.call(`putIfAbsent ${key}`, async () => {
      if ((await this.session.exists(target)) !== false) return false;

      await this.session.mkdir(path.posix.dirname(target), true);
      const tmp = await this.stage(data);
      try {
        await this.session.rename(tmp, target);
        return true;
      } catch (err) {
        if ((await this.session.exists(target)) !== false) return false;
        throw err;
      } finally {
        await this.session.delete(tmp, true);
      }
    });
  }

  async get(key: string): Promise<Buffer> {
    const target = this.keyPath(key);
    return this.call(`get ${key}`, async () => {
      if ((await this.session.exists(target)) !== "-") throw new KeyNotFoundError(key);
      const data = await this.session.get(target);
      if (Buffer.isBuffer(data)) return data;
      throw new Error(`Unexpected SFTP download payload for "${key}"`);
    });
  }

  async exists(key: string): Promise<boolean> {
    const target = this.keyPath(key);
    return this.call(`exists ${key}`, async () => (await this.session.exists(target)) === "-");
  }

  async list(prefix: string): Promise<string[]> {
    return this.call(`list ${prefix}`, async () => {
      if ((await this.session.exists(this.rootDir)) !== "d") return [];

      const keys: string[] = [];
      const stack: string[] = [""];
      while (stack.length > 0) {
        const rel = stack.pop() ?? "";
        for (const item of await this.session.list(rel === "" ? this.rootDir : path.posix.join(this.rootDir, rel))) {
          if (rel === "" && item.name === STAGING_DIR) continue;
          const key = rel === "" ? item.name : `${rel}/${item.name}`;
          if (item.type === "d") {
            // only descend where the prefix can still match
            if (prefix.startsWith(`${key}/`) || `${key}/`.startsWith(prefix)) stack.push(key);
          } else if (item.type === "-" && key.startsWith(prefix)) {
            keys.push(key);
          }
        }
      }
      return keys.sort();
    });
  }

  async delete(key: string): Promise<void> {
    const target = this.keyPath(key);
    await this.call(`delete ${key}`, () => this.session.delete(target, true));
  }

  async close(): Promise<void> {
    await this.session.end();
  }
}

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it, expect } from "vitest";

import type { DataStore } from "../ports/data-store";
import { KeyNotFoundError } from "../application/errors";
import { FileSystemDataStore } from "./file-system-data-store";
import { MemoryDataStore } from "./memory-data-store";
import { SftpDataStore } from "./sftp-data-store";
import { FakeSftpSession } from "../testing/fake-sftp-session";

const tmpDirs: string[] = [];

async function fileStore(): Promise<DataStore> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "offsite-store-"));
  tmpDirs.push(dir);
  return new FileSystemDataStore(dir);
}

async function memoryStore(): Promise<DataStore> {
  return new MemoryDataStore();
}

async function sftpStore(): Promise<DataStore> {
  return new SftpDataStore(new FakeSftpSession(), "/srv/backups");
}

afterEach(async () => {
  await Promise.all(tmpDirs.splice(0).map((d) => fs.rm(d, { recursive: true, force: true })));
});

describe.each<[string, () => Promise<DataStore>]>([
  ["FileSystemDataStore", fileStore],
  ["MemoryDataStore", memoryStore],
  ["SftpDataStore", sftpStore],
])("%s", (_name, open) => {
  it("publishes a key only once", async () => {
    const store = await open();
    await expect(store.putIfAbsent("b/k", Buffer.from("first"))).resolves.toBe(true);
    await expect(store.putIfAbsent("b/k", Buffer.from("second"))).resolves.toBe(false);
    expect((await store.get("b/k")).toString()).toBe("first");
  });

  it("lets exactly one of several racing writers publish", async () => {
    const store = await open();
    const results = await Promise.all(
      ["a", "b", "c", "d", "e"].map((v) => store.putIfAbsent("b/race", Buffer.from(v)))
    );
    expect(results.filter(Boolean)).toHaveLength(1);
  });

  it("replaces values with put", async () => {
    const store = await open();
    await store.put("b/k", Buffer.from("one"));
    await store.put("b/k", Buffer.from("two"));
    expect((await store.get("b/k")).toString()).toBe("two");
  });

  it("tells whether one key exists", async () => {
    const store = await open();
    await store.put("b/content/ab/cd/abcd", Buffer.from("x"));

    await expect(store.exists("b/content/ab/cd/abcd")).resolves.toBe(true);
    await expect(store.exists("b/content/ab/cd")).resolves.toBe(false);
    await expect(store.exists("b/content/ab/cd/abce")).resolves.toBe(false);
  });

  it("rejects missing keys with KeyNotFoundError", async () => {
    const store = await open();
    await expect(store.get("b/missing")).rejects.toThrow(KeyNotFoundError);
  });

  it("lists keys under a prefix in sorted order", async () => {
    const store = await open();
    for (const key of [
      "b/changesets/000000000001.json",
      "other/x",
      "b/content/ab/cd/abcd",
      "b/changesets/000000000000.json",
    ]) {
      await store.put(key, Buffer.from(key));
    }

    await expect(store.list("b/changesets/")).resolves.toEqual([
      "b/changesets/000000000000.json",
      "b/changesets/000000000001.json",
    ]);
    await expect(store.list("")).resolves.toEqual([
      "b/changesets/000000000000.json",
      "b/changesets/000000000001.json",
      "b/content/ab/cd/abcd",
      "other/x",
    ]);
    await expect(store.list("nothing/")).resolves.toEqual([]);
  });

  it("deletes keys and ignores missing ones", async () => {
    const store = await open();
    await store.put("b/k", Buffer.from("v"));
    await store.delete("b/k");
    await store.delete("b/never");
    await expect(store.get("b/k")).rejects.toThrow(KeyNotFoundError);
  });

  it("refuses keys that escape the store", async () => {
    const store = await open();
    await expect(store.put("../x", Buffer.from("v"))).rejects.toThrow('Invalid data store key "../x"');
    await expect(store.putIfAbsent("/abs", Buffer.from("v"))).rejects.toThrow(/Invalid data store key/);
  });
});

describe("MemoryDataStore.named", () => {
  it("returns the same store for the same name", () => {
    const a = MemoryDataStore.named("shared-test");
    expect(MemoryDataStore.named("shared-test")).toBe(a);
    expect(a.description).toBe("memory://shared-test");
    MemoryDataStore.forget("shared-test");
    expect(MemoryDataStore.named("shared-test")).not.toBe(a);
  });
});

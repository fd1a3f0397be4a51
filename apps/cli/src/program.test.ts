import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { MemoryDataStore } from "@offsite/core-application";

import type { CliIo } from "./context";
import { createProgram } from "./program";

const T = new Date(1_700_000_000_000);

let base: string;
let store: string;
let out: string[];
let logs: string[];
let exitCode: number | undefined;
let stores = 0;

function io(): CliIo {
  return {
    cwd: base,
    env: { OFFSITE_STATE_DIR: path.join(base, "state") },
    out: (line) => out.push(line),
    logSink: { log: (line: string) => logs.push(line), error: (line: string) => logs.push(line) },
    setExitCode: (code) => {
      exitCode = code;
    },
    sleeper: async () => {},
  };
}

async function run(...args: string[]): Promise<string[]> {
  out = [];
  await createProgram(io()).parseAsync(args, { from: "user" });
  return out;
}

async function write(rel: string, text: string) {
  const abs = path.join(base, rel);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, text);
  await fs.utimes(abs, T, T);
}

beforeEach(async () => {
  base = await fs.mkdtemp(path.join(os.tmpdir(), "offsite-cli-"));
  store = `memory://cli-${(stores += 1)}`;
  out = [];
  logs = [];
  exitCode = undefined;
  await fs.writeFile(path.join(base, "offsite.config.json"), '{"logLevel": "warn"}');
  await write("src/a.txt", "1");
  await write("src/b.txt", "2");
});

afterEach(async () => {
  MemoryDataStore.forget(store.slice("memory://".length));
  await fs.rm(base, { recursive: true, force: true });
});

describe("offsite CLI", () => {
  it("backs up, lists, verifies and restores", async () => {
    expect(await run("backup", "home", "src", store)).toEqual([
      "committed change-set 0 (full): 2 added, 0 modified, 0 removed, 2 uploaded",
    ]);
    expect(await run("backup", "home", "src", store)).toEqual(["no changes since change-set 0"]);

    const listed = await run("list", "home", store);
    expect(listed).toHaveLength(1);
    expect(listed[0]).toMatch(/^0\t\d{4}-\d\d-\d\dT[\d:.]+Z\tfull\t\+2 ~0 -0$/);

    expect(await run("verify", "home", store)).toEqual([
      "change-sets 0..0: 1 change-sets, 2 files, 0 missing",
    ]);

    expect(await run("restore", "home", store, "out")).toEqual([
      `restored change-set 0 (base 0) into ${path.join(base, "out")}: 2 written, 0 removed, 0 unchanged`,
    ]);
    expect(await fs.readFile(path.join(base, "out", "a.txt"), "utf-8")).toBe("1");
    expect(exitCode).toBeUndefined();
  });

  it("restores files under substituted paths", async () => {
    await run("backup", "home", "src", store);

    expect(await run("restore", "home", store, "out", "-s", "a.txt=kept/a.txt", "--dry-run")).toEqual([
      "add b.txt",
      "add kept",
      "add kept/a.txt",
      "dry run: 3 operations to restore change-set 0",
    ]);

    await run("restore", "home", store, "out", "--substitute", "a.txt=../a.txt");
    expect(exitCode).toBe(1);
    expect(logs.at(-1)).toMatch(/ ERROR /);
  });

  it("prints the plan of a dry run with its conflicts", async () => {
    await run("backup", "home", "src", store);
    await write("out/a.txt", "local");

    expect(await run("restore", "home", store, "out", "--dry-run")).toEqual([
      "modify a.txt",
      "add b.txt",
      "conflict a.txt",
      "dry run: 2 operations to restore change-set 0",
    ]);
    expect(await fs.readFile(path.join(base, "out", "a.txt"), "utf-8")).toBe("local");
  });

  it("logs failures and sets exit code 1", async () => {
    expect(await run("list", "work", store)).toEqual([]);
    expect(exitCode).toBe(1);
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatch(/ ERROR No change-sets were found for backup "work" \{"error":"BackupNotFoundError"\}$/);
  });

  it("mirrors one directory into another", async () => {
    expect(await run("mirror", "src", "copy")).toEqual([
      "mirrored 2 changes: 2 written, 0 directories, 0 removed, 0 unchanged",
    ]);
    expect(await fs.readFile(path.join(base, "copy", "b.txt"), "utf-8")).toBe("2");
  });

  it("validates and cleans a mirrored directory", async () => {
    await run("mirror", "src", "copy");
    const copy = path.join(base, "copy");

    expect(await run("mirror-validate", "copy")).toEqual([`${copy} matches the last mirror run`]);

    await write("copy/a.txt", "edited");
    await write("copy/.b.txt.offsite-tmp-1", "partial");
    expect(await run("mirror-validate", "copy", "--complete")).toEqual([
      "modified a.txt",
      `1 differences in ${copy}`,
    ]);
    expect(exitCode).toBe(1);

    expect(await run("mirror-cleanup", "copy")).toEqual(["removed .b.txt.offsite-tmp-1", "cleaned 1 leftovers"]);
  });
});

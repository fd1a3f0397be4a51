import { describe, it, expect } from "vitest";
import type { ChangeOperation, ChangeSetDraft, Entry } from "@offsite/core-domain";

import { fingerprintBytes } from "./fingerprint";
import { applyChangeSet, foldChain, planOperations, sameContent, substitutePaths } from "./replay";

type Step = Pick<ChangeSetDraft, "parent" | "operations">;

function file(path: string, text: string, mtimeMs = 1000): Entry {
  return { path, type: "file", fingerprint: fingerprintBytes(text), size: Buffer.byteLength(text), mtimeMs };
}

function dir(path: string): Entry {
  return { path, type: "directory", fingerprint: null, size: 0, mtimeMs: 0 };
}

const cs0: Step = { parent: null, operations: [{ op: "add", entry: file("a.txt", "1") }] };
const cs1: Step = {
  parent: 0,
  operations: [
    { op: "modify", entry: file("a.txt", "2"), previousFingerprint: fingerprintBytes("1") },
    { op: "add", entry: file("b.txt", "b") },
  ],
};
const cs2: Step = {
  parent: 1,
  operations: [{ op: "remove", path: "a.txt", type: "file", previousFingerprint: fingerprintBytes("2") }],
};

describe("foldChain", () => {
  it("replays adds and modifies up to a sequence", () => {
    const state = foldChain([cs0, cs1]);
    expect([...state.keys()]).toEqual(["a.txt", "b.txt"]);
    expect(state.get("a.txt")?.fingerprint).toBe(fingerprintBytes("2"));
    expect(state.get("b.txt")?.fingerprint).toBe(fingerprintBytes("b"));
  });

  it("drops removed entries", () => {
    const state = foldChain([cs0, cs1, cs2]);
    expect([...state.keys()]).toEqual(["b.txt"]);
  });

  it("gives the same state when a change-set is applied twice", () => {
    const once = foldChain([cs0, cs1, cs2]);
    const twice = applyChangeSet(once, cs2);
    expect(twice).toEqual(once);
    expect(applyChangeSet(applyChangeSet(foldChain([cs0]), cs1), cs1)).toEqual(foldChain([cs0, cs1]));
  });

  it("starts over at a full snapshot", () => {
    const full: Step = { parent: null, operations: [{ op: "add", entry: file("c.txt", "c") }] };
    expect([...foldChain([cs0, cs1, full]).keys()]).toEqual(["c.txt"]);
  });

  it("ignores removes of paths that are not there", () => {
    const state = applyChangeSet(foldChain([cs0]), {
      parent: 0,
      operations: [{ op: "remove", path: "ghost", type: "file", previousFingerprint: null }],
    });
    expect([...state.keys()]).toEqual(["a.txt"]);
  });
});

describe("planOperations", () => {
  it("orders removals deepest first, directories parents first", () => {
    const removal = (path: string, type: Entry["type"]): ChangeOperation => ({
      op: "remove",
      path,
      type,
      previousFingerprint: null,
    });
    const plan = planOperations([
      removal("a", "directory"),
      { op: "add", entry: file("x/y.txt", "y") },
      removal("a/b", "directory"),
      { op: "add", entry: dir("x/z") },
      removal("a/b/c.txt", "file"),
      { op: "add", entry: dir("x") },
      removal("z.txt", "file"),
      { op: "add", entry: file("m.txt", "m") },
    ]);

    expect(plan.removals.map((r) => r.path)).toEqual(["z.txt", "a/b/c.txt", "a/b", "a"]);
    expect(plan.directories.map((d) => d.path)).toEqual(["x", "x/z"]);
    expect(plan.writes.map((w) => w.path)).toEqual(["m.txt", "x/y.txt"]);
  });
});

describe("sameContent", () => {
  it("compares type, fingerprint and link target only", () => {
    expect(sameContent(file("a", "1", 1000), file("a", "1", 2000))).toBe(true);
    expect(sameContent(file("a", "1"), file("a", "2"))).toBe(false);
    expect(sameContent(dir("a"), { ...dir("a"), mtimeMs: 5 })).toBe(true);
    expect(sameContent(file("a", "1"), { ...file("a", "1"), type: "symlink", linkTarget: "1" })).toBe(false);
  });
});

describe("substitutePaths", () => {
  const state = new Map<string, Entry>([
    ["docs", dir("docs")],
    ["docs/a.md", file("docs/a.md", "a")],
    ["docs2/b.md", file("docs2/b.md", "b")],
    ["top.txt", file("top.txt", "t")],
  ]);

  it("moves entries below a prefix and adds the parents they lack", () => {
    const moved = substitutePaths(state, [{ from: "docs", to: "archive/2024/docs" }]);

    expect([...moved.keys()].sort()).toEqual([
      "archive",
      "archive/2024",
      "archive/2024/docs",
      "archive/2024/docs/a.md",
      "docs2/b.md",
      "docs2",
      "top.txt",
    ].sort());
    expect(moved.get("archive/2024/docs/a.md")).toEqual({ ...file("docs/a.md", "a"), path: "archive/2024/docs/a.md" });
    expect(moved.get("archive")).toEqual(dir("archive"));
  });

  it("uses the first substitution that matches", () => {
    const moved = substitutePaths(state, [
      { from: "docs/a.md", to: "first.md" },
      { from: "docs", to: "second" },
    ]);
    expect(moved.has("first.md")).toBe(true);
    expect(moved.has("second/a.md")).toBe(false);
    expect(moved.has("second")).toBe(true);
  });

  it("refuses to restore two entries at one path", () => {
    expect(() => substitutePaths(state, [{ from: "top.txt", to: "docs/a.md" }])).toThrow(
      'Restoring "top.txt" as "docs/a.md" collides with another restored entry'
    );
  });

  it("returns the state untouched without substitutions", () => {
    expect(substitutePaths(state, [])).toBe(state);
  });
});


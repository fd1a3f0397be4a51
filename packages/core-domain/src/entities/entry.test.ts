import { describe, it, expect } from "vitest";
import { comparePaths, parentPath, sameEntry, type Entry } from "./entry";
import { fileFingerprints, manifestFromEntries, sortedEntries } from "./manifest";

const file = (path: string, fingerprint: string): Entry => ({
  path,
  type: "file",
  fingerprint,
  size: 1,
  mtimeMs: 1000,
});

describe("entry", () => {
  it("orders paths by code unit so a parent sorts before its children", () => {
    const paths = ["b", "a/b", "a-b", "a", "B"];
    expect([...paths].sort(comparePaths)).toEqual(["B", "a", "a-b", "a/b", "b"]);
  });

  it("returns the parent path or null at the top level", () => {
    expect(parentPath("docs/notes/a.md")).toBe("docs/notes");
    expect(parentPath("a.md")).toBeNull();
  });

  it("treats entries as the same only when every field matches", () => {
    expect(sameEntry(file("a", "h1"), file("a", "h1"))).toBe(true);
    expect(sameEntry(file("a", "h1"), { ...file("a", "h1"), mtimeMs: 2000 })).toBe(false);
    expect(sameEntry(file("a", "h1"), file("a", "h2"))).toBe(false);
  });
});

describe("manifest", () => {
  it("lists entries sorted by path and collects file fingerprints", () => {
    const manifest = manifestFromEntries([
      file("z.txt", "h1"),
      { path: "dir", type: "directory", fingerprint: null, size: 0, mtimeMs: 0 },
      file("dir/a.txt", "h1"),
      file("b.txt", "h2"),
    ]);

    expect(sortedEntries(manifest).map((e) => e.path)).toEqual(["b.txt", "dir", "dir/a.txt", "z.txt"]);
    expect([...fileFingerprints(manifest)].sort()).toEqual(["h1", "h2"]);
  });
});

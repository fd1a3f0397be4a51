import { describe, it, expect } from "vitest";
import { compilePatterns, createPathFilter, createWatchIgnore } from "./path-filter";

describe("path-filter", () => {
  it("always skips the engine's own temporary files", () => {
    const filter = createPathFilter();
    expect(filter("a.txt", "file")).toBe(true);
    expect(filter("dir/.a.txt.offsite-tmp-123", "file")).toBe(false);
  });

  it("applies excludes to directories and files", () => {
    const filter = createPathFilter({ excludes: compilePatterns(["^node_modules(/|$)", "\\.log$"]) });
    expect(filter("node_modules", "directory")).toBe(false);
    expect(filter("src/app.log", "file")).toBe(false);
    expect(filter("src/app.ts", "file")).toBe(true);
  });

  it("applies includes to files only so matching files stay reachable", () => {
    const filter = createPathFilter({ includes: compilePatterns(["\\.md$"]) });
    expect(filter("notes", "directory")).toBe(true);
    expect(filter("notes/a.md", "file")).toBe(true);
    expect(filter("notes/a.txt", "file")).toBe(false);
  });

  it("maps absolute watcher paths onto the filter", () => {
    const ignore = createWatchIgnore(
      "/data/src",
      createPathFilter({ excludes: compilePatterns(["^node_modules(/|$)"]) })
    );
    expect(ignore("/data/src")).toBe(false);
    expect(ignore("/data/src/a.txt")).toBe(false);
    expect(ignore("/data/src/node_modules")).toBe(true);
    expect(ignore("/data/src/x/.a.offsite-tmp-1")).toBe(true);
    expect(ignore("/data/other")).toBe(true);
  });
});

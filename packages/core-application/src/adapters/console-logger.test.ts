import { describe, it, expect } from "vitest";

import { ConsoleLogger } from "./console-logger";

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    sink: { log: (line: string) => out.push(line), error: (line: string) => err.push(line) },
  };
}

const at = () => new Date("2024-01-01T00:00:00.000Z");

describe("ConsoleLogger", () => {
  it("writes one line per record with its fields", () => {
    const { out, sink } = capture();
    new ConsoleLogger("info", sink, at).info("hello", { a: 1 });
    expect(out).toEqual(['2024-01-01T00:00:00.000Z INFO  hello {"a":1}']);
  });

  it("drops records below the configured level", () => {
    const { out, err, sink } = capture();
    const logger = new ConsoleLogger("warn", sink, at);
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e", {});
    expect(out).toEqual([]);
    expect(err).toEqual([
      "2024-01-01T00:00:00.000Z WARN  w",
      "2024-01-01T00:00:00.000Z ERROR e",
    ]);
  });
});

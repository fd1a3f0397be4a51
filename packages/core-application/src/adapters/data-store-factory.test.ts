import { describe, it, expect } from "vitest";

import { parseDestination } from "../application/destination";
import { ConfigError } from "../application/errors";
import { DataStoreFactory } from "./data-store-factory";
import { MemoryDataStore } from "./memory-data-store";

describe("DataStoreFactory", () => {
  const factory = new DataStoreFactory({ timeoutMs: 1000, stateDir: "/tmp/offsite-state" });

  it("opens registered schemes behind a timeout", async () => {
    const store = await factory.open(parseDestination("memory://factory-test"));
    expect(store.description).toBe("memory://factory-test");
    MemoryDataStore.forget("factory-test");
  });

  it("needs a password or key file before connecting over sftp", async () => {
    await expect(factory.open(parseDestination("sftp://alice@example.org/srv/backups"))).rejects.toThrow(ConfigError);
  });
});

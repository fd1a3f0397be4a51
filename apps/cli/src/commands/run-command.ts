import type { Command } from "commander";
import { ConsoleLogger, describeError, type DataStore } from "@offsite/core-application";

import { createContext, openStore, type CliContext, type CliIo } from "../context";

/**
 * Builds the context from the global options and runs `body`. Any failure is
 * logged and turns into exit code 1.
 */
export async function runCommand(
  io: CliIo,
  command: Command,
  body: (ctx: CliContext) => Promise<void>
): Promise<void> {
  let ctx: CliContext | null = null;
  try {
    ctx = createContext(io, command.optsWithGlobals());
    await body(ctx);
  } catch (err) {
    const logger = ctx?.logger ?? new ConsoleLogger("error", io.logSink);
    logger.error(describeError(err), { error: err instanceof Error ? err.name : typeof err });
    io.setExitCode(1);
  }
}

export async function withStore<T>(
  ctx: CliContext,
  destination: string,
  fn: (store: DataStore) => Promise<T>
): Promise<T> {
  const store = await openStore(ctx, destination);
  try {
    return await fn(store);
  } finally {
    await store.close?.();
  }
}

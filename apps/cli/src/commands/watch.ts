import path from "path";
import type { Command } from "commander";
import { z } from "zod";
import {
  ChokidarFileWatcher,
  DEFAULT_QUIET_PERIOD_MS,
  NodeSourceTree,
  WatchService,
} from "@offsite/core-application";

import { createBackupService, pathFilter, type CliIo } from "../context";
import { runCommand, withStore } from "./run-command";

const WatchOptionsSchema = z.object({
  quietPeriod: z.coerce.number().int().nonnegative().default(DEFAULT_QUIET_PERIOD_MS),
});

function untilSignal(): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      process.off("SIGINT", done);
      process.off("SIGTERM", done);
      resolve();
    };
    process.once("SIGINT", done);
    process.once("SIGTERM", done);
  });
}

/**
 * Register the 'watch' command with commander
 */
export const registerWatchCommand = (args: {
  program: Command;
  io: CliIo;
  waitForStop?: () => Promise<void>;
}): void => {
  const { program, io } = args;
  const waitForStop = args.waitForStop ?? untilSignal;

  program
    .command("watch")
    .description("Back up <source> whenever it has been quiet for a while after a change")
    .argument("<name>", "backup name")
    .argument("<source>", "directory to watch")
    .argument("<destination>", "data store")
    .option("-q, --quiet-period <ms>", "wait this long after the last change")
    .action(async (name: string, source: string, destination: string, _opts: unknown, command: Command) => {
      await runCommand(io, command, async (ctx) => {
        const opts = WatchOptionsSchema.parse(command.opts());
        const sourceRoot = path.resolve(io.cwd, source);
        const filter = pathFilter(ctx);

        await withStore(ctx, destination, async (store) => {
          const backups = createBackupService(ctx, store);
          const watch = new WatchService({
            watcher: new ChokidarFileWatcher(),
            logger: ctx.logger,
            quietPeriodMs: opts.quietPeriod,
            runBackup: async () => {
              const summary = await backups.run({
                backupName: name,
                source: new NodeSourceTree(sourceRoot),
                filter,
              });
              io.out(
                summary.status === "committed"
                  ? `committed change-set ${summary.sequence}`
                  : `no changes since change-set ${summary.sequence}`
              );
            },
          });

          await watch.start(sourceRoot, filter);
          await watch.trigger();
          await waitForStop();
          await watch.stop();
          io.out(`stopped after ${watch.completedRuns} runs`);
        });
      });
    });
};

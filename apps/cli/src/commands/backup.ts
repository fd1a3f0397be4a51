import path from "path";
import type { Command } from "commander";
import { z } from "zod";
import { NodeSourceTree } from "@offsite/core-application";

import { createBackupService, pathFilter, type CliIo } from "../context";
import { runCommand, withStore } from "./run-command";

const BackupOptionsSchema = z.object({
  force: z.boolean().optional(),
  include: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
  alwaysFingerprint: z.boolean().optional(),
});

/**
 * Register the 'backup' command with commander
 */
export const registerBackupCommand = (args: { program: Command; io: CliIo }): void => {
  const { program, io } = args;

  program
    .command("backup")
    .description("Record the changes in <source> as a new change-set of backup <name>")
    .argument("<name>", "backup name")
    .argument("<source>", "directory to back up")
    .argument("<destination>", "data store (path, memory://, gdrive://)")
    .option("-f, --force", "take a full snapshot instead of an incremental one")
    .option("-i, --include <regex...>", "only back up files whose path matches")
    .option("-e, --exclude <regex...>", "skip paths that match")
    .option("--always-fingerprint", "hash every file even when size and mtime match")
    .action(async (name: string, source: string, destination: string, _opts: unknown, command: Command) => {
      await runCommand(io, command, async (ctx) => {
        const opts = BackupOptionsSchema.parse(command.opts());
        const filter = pathFilter(ctx, { includes: opts.include, excludes: opts.exclude });

        await withStore(ctx, destination, async (store) => {
          const summary = await createBackupService(ctx, store).run({
            backupName: name,
            source: new NodeSourceTree(path.resolve(io.cwd, source)),
            force: opts.force,
            filter,
            alwaysFingerprint: opts.alwaysFingerprint,
          });

          if (summary.status === "unchanged") {
            io.out(`no changes since change-set ${summary.sequence}`);
          } else {
            const kind = summary.parent === null ? "full" : "incremental";
            const { add, modify, remove } = summary.counts;
            io.out(
              `committed change-set ${summary.sequence} (${kind}): ` +
                `${add} added, ${modify} modified, ${remove} removed, ${summary.uploaded} uploaded`
            );
          }
          if (summary.issues.length > 0) {
            io.out(`${summary.issues.length} entries skipped`);
          }
        });
      });
    });
};

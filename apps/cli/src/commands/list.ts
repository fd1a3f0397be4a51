import type { Command } from "commander";
import { countOperations } from "@offsite/core-domain";
import { BackupNotFoundError } from "@offsite/core-application";

import { backupParts, type CliIo } from "../context";
import { runCommand, withStore } from "./run-command";

/**
 * Register the 'list' command with commander
 */
export const registerListCommand = (args: { program: Command; io: CliIo }): void => {
  const { program, io } = args;

  program
    .command("list")
    .description("List the change-sets of backup <name>")
    .argument("<name>", "backup name")
    .argument("<destination>", "data store holding the backup")
    .action(async (name: string, destination: string, _opts: unknown, command: Command) => {
      await runCommand(io, command, async (ctx) => {
        await withStore(ctx, destination, async (store) => {
          const { changeSets } = backupParts(ctx, store, name);
          const refs = await changeSets.list();
          if (refs.length === 0) throw new BackupNotFoundError(name);

          for (const ref of refs) {
            const changeSet = await changeSets.read(ref);
            const { add, modify, remove } = countOperations(changeSet.operations);
            const kind = changeSet.parent === null ? "full" : `parent ${changeSet.parent}`;
            io.out(`${ref.sequence}\t${changeSet.createdAtIso}\t${kind}\t+${add} ~${modify} -${remove}`);
          }
        });
      });
    });
};

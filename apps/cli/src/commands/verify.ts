import type { Command } from "commander";
import { z } from "zod";
import { VerifyService } from "@offsite/core-application";

import { backupParts, type CliIo } from "../context";
import { SequenceOptionSchema } from "./restore";
import { runCommand, withStore } from "./run-command";

const VerifyOptionsSchema = z.object({ upTo: SequenceOptionSchema });

/**
 * Register the 'verify' command with commander
 */
export const registerVerifyCommand = (args: { program: Command; io: CliIo }): void => {
  const { program, io } = args;

  program
    .command("verify")
    .description("Check that backup <name> can be restored")
    .argument("<name>", "backup name")
    .argument("<destination>", "data store holding the backup")
    .option("-u, --up-to <sequence>", "verify the state as of this change-set")
    .action(async (name: string, destination: string, _opts: unknown, command: Command) => {
      await runCommand(io, command, async (ctx) => {
        const opts = VerifyOptionsSchema.parse(command.opts());

        await withStore(ctx, destination, async (store) => {
          const { engine, content } = backupParts(ctx, store, name);
          const verifier = new VerifyService({
            engine,
            content,
            logger: ctx.logger,
            concurrency: ctx.config.concurrency,
          });
          const report = await verifier.verify(opts.upTo);

          for (const fp of report.missingContent) io.out(`missing ${fp}`);
          io.out(
            `change-sets ${report.base}..${report.sequence}: ${report.changeSets} change-sets, ` +
              `${report.files} files, ${report.missingContent.length} missing`
          );
          if (report.missingContent.length > 0) io.setExitCode(1);
        });
      });
    });
};

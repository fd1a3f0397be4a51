import path from "path";
import type { Command } from "commander";
import { z } from "zod";
import { NodeDestinationWriter, NodeSourceTree } from "@offsite/core-application";

import { createMirrorService, pathFilter, type CliIo } from "../context";
import { runCommand } from "./run-command";

const ValidateOptionsSchema = z.object({ complete: z.boolean().default(false) });

/**
 * Register the 'mirror', 'mirror-validate' and 'mirror-cleanup' commands with commander
 */
export const registerMirrorCommand = (args: { program: Command; io: CliIo }): void => {
  const { program, io } = args;

  program
    .command("mirror")
    .description("Make <target> an exact copy of <source> (no history)")
    .argument("<source>", "directory to copy")
    .argument("<target>", "directory to keep in step")
    .action(async (source: string, target: string, _opts: unknown, command: Command) => {
      await runCommand(io, command, async (ctx) => {
        const destination = new NodeDestinationWriter(path.resolve(io.cwd, target));
        const summary = await createMirrorService(ctx, destination.root).run({
          source: new NodeSourceTree(path.resolve(io.cwd, source)),
          destination,
          filter: pathFilter(ctx),
        });

        const { written, removed, directories, unchanged } = summary.applied;
        io.out(
          `mirrored ${summary.counts.add + summary.counts.modify + summary.counts.remove} changes: ` +
            `${written} written, ${directories} directories, ${removed} removed, ${unchanged} unchanged`
        );
      });
    });

  program
    .command("mirror-validate")
    .description("Compare <target> with what the last mirror run left there")
    .argument("<target>", "mirrored directory")
    .option("--complete", "read every file instead of trusting size and mtime")
    .action(async (target: string, _opts: unknown, command: Command) => {
      await runCommand(io, command, async (ctx) => {
        const opts = ValidateOptionsSchema.parse(command.opts());
        const destination = new NodeDestinationWriter(path.resolve(io.cwd, target));
        const differences = await createMirrorService(ctx, destination.root).validate(
          destination,
          opts.complete ? "complete" : "standard"
        );

        for (const d of differences) io.out(`${d.kind} ${d.path}`);
        if (differences.length === 0) {
          io.out(`${destination.root} matches the last mirror run`);
        } else {
          io.out(`${differences.length} differences in ${destination.root}`);
          io.setExitCode(1);
        }
      });
    });

  program
    .command("mirror-cleanup")
    .description("Remove what an interrupted mirror run left in <target>")
    .argument("<target>", "mirrored directory")
    .action(async (target: string, _opts: unknown, command: Command) => {
      await runCommand(io, command, async (ctx) => {
        const destination = new NodeDestinationWriter(path.resolve(io.cwd, target));
        const removed = await createMirrorService(ctx, destination.root).cleanup(destination);

        for (const p of removed) io.out(`removed ${p}`);
        io.out(`cleaned ${removed.length} leftovers`);
      });
    });
};

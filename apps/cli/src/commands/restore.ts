import path from "path";
import type { Command } from "commander";
import { z } from "zod";
import { operationPath } from "@offsite/core-domain";
import { EntryPathSchema, NodeDestinationWriter } from "@offsite/core-application";

import { backupParts, type CliIo } from "../context";
import { runCommand, withStore } from "./run-command";

export const SequenceOptionSchema = z.coerce.number().int().nonnegative().optional();

const SubstitutionSchema = z
  .string()
  .regex(/^[^=]+=[^=]+$/, "expected <from>=<to>")
  .transform((text) => {
    const [from = "", to = ""] = text.split("=");
    return { from, to };
  })
  .pipe(z.object({ from: EntryPathSchema, to: EntryPathSchema }));

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const RestoreOptionsSchema = z.object({
  upTo: SequenceOptionSchema,
  substitute: z.array(SubstitutionSchema).default([]),
  overwrite: z.boolean().optional(),
  prune: z.boolean().optional(),
  dryRun: z.boolean().optional(),
});

/**
 * Register the 'restore' command with commander
 */
export const registerRestoreCommand = (args: { program: Command; io: CliIo }): void => {
  const { program, io } = args;

  program
    .command("restore")
    .description("Rebuild backup <name> into the directory <target>")
    .argument("<name>", "backup name")
    .argument("<destination>", "data store holding the backup")
    .argument("<target>", "directory to restore into")
    .option("-u, --up-to <sequence>", "restore the state as of this change-set")
    .option("--overwrite", "replace existing files that differ from the backup")
    .option("--prune", "delete files in <target> that are not in the backup")
    .option("-n, --dry-run", "print the plan without touching <target>")
    .option("-s, --substitute <from=to>", "restore <from> and what is below it as <to> (repeatable)", collect, [])
    .action(async (name: string, destination: string, target: string, _opts: unknown, command: Command) => {
      await runCommand(io, command, async (ctx) => {
        const opts = RestoreOptionsSchema.parse(command.opts());

        await withStore(ctx, destination, async (store) => {
          const { engine } = backupParts(ctx, store, name);
          const writer = new NodeDestinationWriter(path.resolve(io.cwd, target));
          const result = await engine.restoreTo(writer, {
            upTo: opts.upTo,
            overwrite: opts.overwrite,
            prune: opts.prune,
            dryRun: opts.dryRun,
            substitutions: opts.substitute,
            concurrency: ctx.config.concurrency,
          });

          if (!result.applied) {
            for (const operation of result.operations) {
              io.out(`${operation.op} ${operationPath(operation)}`);
            }
            for (const conflict of result.conflicts) io.out(`conflict ${conflict}`);
            io.out(
              `dry run: ${result.operations.length} operations to restore change-set ${result.sequence}`
            );
            return;
          }

          const { written, removed, unchanged } = result.applied;
          io.out(
            `restored change-set ${result.sequence} (base ${result.base}) into ${writer.root}: ` +
              `${written} written, ${removed} removed, ${unchanged} unchanged`
          );
        });
      });
    });
};

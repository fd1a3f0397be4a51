import { Command } from "commander";

import type { CliIo } from "./context";
import { registerBackupCommand } from "./commands/backup";
import { registerListCommand } from "./commands/list";
import { registerMirrorCommand } from "./commands/mirror";
import { registerRestoreCommand } from "./commands/restore";
import { registerVerifyCommand } from "./commands/verify";
import { registerWatchCommand } from "./commands/watch";

export const VERSION = "0.1.0";

export function createProgram(io: CliIo): Command {
  const program = new Command();

  program
    .name("offsite")
    .version(VERSION)
    .description("Incremental backups replayed from a chain of change-sets")
    .option("-c, --config <file>", "config file (default: nearest offsite.config.json)")
    .option("--concurrency <n>", "parallel hashing, uploads and writes")
    .option("--timeout <ms>", "data store call timeout, 0 for none")
    .option("-v, --verbose", "log debug output")
    .addHelpText(
      "after",
      `
Examples:
  $ offsite backup home ~/documents /mnt/backups
  $ offsite backup home ~/documents gdrive://backups?credentials=client.json
  $ offsite list home /mnt/backups
  $ offsite restore home /mnt/backups ./restored --up-to 3
  $ offsite mirror ~/photos /mnt/photos-copy
  $ offsite mirror-validate /mnt/photos-copy --complete
`
    );

  registerBackupCommand({ program, io });
  registerRestoreCommand({ program, io });
  registerListCommand({ program, io });
  registerVerifyCommand({ program, io });
  registerMirrorCommand({ program, io });
  registerWatchCommand({ program, io });

  return program;
}

import { createProgram } from "./program";

const program = createProgram({
  cwd: process.cwd(),
  env: process.env,
  out: (line) => console.log(line),
  logSink: console,
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

if (process.argv.length < 3) {
  program.help();
}

await program.parseAsync(process.argv);

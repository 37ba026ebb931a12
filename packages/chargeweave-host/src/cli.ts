import { CommanderError } from "commander";

import { parseRunArgs } from "./cli-args.js";
import { runSimulation } from "./run.js";

async function main() {
  const args = parseRunArgs();
  await runSimulation(args, {
    out: (line) => console.log(line),
    log: (line) => console.error(line),
  });
}

main().catch((err) => {
  // Commander has already printed its own usage errors and help text.
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
    return;
  }
  console.error(err);
  process.exitCode = 1;
});

import { setTimeout as sleep } from "node:timers/promises";
import { fileURLToPath } from "node:url";
import { Type } from "@sinclair/typebox";
import { ArgumentParseError, getSlurmJobId, registerJob, slurmExec } from "../index.js";

// Run with SLURM_EXEC_DEBUG=1 to execute locally instead of submitting.
const countdown = registerJob({
  name: "countdown",
  file: fileURLToPath(import.meta.url),
  parameters: Type.Object({
    start: Type.Integer({ default: 10, description: "Number to count down from" }),
    verbose: Type.Boolean({ default: false }),
  }),
  async run({ start, verbose }, context) {
    console.log(`Starting countdown task with slurm ID: ${getSlurmJobId(context) ?? "unknown"}`);
    for (let ticker = start; ticker > 0; ticker -= 1) {
      if (verbose) {
        console.log(`${ticker}...`);
      }
      await sleep(1000);
    }
    console.log("Done!");
    return start;
  },
});

slurmExec(countdown, {
  options: {
    jobName: "my_countdown_task",
    preRunCommands: ["echo 'Put your commands to execute before this script here'"],
    directives: { time: "0-00:01:00" },
  },
}).catch((error: unknown) => {
  if (error instanceof ArgumentParseError) {
    if (error.exitCode !== 0) {
      console.error(error.message);
    }
    process.exitCode = error.exitCode;
    return;
  }
  console.error(error);
  process.exitCode = 1;
});

import { setTimeout as sleep } from "node:timers/promises";
import { Type } from "@sinclair/typebox";
import { Command } from "commander";
import { getSlurmJobId, registerJob, slurmExec } from "../index.js";

const countdown = registerJob({
  name: "countdown",
  parameters: Type.Object({ start: Type.Integer() }),
  async run({ start }, context) {
    console.log(`Starting countdown task with slurm ID: ${getSlurmJobId(context) ?? "unknown"}`);
    for (let ticker = start; ticker > 0; ticker -= 1) {
      console.log(`${ticker}...`);
      await sleep(1000);
    }
    console.log("Done!");
  },
});

const parser = new Command("countdown")
  .description("Countdown task")
  .option("--start <n>", "Number to start counting down from", (text: string) => Number.parseInt(text, 10), 10);

slurmExec(countdown, {
  parser,
  options: {
    jobName: "my_countdown_task",
    directives: { "--time": "0-00:01:00" },
  },
}).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});

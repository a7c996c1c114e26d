import { describe, expect, it } from "vitest";
import { parseJobOptions } from "./config.js";

describe("slurm-exec options", () => {
  it("returns defaults for empty options", () => {
    const opts = parseJobOptions(undefined);
    expect(opts.jobName).toBeUndefined();
    expect(opts.scriptDir).toBeUndefined();
    expect(opts.parallelJobs).toBe(1);
    expect(opts.directives).toEqual({});
    expect(opts.preRunCommands).toEqual([]);
    expect(opts.postRunCommands).toEqual([]);
    expect(opts.loginShell).toBe(true);
    expect(opts.submitCommand).toBe("sbatch");
    expect(opts.submitArgs).toEqual([]);
  });

  it("parses a full options object", () => {
    const opts = parseJobOptions({
      jobName: " train ",
      scriptDir: "~/jobs/train",
      parallelJobs: 4,
      directives: { time: "01:00:00", "--mem": "4G", "-p": "gpu", ntasks: 2 },
      preRunCommands: ["conda activate ml", "  "],
      postRunCommands: ["echo finished"],
      launcher: "srun",
      loginShell: false,
      submitArgs: ["--parsable"],
    });

    expect(opts.jobName).toBe("train");
    expect(opts.scriptDir).toBe("~/jobs/train");
    expect(opts.parallelJobs).toBe(4);
    expect(opts.directives).toEqual({
      "--time": "01:00:00",
      "--mem": "4G",
      "-p": "gpu",
      "--ntasks": "2",
    });
    expect(opts.preRunCommands).toEqual(["conda activate ml"]);
    expect(opts.postRunCommands).toEqual(["echo finished"]);
    expect(opts.launcher).toBe("srun");
    expect(opts.loginShell).toBe(false);
    expect(opts.submitArgs).toEqual(["--parsable"]);
  });

  it("rejects a non-positive parallel job count", () => {
    expect(() => parseJobOptions({ parallelJobs: 0 })).toThrow(/parallelJobs must be a positive number/);
  });

  it("rejects directive values that are neither strings nor numbers", () => {
    expect(() => parseJobOptions({ directives: { exclusive: true } })).toThrow(
      /directives\.exclusive must be a string or number/,
    );
  });

  it("rejects non-object options", () => {
    expect(() => parseJobOptions(["sbatch"])).toThrow(/must be an object/);
  });

  it("rejects non-string command entries", () => {
    expect(() => parseJobOptions({ preRunCommands: ["ok", 3] })).toThrow(
      /preRunCommands\[1\] must be a string/,
    );
  });
});

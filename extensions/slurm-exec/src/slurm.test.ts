import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  buildJobDescription,
  parseSubmitAcknowledgment,
  renderJobScript,
  resolveLogPath,
  submitJobScript,
} from "./slurm.js";
import type { CommandRunner } from "./types.js";

const tmpDirs: string[] = [];

afterEach(async () => {
  await Promise.all(
    tmpDirs.splice(0).map(async (dir) => {
      await fs.rm(dir, { recursive: true, force: true });
    }),
  );
});

function countdownDescription(overrides: { parallelJobs?: number; scriptDir?: string } = {}) {
  return buildJobDescription({
    jobName: "countdown",
    displayName: "countdown() in /work/countdown.ts",
    scriptDir: overrides.scriptDir ?? "/home/user/slurm/countdown",
    parallelJobs: overrides.parallelJobs ?? 1,
    entry: ["node", "/work/countdown.js"],
    args: ["--start", "5", "--label", "two words"],
    directives: { time: "0-00:01:00" },
    preRunCommands: ["module load nodejs"],
    postRunCommands: ["echo done"],
  });
}

describe("job description", () => {
  it("adds an array range for parallel jobs", () => {
    const description = countdownDescription({ parallelJobs: 3 });
    expect(description.arrayTask).toBe(true);
    expect(description.directives["--array"]).toBe("1-3");
    expect(description.output).toBe("/home/user/slurm/countdown/%A_%a.out");
  });

  it("builds a single job by default", () => {
    const description = countdownDescription();
    expect(description.arrayTask).toBe(false);
    expect(description.directives).toEqual({
      "--job-name": "countdown",
      "--output": "/home/user/slurm/countdown/%j.out",
      "--error": "/home/user/slurm/countdown/%j.out",
      "--time": "0-00:01:00",
    });
    expect(description.scriptPath).toBe("/home/user/slurm/countdown/_slurm_script.sh");
    expect(description.command).toBe("node /work/countdown.js --start 5 --label 'two words'");
  });

  it("lets command-line overrides replace configured directives", () => {
    const description = buildJobDescription({
      jobName: "countdown",
      scriptDir: "/tmp/jobs",
      parallelJobs: 1,
      entry: ["node", "main.js"],
      args: [],
      directives: { time: "1:00", "--output": "/tmp/custom.log" },
      directiveOverrides: { "--time": "2:00", "-p": "gpu" },
    });
    expect(description.directives["--time"]).toBe("2:00");
    expect(description.directives["-p"]).toBe("gpu");
    expect(description.output).toBe("/tmp/custom.log");
    expect(description.error).toBe("/tmp/jobs/%j.out");
  });

  it("prefixes the invocation with a parallel launcher", () => {
    const description = buildJobDescription({
      jobName: "sweep",
      scriptDir: "/tmp/jobs",
      parallelJobs: 1,
      entry: ["node", "sweep.js"],
      args: ["--lr", "0.1"],
      launcher: "srun --ntasks=4",
    });
    expect(description.command).toBe("srun --ntasks=4 node sweep.js --lr 0.1");
  });

  it("rejects an invalid parallel job count", () => {
    expect(() =>
      buildJobDescription({
        jobName: "sweep",
        scriptDir: "/tmp/jobs",
        parallelJobs: 0,
        entry: ["node"],
        args: [],
      }),
    ).toThrow(/parallelJobs must be a positive integer/);
  });
});

describe("script rendering", () => {
  it("renders directives, diagnostics, and commands in order", () => {
    const script = renderJobScript(countdownDescription());
    expect(script).toBe(
      [
        "#!/bin/bash -l",
        "#",
        '# Generated by slurm-exec for job "countdown".',
        "#",
        "#SBATCH --job-name=countdown",
        "#SBATCH --output=/home/user/slurm/countdown/%j.out",
        "#SBATCH --error=/home/user/slurm/countdown/%j.out",
        "#SBATCH --time=0-00:01:00",
        "",
        `echo '# Executing job "countdown" (countdown() in /work/countdown.ts).'`,
        'echo "# Slurm job name: $SLURM_JOB_NAME"',
        'echo "# Slurm node: $SLURM_JOB_NODELIST"',
        'echo "# Slurm cluster: $SLURM_CLUSTER_NAME"',
        'echo "# Slurm job id: $SLURM_JOB_ID"',
        'echo "# Job start time: $(date)"',
        "echo",
        "module load nodejs",
        "node /work/countdown.js --start 5 --label 'two words'",
        "echo done",
        "",
        "# End of script",
        "",
      ].join("\n"),
    );
  });

  it("echoes array task diagnostics for array jobs", () => {
    const script = renderJobScript(countdownDescription({ parallelJobs: 3 }));
    expect(script).toContain("#SBATCH --array=1-3\n");
    expect(script).toContain('echo "# Slurm array task id: $SLURM_ARRAY_TASK_ID"\n');
  });

  it("renders short and valueless directives", () => {
    const description = buildJobDescription({
      jobName: "demo",
      scriptDir: "/tmp/jobs",
      parallelJobs: 1,
      entry: ["node", "demo.js"],
      args: [],
      directiveOverrides: { "-p": "gpu", "--exclusive": "" },
      loginShell: false,
    });
    const script = renderJobScript(description);
    expect(script.startsWith("#!/bin/bash\n")).toBe(true);
    expect(script).toContain("#SBATCH -p gpu\n");
    expect(script).toContain("#SBATCH --exclusive\n");
  });

  it("rejects multi-line directive values", () => {
    const description = buildJobDescription({
      jobName: "demo",
      scriptDir: "/tmp/jobs",
      parallelJobs: 1,
      entry: ["node", "demo.js"],
      args: [],
      directiveOverrides: { "--comment": "first\nsecond" },
    });
    expect(() => renderJobScript(description)).toThrow(/must be a single line/);
  });
});

describe("submission acknowledgment", () => {
  it("extracts the job id from sbatch output", () => {
    expect(parseSubmitAcknowledgment("Submitted batch job 4821")).toEqual({
      success: true,
      jobId: "4821",
      output: "Submitted batch job 4821",
    });
  });

  it("accepts warnings before the acknowledgment line", () => {
    const parsed = parseSubmitAcknowledgment(
      "sbatch: warning: partition default used\nSubmitted batch job 77",
    );
    expect(parsed.jobId).toBe("77");
  });

  it("marks other text as unsuccessful and keeps it", () => {
    const output = "sbatch: error: Batch job submission failed: Invalid account";
    expect(parseSubmitAcknowledgment(output)).toEqual({ success: false, output });
  });

  it("substitutes job placeholders in the log path", () => {
    expect(resolveLogPath("/jobs/%x/%j.out", "countdown", "12")).toBe("/jobs/countdown/12.out");
    expect(resolveLogPath("/jobs/%A_%a.out", "countdown", "12")).toBe("/jobs/12_%a.out");
  });
});

describe("submitJobScript", () => {
  async function tempScriptDir() {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "slurm-exec-submit-"));
    tmpDirs.push(dir);
    return path.join(dir, "countdown");
  }

  it("writes the script and reports the assigned job id", async () => {
    const scriptDir = await tempScriptDir();
    const description = countdownDescription({ scriptDir });
    const runner: CommandRunner = vi.fn(async () => ({
      code: 0,
      stdout: "Submitted batch job 4821\n",
      stderr: "",
    }));

    const result = await submitJobScript(description, { runner, submitArgs: ["--hold"] });

    expect(runner).toHaveBeenCalledWith("sbatch", ["--hold", description.scriptPath]);
    expect(result).toEqual({
      success: true,
      output: "Submitted batch job 4821",
      jobId: "4821",
      exitCode: 0,
      scriptPath: description.scriptPath,
      logPath: path.join(scriptDir, "4821.out"),
    });
    const written = await fs.readFile(description.scriptPath, "utf8");
    expect(written).toBe(renderJobScript(description));
  });

  it("truncates an existing script", async () => {
    const scriptDir = await tempScriptDir();
    const description = countdownDescription({ scriptDir });
    await fs.mkdir(scriptDir, { recursive: true });
    await fs.writeFile(description.scriptPath, "x".repeat(10_000), "utf8");
    const runner: CommandRunner = vi.fn(async () => ({
      code: 0,
      stdout: "Submitted batch job 1",
      stderr: "",
    }));

    await submitJobScript(description, { runner });

    expect(await fs.readFile(description.scriptPath, "utf8")).toBe(renderJobScript(description));
  });

  it("reports a failed sbatch exit with its diagnostics", async () => {
    const scriptDir = await tempScriptDir();
    const description = countdownDescription({ scriptDir });
    const runner: CommandRunner = vi.fn(async () => ({
      code: 1,
      stdout: "",
      stderr: "sbatch: error: invalid partition specified: gpu\n",
    }));

    const result = await submitJobScript(description, { runner });

    expect(result).toEqual({
      success: false,
      output: "sbatch: error: invalid partition specified: gpu",
      exitCode: 1,
      scriptPath: description.scriptPath,
    });
  });

  it("reports unparseable output as a failure", async () => {
    const scriptDir = await tempScriptDir();
    const description = countdownDescription({ scriptDir });
    const runner: CommandRunner = vi.fn(async () => ({
      code: 0,
      stdout: "queued somewhere\n",
      stderr: "",
    }));

    const result = await submitJobScript(description, { runner });

    expect(result.success).toBe(false);
    expect(result.jobId).toBeUndefined();
    expect(result.output).toBe("queued somewhere");
  });

  it("reports a submit command that cannot be started", async () => {
    const scriptDir = await tempScriptDir();
    const description = countdownDescription({ scriptDir });
    const runner: CommandRunner = vi.fn(async () => {
      throw new Error("spawn sbatch ENOENT");
    });

    const result = await submitJobScript(description, { runner });

    expect(result).toEqual({
      success: false,
      output: "sbatch failed to start: Error: spawn sbatch ENOENT",
      scriptPath: description.scriptPath,
    });
  });
});

import fs from "node:fs/promises";
import path from "node:path";
import { normalizeDirectiveKey } from "./config.js";
import { ensureDir, SCRIPT_FILE_NAME } from "./paths.js";
import { shellCommandLine, shellQuote } from "./shell.js";
import type { CommandResult, CommandRunner, JobDescription, SubmitResult } from "./types.js";

const ACKNOWLEDGMENT = /^\s*Submitted batch job (\d+)\s*$/im;

function toErrorText(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

function formatDirective(key: string, value: string): string {
  if (/[\r\n]/.test(key) || /[\r\n]/.test(value)) {
    throw new Error(`Directive ${JSON.stringify(key)} must be a single line`);
  }
  if (value === "") {
    return `#SBATCH ${key}`;
  }
  return key.startsWith("--") ? `#SBATCH ${key}=${value}` : `#SBATCH ${key} ${value}`;
}

function mergeDirectives(
  target: Record<string, string>,
  source: Record<string, string> | undefined,
): void {
  for (const [key, value] of Object.entries(source ?? {})) {
    if (key.trim()) {
      target[normalizeDirectiveKey(key)] = value;
    }
  }
}

export function buildJobDescription(params: {
  jobName: string;
  displayName?: string;
  scriptDir: string;
  parallelJobs: number;
  entry: readonly string[];
  args: readonly string[];
  directives?: Record<string, string>;
  directiveOverrides?: Record<string, string>;
  preRunCommands?: string[];
  postRunCommands?: string[];
  launcher?: string;
  loginShell?: boolean;
}): JobDescription {
  if (!Number.isInteger(params.parallelJobs) || params.parallelJobs < 1) {
    throw new Error("parallelJobs must be a positive integer");
  }
  if (params.entry.length === 0) {
    throw new Error("entry command is required to build a job description");
  }

  const arrayTask = params.parallelJobs > 1;
  // %A is the array parent job id, %a the array task id, %j the job id.
  const defaultOutput = path.join(params.scriptDir, arrayTask ? "%A_%a.out" : "%j.out");

  const directives: Record<string, string> = {
    "--job-name": params.jobName,
    "--output": defaultOutput,
    "--error": defaultOutput,
  };
  if (arrayTask) {
    directives["--array"] = `1-${params.parallelJobs}`;
  }
  mergeDirectives(directives, params.directives);
  mergeDirectives(directives, params.directiveOverrides);

  const invocation = shellCommandLine([...params.entry, ...params.args]);
  const launcher = params.launcher?.trim();

  return {
    jobName: params.jobName,
    displayName: params.displayName,
    scriptDir: params.scriptDir,
    scriptPath: path.join(params.scriptDir, SCRIPT_FILE_NAME),
    output: directives["--output"] ?? defaultOutput,
    error: directives["--error"] ?? defaultOutput,
    arrayTask,
    directives,
    preRunCommands: (params.preRunCommands ?? []).map((entry) => entry.trim()).filter(Boolean),
    postRunCommands: (params.postRunCommands ?? []).map((entry) => entry.trim()).filter(Boolean),
    command: launcher ? `${launcher} ${invocation}` : invocation,
    loginShell: params.loginShell ?? true,
  };
}

export function renderJobScript(description: JobDescription): string {
  const lines: string[] = [description.loginShell ? "#!/bin/bash -l" : "#!/bin/bash"];

  lines.push("#", `# Generated by slurm-exec for job "${description.jobName}".`, "#");
  for (const [key, value] of Object.entries(description.directives)) {
    lines.push(formatDirective(key, value));
  }
  lines.push("");

  const banner = description.displayName
    ? `# Executing job "${description.jobName}" (${description.displayName}).`
    : `# Executing job "${description.jobName}".`;
  lines.push(
    `echo ${shellQuote(banner)}`,
    'echo "# Slurm job name: $SLURM_JOB_NAME"',
    'echo "# Slurm node: $SLURM_JOB_NODELIST"',
    'echo "# Slurm cluster: $SLURM_CLUSTER_NAME"',
    'echo "# Slurm job id: $SLURM_JOB_ID"',
  );
  if (description.arrayTask) {
    lines.push(
      'echo "# Slurm array parent job id: $SLURM_ARRAY_JOB_ID"',
      'echo "# Slurm array task id: $SLURM_ARRAY_TASK_ID"',
    );
  }
  lines.push('echo "# Job start time: $(date)"', "echo");

  lines.push(...description.preRunCommands);
  lines.push(description.command);
  lines.push(...description.postRunCommands);

  lines.push("", "# End of script");
  return `${lines.join("\n")}\n`;
}

export function parseSubmitAcknowledgment(output: string): {
  success: boolean;
  jobId?: string;
  output: string;
} {
  const match = ACKNOWLEDGMENT.exec(output);
  if (match?.[1]) {
    return { success: true, jobId: match[1], output };
  }
  return { success: false, output };
}

export function resolveLogPath(pattern: string, jobName: string, jobId: string): string {
  return pattern.replace(/%x/g, jobName).replace(/%A/g, jobId).replace(/%j/g, jobId);
}

function combineOutput(result: CommandResult): string {
  return [result.stdout.trim(), result.stderr.trim()].filter((entry) => entry.length > 0).join("\n");
}

/**
 * Writes the batch script (create-or-truncate) and hands it to the submit
 * command once. Failures come back as `success: false` with the raw text.
 */
export async function submitJobScript(
  description: JobDescription,
  params: { runner: CommandRunner; submitCommand?: string; submitArgs?: string[] },
): Promise<SubmitResult> {
  const submitCommand = params.submitCommand ?? "sbatch";
  await ensureDir(path.dirname(description.scriptPath));
  await fs.writeFile(description.scriptPath, renderJobScript(description), "utf8");

  let result: CommandResult;
  try {
    result = await params.runner(submitCommand, [
      ...(params.submitArgs ?? []),
      description.scriptPath,
    ]);
  } catch (error) {
    return {
      success: false,
      output: `${submitCommand} failed to start: ${toErrorText(error)}`,
      scriptPath: description.scriptPath,
    };
  }

  const output = combineOutput(result);
  if (result.code !== 0) {
    return {
      success: false,
      output: output || `exit code ${result.code}`,
      exitCode: result.code,
      scriptPath: description.scriptPath,
    };
  }

  const acknowledgment = parseSubmitAcknowledgment(output);
  if (!acknowledgment.success || !acknowledgment.jobId) {
    return {
      success: false,
      output,
      exitCode: result.code,
      scriptPath: description.scriptPath,
    };
  }

  return {
    success: true,
    output,
    jobId: acknowledgment.jobId,
    exitCode: result.code,
    scriptPath: description.scriptPath,
    logPath: resolveLogPath(description.output, description.jobName, acknowledgment.jobId),
  };
}

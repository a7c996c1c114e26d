import os from "node:os";
import type { TObject } from "@sinclair/typebox";
import type { Command } from "commander";
import {
  parseJobArguments,
  parseParserArguments,
  replayArguments,
  replayParserArguments,
} from "./arguments.js";
import { parseJobOptions } from "./config.js";
import { getSlurmJobId, isScheduled, resolveExecutionContext } from "./context.js";
import { defaultCommandRunner } from "./exec.js";
import { JobRegistry, type JobDefinition, type RunnableJob, type SlurmJob } from "./job.js";
import { consoleLogger, logFramed, type Logger } from "./logger.js";
import { resolveScriptDir } from "./paths.js";
import { buildJobDescription, submitJobScript } from "./slurm.js";
import type {
  CommandRunner,
  ExecutionContext,
  JobDescription,
  JobOptions,
  SubmitResult,
} from "./types.js";

export type ExecOutcome<R> =
  | { mode: "scheduled"; jobId?: string; result: R }
  | { mode: "submitted"; description: JobDescription; submission: SubmitResult };

export type ExecParams = {
  argv?: readonly string[];
  options?: Partial<JobOptions>;
  /**
   * Commander parser to use instead of the one derived from the job's schema.
   * Its option values are passed to the job and replayed into the batch script.
   */
  parser?: Command;
};

export type SlurmExecutorParams = {
  context: ExecutionContext;
  registry: JobRegistry;
  runner?: CommandRunner;
  logger?: Logger;
  /** Command that re-runs this program inside the job, e.g. `["node", "train.js"]`. */
  entry?: string[];
  homeDir?: string;
};

export const defaultRegistry = new JobRegistry();

export function currentEntry(): string[] {
  const script = process.argv[1];
  return [process.execPath, ...process.execArgv, ...(script ? [script] : [])];
}

function formatDirectiveOverrides(overrides: Record<string, string>): string {
  return Object.entries(overrides)
    .map(([key, value]) => (value ? `${key} ${value}` : key))
    .join(" ");
}

export class SlurmExecutor {
  readonly context: ExecutionContext;
  private readonly registry: JobRegistry;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly entry: string[];
  private readonly homeDir: string;

  constructor(params: SlurmExecutorParams) {
    this.context = params.context;
    this.registry = params.registry;
    this.runner = params.runner ?? defaultCommandRunner;
    this.logger = params.logger ?? consoleLogger;
    this.entry = params.entry ?? currentEntry();
    this.homeDir = params.homeDir ?? os.homedir();

    if (this.context.debug) {
      logFramed(
        this.logger,
        [
          "NOTICE - Slurm running in debug mode.",
          "All slurm tasks will be immediately executed",
          "rather than queued on Slurm.",
        ],
        "warn",
      );
    }
  }

  /**
   * Inside a scheduled job, parses `argv` into the job's parameters and runs it.
   * On the submission host, writes the batch script and submits it instead.
   */
  exec<R>(job: RunnableJob<R>, params?: ExecParams): Promise<ExecOutcome<R>>;
  exec(job: string, params?: ExecParams): Promise<ExecOutcome<unknown>>;
  async exec(job: RunnableJob | string, params: ExecParams = {}): Promise<ExecOutcome<unknown>> {
    return await this.run(this.registry.resolve(job), params);
  }

  private async run<R>(job: RunnableJob<R>, params: ExecParams): Promise<ExecOutcome<R>> {
    const options = parseJobOptions(params.options);
    const argv = params.argv ?? [];
    const parsed = params.parser
      ? parseParserArguments(params.parser, argv)
      : parseJobArguments(job.descriptors, argv, { name: job.name, description: job.description });

    if (isScheduled(this.context)) {
      const result = await job.invokeWithValues(parsed.values, this.context);
      return { mode: "scheduled", jobId: getSlurmJobId(this.context), result };
    }

    const jobName = parsed.jobName ?? options.jobName ?? job.name;
    const overrides = parsed.directiveOverrides;
    if (Object.keys(overrides).length > 0) {
      this.logger.info(
        `[slurm-exec] passing \`${formatDirectiveOverrides(overrides)}\` as arguments to SBATCH`,
      );
    }

    const description = buildJobDescription({
      jobName,
      displayName: job.displayName,
      scriptDir: resolveScriptDir({
        jobName,
        scriptDir: parsed.outDir ?? options.scriptDir,
        homeDir: this.homeDir,
      }),
      parallelJobs: parsed.parallelJobs ?? options.parallelJobs,
      entry: this.entry,
      args: params.parser
        ? replayParserArguments(params.parser, parsed.values)
        : replayArguments(job.descriptors, parsed.values),
      directives: options.directives,
      directiveOverrides: overrides,
      preRunCommands: options.preRunCommands,
      postRunCommands: options.postRunCommands,
      launcher: options.launcher,
      loginShell: options.loginShell,
    });

    const submission = await submitJobScript(description, {
      runner: this.runner,
      submitCommand: options.submitCommand,
      submitArgs: options.submitArgs,
    });
    this.logSubmission(description, submission);

    return { mode: "submitted", description, submission };
  }

  private logSubmission(description: JobDescription, submission: SubmitResult): void {
    const lines = [`Executing Slurm job with name "${description.jobName}"...`];
    if (description.displayName) {
      lines.push(`   (${description.displayName})`);
    }
    lines.push("");

    if (submission.success) {
      lines.push(
        "Status: SUCCESS",
        `Slurm job id: ${submission.jobId ?? ""}`,
        `Script file: ${submission.scriptPath}`,
        `Log file: ${submission.logPath ?? description.output}`,
      );
      logFramed(this.logger, lines);
      return;
    }

    lines.push(
      "Status: FAIL [!!!]",
      `Script file: ${submission.scriptPath}`,
      "Error: Bad sbatch output:",
      ...submission.output.split(/\r?\n/),
    );
    logFramed(this.logger, lines, "error");
  }
}

/**
 * One-call entry point for a job script: resolves the execution context from
 * the environment and dispatches `job` with this process's arguments.
 */
export async function slurmExec<R>(
  job: RunnableJob<R>,
  params: ExecParams & {
    debug?: boolean;
    registry?: JobRegistry;
    runner?: CommandRunner;
    logger?: Logger;
  } = {},
): Promise<ExecOutcome<R>> {
  const executor = new SlurmExecutor({
    context: resolveExecutionContext({ debug: params.debug }),
    registry: params.registry ?? defaultRegistry,
    runner: params.runner,
    logger: params.logger,
  });
  return await executor.exec(job, {
    argv: params.argv ?? process.argv.slice(2),
    options: params.options,
    parser: params.parser,
  });
}

export function registerJob<T extends TObject, R>(
  definition: JobDefinition<T, R>,
): SlurmJob<T, R> {
  return defaultRegistry.register(definition);
}

import { parseBooleanLiteral } from "./arguments.js";
import type { ExecutionContext } from "./types.js";

export const SLURM_JOB_ID_ENV = "SLURM_JOB_ID";
export const DEBUG_ENV = "SLURM_EXEC_DEBUG";
export const DEBUG_JOB_ID = "SLURM_DEBUG";

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Decides once whether this process runs inside a scheduled job. Debug mode
 * makes a submission host behave as if it were already scheduled, so jobs run
 * in-process.
 */
export function resolveExecutionContext(params: { env?: Env; debug?: boolean } = {}): ExecutionContext {
  const env = params.env ?? process.env;
  const debugFlag = readEnv(env, DEBUG_ENV);
  const debug = params.debug ?? (debugFlag ? parseBooleanLiteral(debugFlag) === true : false);
  const jobId = readEnv(env, SLURM_JOB_ID_ENV);

  return {
    mode: jobId !== undefined || debug ? "scheduled" : "local",
    debug,
    jobId,
    arrayJobId: readEnv(env, "SLURM_ARRAY_JOB_ID"),
    arrayTaskId: readEnv(env, "SLURM_ARRAY_TASK_ID"),
    jobName: readEnv(env, "SLURM_JOB_NAME"),
    nodeList: readEnv(env, "SLURM_JOB_NODELIST"),
    clusterName: readEnv(env, "SLURM_CLUSTER_NAME"),
  };
}

export function isScheduled(context: ExecutionContext): boolean {
  return context.mode === "scheduled";
}

export function getSlurmJobId(context: ExecutionContext): string | undefined {
  return context.debug ? DEBUG_JOB_ID : context.jobId;
}

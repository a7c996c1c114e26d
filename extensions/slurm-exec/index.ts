export {
  RESERVED_FLAGS,
  buildArgumentParser,
  collectDirectiveOverrides,
  describeParameters,
  formatArgumentValue,
  parseArgumentValue,
  parseBooleanLiteral,
  parseJobArguments,
  parseParserArguments,
  replayArguments,
  replayParserArguments,
} from "./src/arguments.js";
export type {
  ArgumentParserOptions,
  ParsedArguments,
  ParsedJobArguments,
} from "./src/arguments.js";
export { parseJobOptions } from "./src/config.js";
export { getSlurmJobId, isScheduled, resolveExecutionContext } from "./src/context.js";
export {
  ArgumentParseError,
  InvalidInvocationError,
  SlurmExecError,
  isSlurmExecError,
} from "./src/errors.js";
export { defaultCommandRunner } from "./src/exec.js";
export {
  SlurmExecutor,
  currentEntry,
  defaultRegistry,
  registerJob,
  slurmExec,
} from "./src/executor.js";
export type { ExecOutcome, ExecParams, SlurmExecutorParams } from "./src/executor.js";
export { JobRegistry, SlurmJob } from "./src/job.js";
export type { JobDefinition, JobFunction, RunnableJob } from "./src/job.js";
export { consoleLogger } from "./src/logger.js";
export type { Logger } from "./src/logger.js";
export {
  buildJobDescription,
  parseSubmitAcknowledgment,
  renderJobScript,
  submitJobScript,
} from "./src/slurm.js";
export type * from "./src/types.js";

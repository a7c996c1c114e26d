export type ArgumentKind = "integer" | "float" | "string" | "boolean" | "choice";

export type ArgumentValue = string | number | boolean;

export type ChoiceValue = string | number;

export type ArgumentDescriptor = {
  readonly name: string;
  readonly kind: ArgumentKind;
  readonly choices?: readonly ChoiceValue[];
  readonly defaultValue?: ArgumentValue;
  readonly required: boolean;
  readonly description?: string;
  /** False for parameters declared as `Type.Unknown()` / `Type.Any()`. */
  readonly typed: boolean;
};

export type ExecutionMode = "scheduled" | "local";

export type ExecutionContext = {
  mode: ExecutionMode;
  debug: boolean;
  jobId?: string;
  arrayJobId?: string;
  arrayTaskId?: string;
  jobName?: string;
  nodeList?: string;
  clusterName?: string;
};

export type JobOptions = {
  jobName?: string;
  scriptDir?: string;
  parallelJobs: number;
  directives: Record<string, string>;
  preRunCommands: string[];
  postRunCommands: string[];
  launcher?: string;
  loginShell: boolean;
  submitCommand: string;
  submitArgs: string[];
};

export type JobDescription = {
  jobName: string;
  displayName?: string;
  scriptDir: string;
  scriptPath: string;
  output: string;
  error: string;
  arrayTask: boolean;
  directives: Record<string, string>;
  preRunCommands: string[];
  postRunCommands: string[];
  command: string;
  loginShell: boolean;
};

export type SubmitResult = {
  success: boolean;
  output: string;
  jobId?: string;
  /** Undefined when the submit command could not be started. */
  exitCode?: number;
  scriptPath: string;
  logPath?: string;
};

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { cwd?: string },
) => Promise<CommandResult>;

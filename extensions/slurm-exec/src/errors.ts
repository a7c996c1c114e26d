export type SlurmExecErrorCode = "INVALID_INVOCATION" | "ARGUMENT_PARSE";

export class SlurmExecError extends Error {
  readonly code: SlurmExecErrorCode;

  constructor(message: string, code: SlurmExecErrorCode) {
    super(message);
    this.name = "SlurmExecError";
    this.code = code;
  }
}

/**
 * Raised when a job function is called outside a scheduled job, or when a
 * submission is requested for something that was never registered as a job.
 */
export class InvalidInvocationError extends SlurmExecError {
  constructor(message: string) {
    super(message, "INVALID_INVOCATION");
    this.name = "InvalidInvocationError";
  }
}

/**
 * Command-line parsing failure. `commanderCode` keeps the code commander
 * reported (e.g. `commander.invalidArgument`) so callers can tell a help
 * request (`commander.helpDisplayed`, exit code 0) from a real failure.
 */
export class ArgumentParseError extends SlurmExecError {
  readonly exitCode: number;
  readonly commanderCode?: string;

  constructor(message: string, options: { exitCode?: number; commanderCode?: string } = {}) {
    super(message, "ARGUMENT_PARSE");
    this.name = "ArgumentParseError";
    this.exitCode = options.exitCode ?? 1;
    this.commanderCode = options.commanderCode;
  }
}

export function isSlurmExecError(error: unknown): error is SlurmExecError {
  return error instanceof SlurmExecError;
}

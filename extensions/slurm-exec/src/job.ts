import type { Static, TObject } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { describeParameters } from "./arguments.js";
import { isScheduled } from "./context.js";
import { ArgumentParseError, InvalidInvocationError } from "./errors.js";
import type { ArgumentDescriptor, ExecutionContext } from "./types.js";

export type JobFunction<T extends TObject, R> = (
  args: Static<T>,
  context: ExecutionContext,
) => R | Promise<R>;

export type JobDefinition<T extends TObject, R> = {
  name: string;
  parameters: T;
  run: JobFunction<T, R>;
  description?: string;
  /** Source file of the job, shown in the generated script banner. */
  file?: string;
};

/** What the executor needs from a registered job, independent of its parameter types. */
export interface RunnableJob<R = unknown> {
  readonly name: string;
  readonly parameters: TObject;
  readonly description?: string;
  readonly descriptors: readonly ArgumentDescriptor[];
  readonly displayName: string;
  invokeWithValues(values: Record<string, unknown>, context: ExecutionContext): Promise<R>;
}

/**
 * A function registered as a runnable batch job. It only executes inside a
 * scheduled job (or in debug mode); on the submission host it must be handed to
 * `SlurmExecutor.exec` instead.
 */
export class SlurmJob<T extends TObject = TObject, R = unknown> implements RunnableJob<R> {
  readonly name: string;
  readonly parameters: T;
  readonly description?: string;
  readonly file?: string;
  readonly descriptors: readonly ArgumentDescriptor[];
  private readonly fn: JobFunction<T, R>;

  constructor(definition: JobDefinition<T, R>) {
    const name = definition.name.trim();
    if (!name) {
      throw new Error("job name is required");
    }
    this.name = name;
    this.parameters = definition.parameters;
    this.description = definition.description;
    this.file = definition.file;
    this.descriptors = describeParameters(definition.parameters);
    this.fn = definition.run;
  }

  get displayName(): string {
    return this.file ? `${this.name}() in ${this.file}` : `${this.name}()`;
  }

  async invoke(args: Static<T>, context: ExecutionContext): Promise<R> {
    if (!isScheduled(context)) {
      throw new InvalidInvocationError(
        `Job ${this.name} cannot be run outside of a slurm job. Submit it with SlurmExecutor.exec() instead.`,
      );
    }
    return await this.fn(args, context);
  }

  /** Checks parsed command-line values against the declared schema before invoking. */
  async invokeWithValues(values: Record<string, unknown>, context: ExecutionContext): Promise<R> {
    if (!Value.Check(this.parameters, values)) {
      const first = Value.Errors(this.parameters, values).First();
      const detail = first ? `${first.path || "/"}: ${first.message}` : "invalid arguments";
      throw new ArgumentParseError(`Arguments for job ${this.name} do not match its parameters (${detail})`);
    }
    return await this.invoke(values, context);
  }
}

export class JobRegistry {
  private readonly jobs = new Map<string, RunnableJob>();

  register<T extends TObject, R>(definition: JobDefinition<T, R>): SlurmJob<T, R> {
    const job = new SlurmJob(definition);
    if (this.jobs.has(job.name)) {
      throw new Error(`Job ${job.name} is already registered`);
    }
    this.jobs.set(job.name, job);
    return job;
  }

  has(job: RunnableJob | string): boolean {
    if (typeof job === "string") {
      return this.jobs.has(job);
    }
    return this.jobs.get(job.name) === job;
  }

  resolve(job: RunnableJob | string): RunnableJob {
    const name = typeof job === "string" ? job : job.name;
    const registered = this.jobs.get(name);
    if (!registered || (typeof job !== "string" && registered !== job)) {
      throw new InvalidInvocationError(
        `${name} is not a registered slurm job. Register it with JobRegistry.register() first.`,
      );
    }
    return registered;
  }

  list(): string[] {
    return Array.from(this.jobs.keys());
  }
}

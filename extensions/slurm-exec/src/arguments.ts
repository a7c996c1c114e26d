import { KindGuard, Kind, type TObject, type TSchema } from "@sinclair/typebox";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { ArgumentParseError } from "./errors.js";
import type { ArgumentDescriptor, ArgumentKind, ArgumentValue, ChoiceValue } from "./types.js";

/** Flags every job parser understands in addition to the job's own parameters. */
export const RESERVED_FLAGS = {
  jobName: "job_name",
  parallelJobs: "n_parallel_jobs",
  outDir: "out_dir",
} as const;

const PARAMETER_NAME = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const INTEGER_TEXT = /^[-+]?\d+$/;
const DECIMAL_TEXT = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;
const TRUE_LITERALS = new Set(["true", "t", "1", "yes", "y"]);
const FALSE_LITERALS = new Set(["false", "f", "0", "no", "n"]);

export type ArgumentParserOptions = {
  name?: string;
  description?: string;
};

export type ParsedArguments<V> = {
  values: V;
  jobName?: string;
  parallelJobs?: number;
  outDir?: string;
  directiveOverrides: Record<string, string>;
};

export type ParsedJobArguments = ParsedArguments<Record<string, ArgumentValue>>;

export function parseBooleanLiteral(text: string): boolean | undefined {
  const normalized = text.trim().toLowerCase();
  if (TRUE_LITERALS.has(normalized)) {
    return true;
  }
  if (FALSE_LITERALS.has(normalized)) {
    return false;
  }
  return undefined;
}

export function isArgumentValue(value: unknown): value is ArgumentValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function literalChoice(schema: TSchema): ChoiceValue | undefined {
  if (KindGuard.IsLiteralString(schema) || KindGuard.IsLiteralNumber(schema)) {
    return schema.const;
  }
  return undefined;
}

function literalChoices(schema: TSchema): ChoiceValue[] | undefined {
  const single = literalChoice(schema);
  if (single !== undefined) {
    return [single];
  }
  if (!KindGuard.IsUnion(schema) || schema.anyOf.length === 0) {
    return undefined;
  }
  const choices: ChoiceValue[] = [];
  for (const member of schema.anyOf) {
    const choice = literalChoice(member);
    if (choice === undefined) {
      return undefined;
    }
    choices.push(choice);
  }
  return choices;
}

function describeKind(
  name: string,
  schema: TSchema,
): { kind: ArgumentKind; choices?: ChoiceValue[]; typed: boolean } {
  if (KindGuard.IsInteger(schema)) {
    return { kind: "integer", typed: true };
  }
  if (KindGuard.IsNumber(schema)) {
    return { kind: "float", typed: true };
  }
  if (KindGuard.IsString(schema)) {
    return { kind: "string", typed: true };
  }
  if (KindGuard.IsBoolean(schema)) {
    return { kind: "boolean", typed: true };
  }
  const choices = literalChoices(schema);
  if (choices) {
    return { kind: "choice", choices, typed: true };
  }
  if (KindGuard.IsUnknown(schema) || KindGuard.IsAny(schema)) {
    return { kind: "string", typed: false };
  }
  throw new TypeError(`Parameter "${name}" has unsupported type ${String(schema[Kind])}`);
}

function readDefault(name: string, schema: TSchema): ArgumentValue | undefined {
  const value: unknown = schema.default;
  if (value === undefined) {
    return undefined;
  }
  if (!isArgumentValue(value)) {
    throw new TypeError(`Parameter "${name}" default must be a string, number or boolean`);
  }
  return value;
}

/**
 * Derives one argument descriptor per property of a TypeBox object schema, in
 * declaration order.
 */
export function describeParameters(schema: TObject): ArgumentDescriptor[] {
  return Object.entries(schema.properties).map(([name, property]) => {
    const { kind, choices, typed } = describeKind(name, property);
    const defaultValue = readDefault(name, property);
    const description =
      typeof property.description === "string" ? property.description : undefined;
    const descriptor: ArgumentDescriptor = {
      name,
      kind,
      choices,
      defaultValue,
      required: defaultValue === undefined && !KindGuard.IsOptional(property),
      description,
      typed,
    };
    return Object.freeze(descriptor);
  });
}

export function parseArgumentValue(descriptor: ArgumentDescriptor, text: string): ArgumentValue {
  switch (descriptor.kind) {
    case "integer": {
      const trimmed = text.trim();
      if (!INTEGER_TEXT.test(trimmed)) {
        throw new InvalidArgumentError("Expected an integer.");
      }
      const value = Number.parseInt(trimmed, 10);
      if (!Number.isSafeInteger(value)) {
        throw new InvalidArgumentError("Expected an integer between ±2^53.");
      }
      return value;
    }
    case "float": {
      const trimmed = text.trim();
      const value = Number(trimmed);
      if (!DECIMAL_TEXT.test(trimmed) || !Number.isFinite(value)) {
        throw new InvalidArgumentError("Expected a number.");
      }
      return value;
    }
    case "boolean": {
      const value = parseBooleanLiteral(text);
      if (value === undefined) {
        throw new InvalidArgumentError(`${text} is not a valid boolean value.`);
      }
      return value;
    }
    case "choice": {
      const choices = descriptor.choices ?? [];
      const match = choices.find((choice) => String(choice) === text);
      if (match === undefined) {
        throw new InvalidArgumentError(`Allowed choices are ${choices.join(", ")}.`);
      }
      return match;
    }
    case "string":
      return text;
  }
}

export function formatArgumentValue(value: ArgumentValue): string {
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return String(value);
}

function typeLabel(descriptor: ArgumentDescriptor): string {
  switch (descriptor.kind) {
    case "integer":
      return "int";
    case "float":
      return "float";
    case "boolean":
      return "bool";
    case "choice":
      return (descriptor.choices ?? []).join("|");
    case "string":
      return descriptor.typed ? "str" : "untyped";
  }
}

function describeHelp(descriptor: ArgumentDescriptor): string {
  const label = typeLabel(descriptor);
  const parts = descriptor.description ? [descriptor.description] : [];
  if (descriptor.required) {
    parts.push(`(*${label}, required)`);
  } else if (descriptor.defaultValue !== undefined) {
    parts.push(`(${label}, Default: ${formatArgumentValue(descriptor.defaultValue)})`);
  } else {
    parts.push(`(${label})`);
  }
  if (descriptor.kind === "boolean") {
    if (descriptor.defaultValue === false) {
      parts.push(`Use \`--${descriptor.name}\` to set to true.`);
    }
    parts.push(`Use \`--${descriptor.name} true/false\` to change.`);
  }
  return parts.join(" ");
}

function optionAttribute(name: string): string {
  return new Option(`--${name}`).attributeName();
}

function createOption(descriptor: ArgumentDescriptor): Option {
  const flags =
    descriptor.kind === "boolean"
      ? `--${descriptor.name} [value]`
      : `--${descriptor.name} <value>`;
  const option = new Option(flags, describeHelp(descriptor)).argParser((text: string) =>
    parseArgumentValue(descriptor, text),
  );
  if (descriptor.defaultValue !== undefined) {
    option.default(descriptor.defaultValue);
  }
  if (descriptor.kind === "boolean") {
    // A bare flag means true only when the declared default is false.
    option.preset(descriptor.defaultValue === false ? "true" : "false");
  }
  if (descriptor.required) {
    option.makeOptionMandatory();
  }
  return option;
}

function claimFlag(claimed: Map<string, string>, name: string): void {
  if (!PARAMETER_NAME.test(name)) {
    throw new Error(`Parameter name "${name}" cannot be used as a command-line flag`);
  }
  const attribute = optionAttribute(name);
  const owner = claimed.get(attribute);
  if (owner !== undefined) {
    throw new Error(`Parameter "${name}" maps to the same flag as "${owner}"`);
  }
  claimed.set(attribute, name);
}

function readPositiveInteger(text: string): number {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed) || Number.parseInt(trimmed, 10) < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return Number.parseInt(trimmed, 10);
}

function readNonEmpty(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new InvalidArgumentError("Expected a non-empty value.");
  }
  return trimmed;
}

function configureParser(command: Command): Command {
  return command
    .allowUnknownOption()
    .allowExcessArguments()
    .exitOverride()
    .configureOutput({
      // Parse errors are rethrown as ArgumentParseError instead of printed.
      outputError: () => undefined,
    });
}

function addReservedOptions(command: Command): void {
  command.addOption(
    new Option(`--${RESERVED_FLAGS.jobName} <name>`, "Name of the slurm job.").argParser(
      readNonEmpty,
    ),
  );
  command.addOption(
    new Option(
      `--${RESERVED_FLAGS.parallelJobs} <count>`,
      "If >1 then will be run as a slurm array task.",
    ).argParser(readPositiveInteger),
  );
  command.addOption(
    new Option(`--${RESERVED_FLAGS.outDir} <dir>`, "Directory to save the slurm script.").argParser(
      readNonEmpty,
    ),
  );
}

const RESERVED_ATTRIBUTES = new Set<string>(
  Object.values(RESERVED_FLAGS).map((flag) => optionAttribute(flag)),
);

function isReservedOption(option: Option): boolean {
  return RESERVED_ATTRIBUTES.has(option.attributeName());
}

export function buildArgumentParser(
  descriptors: readonly ArgumentDescriptor[],
  options: ArgumentParserOptions = {},
): Command {
  const command = configureParser(new Command(options.name ?? "slurm-job"));
  if (options.description) {
    command.description(options.description);
  }

  const claimed = new Map<string, string>([["help", "help"]]);
  for (const reserved of Object.values(RESERVED_FLAGS)) {
    claimFlag(claimed, reserved);
  }
  addReservedOptions(command);

  for (const descriptor of descriptors) {
    claimFlag(claimed, descriptor.name);
    command.addOption(createOption(descriptor));
  }

  return command;
}

/**
 * Pairs leftover command-line tokens into scheduler directives:
 * `--time=01:00:00`, `--time 01:00:00`, `-p gpu` and bare `--exclusive`.
 */
export function collectDirectiveOverrides(tokens: readonly string[]): Record<string, string> {
  const directives: Record<string, string> = {};
  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index] ?? "";
    if (!token.startsWith("-") || token === "-" || token === "--") {
      throw new ArgumentParseError(`Unexpected argument: ${token}`, {
        commanderCode: "commander.excessArguments",
      });
    }
    const equals = token.startsWith("--") ? token.indexOf("=") : -1;
    if (equals > 2) {
      directives[token.slice(0, equals)] = token.slice(equals + 1);
      continue;
    }
    const next = tokens[index + 1];
    if (next !== undefined && !next.startsWith("-")) {
      directives[token] = next;
      index += 1;
    } else {
      directives[token] = "";
    }
  }
  return directives;
}

function runParser(
  command: Command,
  argv: readonly string[],
): ParsedArguments<Record<string, unknown>> {
  try {
    command.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new ArgumentParseError(error.message, {
        exitCode: error.exitCode,
        commanderCode: error.code,
      });
    }
    throw error;
  }

  const opts: Record<string, unknown> = command.opts();
  const jobName = opts[RESERVED_FLAGS.jobName];
  const parallelJobs = opts[RESERVED_FLAGS.parallelJobs];
  const outDir = opts[RESERVED_FLAGS.outDir];
  const values = Object.fromEntries(
    Object.entries(opts).filter(([key]) => !RESERVED_ATTRIBUTES.has(key)),
  );

  return {
    values,
    jobName: typeof jobName === "string" ? jobName : undefined,
    parallelJobs: typeof parallelJobs === "number" ? parallelJobs : undefined,
    outDir: typeof outDir === "string" ? outDir : undefined,
    directiveOverrides: collectDirectiveOverrides(command.args),
  };
}

export function parseJobArguments(
  descriptors: readonly ArgumentDescriptor[],
  argv: readonly string[],
  options: ArgumentParserOptions = {},
): ParsedJobArguments {
  const parsed = runParser(buildArgumentParser(descriptors, options), argv);
  const values: Record<string, ArgumentValue> = {};
  for (const descriptor of descriptors) {
    const value = parsed.values[optionAttribute(descriptor.name)];
    if (isArgumentValue(value)) {
      values[descriptor.name] = value;
    }
  }
  return { ...parsed, values };
}

const preparedParsers = new WeakSet<Command>();

/**
 * Parses `argv` with a caller-built commander parser instead of one derived from
 * the job's schema. The parser is configured in place on first use: the reserved
 * scheduler flags are added, unknown flags are kept for directives, and errors
 * are thrown instead of exiting.
 */
export function parseParserArguments(
  parser: Command,
  argv: readonly string[],
): ParsedArguments<Record<string, unknown>> {
  if (!preparedParsers.has(parser)) {
    const clash = parser.options.find((option) => isReservedOption(option));
    if (clash) {
      throw new Error(`Parser option "${clash.flags}" conflicts with a reserved scheduler flag`);
    }
    configureParser(parser);
    addReservedOptions(parser);
    preparedParsers.add(parser);
  }
  return runParser(parser, argv);
}

/**
 * Rebuilds the job's own flags from parsed values, in declaration order, so the
 * scheduled copy of the program receives exactly what the submitting copy saw.
 */
export function replayArguments(
  descriptors: readonly ArgumentDescriptor[],
  values: Readonly<Record<string, unknown>>,
): string[] {
  const tokens: string[] = [];
  for (const descriptor of descriptors) {
    const value = values[descriptor.name];
    if (isArgumentValue(value)) {
      tokens.push(`--${descriptor.name}`, formatArgumentValue(value));
    }
  }
  return tokens;
}

function replayValue(flag: string, value: unknown): string[] {
  if (isArgumentValue(value)) {
    return [flag, formatArgumentValue(value)];
  }
  throw new Error(`Value of option ${flag} cannot be passed on the command line`);
}

/** Replays the values of a caller-built parser's own options, in the order they were added. */
export function replayParserArguments(
  parser: Command,
  values: Readonly<Record<string, unknown>>,
): string[] {
  const tokens: string[] = [];
  for (const option of parser.options) {
    const flag = option.long ?? option.short;
    const value = values[option.attributeName()];
    if (!flag || isReservedOption(option) || value === undefined) {
      continue;
    }
    if (option.negate) {
      if (value === false) {
        tokens.push(flag);
      }
    } else if (option.isBoolean() || (option.optional && value === true)) {
      if (value === true) {
        tokens.push(flag);
      }
    } else if (Array.isArray(value)) {
      for (const entry of value) {
        tokens.push(...replayValue(flag, entry));
      }
    } else {
      tokens.push(...replayValue(flag, value));
    }
  }
  return tokens;
}

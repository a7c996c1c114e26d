import type { JobOptions } from "./types.js";

const DEFAULT_SUBMIT_COMMAND = "sbatch";

function asObject(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function readString(value: unknown, field: string): string | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`${field} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readNumber(value: unknown, field: string): number | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value < 1) {
    throw new Error(`${field} must be a positive number`);
  }
  return Math.floor(value);
}

function readBoolean(value: unknown, field: string): boolean | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new Error(`${field} must be a boolean`);
  }
  return value;
}

function readStringArray(value: unknown, field: string): string[] {
  if (value == null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error(`${field} must be an array of strings`);
  }
  return value
    .map((entry: unknown, idx) => {
      if (typeof entry !== "string") {
        throw new Error(`${field}[${idx}] must be a string`);
      }
      return entry.trim();
    })
    .filter((entry) => entry.length > 0);
}

export function normalizeDirectiveKey(key: string): string {
  const trimmed = key.trim();
  return trimmed.startsWith("-") ? trimmed : `--${trimmed}`;
}

function readDirectives(value: unknown, field: string): Record<string, string> {
  if (value == null) {
    return {};
  }
  const obj = asObject(value, field);
  const directives: Record<string, string> = {};
  for (const [key, entry] of Object.entries(obj)) {
    if (!key.trim()) {
      continue;
    }
    if (typeof entry === "number" && Number.isFinite(entry)) {
      directives[normalizeDirectiveKey(key)] = String(entry);
    } else if (typeof entry === "string") {
      directives[normalizeDirectiveKey(key)] = entry.trim();
    } else {
      throw new Error(`${field}.${key} must be a string or number`);
    }
  }
  return directives;
}

export function parseJobOptions(value: unknown): JobOptions {
  const obj = value == null ? {} : asObject(value, "slurm-exec options");

  return {
    jobName: readString(obj.jobName, "jobName"),
    scriptDir: readString(obj.scriptDir, "scriptDir"),
    parallelJobs: readNumber(obj.parallelJobs, "parallelJobs") ?? 1,
    directives: readDirectives(obj.directives, "directives"),
    preRunCommands: readStringArray(obj.preRunCommands, "preRunCommands"),
    postRunCommands: readStringArray(obj.postRunCommands, "postRunCommands"),
    launcher: readString(obj.launcher, "launcher"),
    loginShell: readBoolean(obj.loginShell, "loginShell") ?? true,
    submitCommand: readString(obj.submitCommand, "submitCommand") ?? DEFAULT_SUBMIT_COMMAND,
    submitArgs: readStringArray(obj.submitArgs, "submitArgs"),
  };
}

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export const SCRIPT_FILE_NAME = "_slurm_script.sh";

export function sanitizeJobName(input: string): string {
  const safe = input
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "")
    .slice(0, 80);
  if (!safe) {
    throw new Error("job name cannot be empty after sanitization");
  }
  return safe;
}

export function expandHome(inputPath: string, homeDir: string = os.homedir()): string {
  if (inputPath === "~") {
    return homeDir;
  }
  if (inputPath.startsWith("~/")) {
    return path.join(homeDir, inputPath.slice(2));
  }
  return inputPath;
}

export function resolveScriptDir(params: {
  jobName: string;
  scriptDir?: string;
  homeDir?: string;
}): string {
  const homeDir = params.homeDir ?? os.homedir();
  const raw = params.scriptDir ?? path.join("~", "slurm", sanitizeJobName(params.jobName));
  return path.resolve(expandHome(raw, homeDir));
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

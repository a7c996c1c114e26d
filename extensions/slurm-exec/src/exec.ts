import { spawn } from "node:child_process";
import type { CommandResult, CommandRunner } from "./types.js";

function decode(chunks: Buffer[]): string {
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Runs a command to completion and captures both streams. Rejects only when the
 * command cannot be started; a non-zero exit is a result.
 */
export const defaultCommandRunner: CommandRunner = (command, args, options = {}) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.once("error", reject);
    child.once("close", (code) => {
      resolve({ code: code ?? 1, stdout: decode(stdout), stderr: decode(stderr) });
    });
  });

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

const FRAME_RULE = "*===============================================================================*";

export function frameLines(lines: string[]): string[] {
  return ["", FRAME_RULE, ...lines.map((line) => `|   ${line}`.trimEnd()), FRAME_RULE, ""];
}

export function logFramed(
  logger: Logger,
  lines: string[],
  level: "info" | "warn" | "error" = "info",
): void {
  for (const line of frameLines(lines)) {
    logger[level](line);
  }
}

const SAFE_SHELL_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/** Quotes a token only when the shell would otherwise split or expand it. */
export function shellWord(value: string): string {
  return SAFE_SHELL_WORD.test(value) ? value : shellQuote(value);
}

export function shellCommandLine(tokens: readonly string[]): string {
  return tokens.map((token) => shellWord(token)).join(" ");
}

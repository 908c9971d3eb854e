/**
 * Quoting for scripts run through `sh -lc` inside transfer pods
 */

const SAFE_ARGUMENT = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a single argument for a POSIX shell. Plain paths are left as-is.
 */
export function shellQuote(value: string): string {
  if (value !== "" && SAFE_ARGUMENT.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Join arguments into a single shell command line
 */
export function shellJoin(args: string[]): string {
  return args.map(shellQuote).join(" ");
}

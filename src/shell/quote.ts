/**
 * POSIX shell quoting.
 */

/** Quote `value` as one word for a POSIX shell. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

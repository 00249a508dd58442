/**
 * Shell-escape a string for safe interpolation into a remote shell command.
 * Wraps in single quotes and escapes embedded single quotes.
 *
 * @example shellEscape("foo'bar") => "'foo'\\''bar'"
 * @example shellEscape("normal") => "'normal'"
 */
export function shellEscape(arg: string): string {
  return "'" + arg.replace(/'/g, "'\\''") + "'";
}


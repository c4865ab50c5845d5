/**
 * Prepare raw user argv for commander so that none of it is parsed as wrapper
 * options. Commander consumes the first "--" as its own separator and hands
 * every token after it to the variadic argument untouched, including the
 * user's own "--", "-h" or "--version".
 */
export function toForwardedArgv(userArgs: string[]): string[] {
  return ['--', ...userArgs];
}

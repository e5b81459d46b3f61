import { parse } from 'shell-quote';
import { ConfigurationError } from '@margin/shared/Types/errors.js';

/**
 * Split a configured command line into program and arguments, shell-style.
 *
 * Quotes and backslash escapes are honored; `$VAR` stays literal because the
 * command never passes through a shell. A `#` comment ends the list.
 * Operators such as `|`, `&&` or `>` need a shell and are rejected.
 */
export function tokenizeCommand(commandLine: string): string[] {
  const tokens: string[] = [];
  for (const entry of parse(commandLine, (key) => `$${key}`)) {
    if (typeof entry === 'string') {
      tokens.push(entry);
      continue;
    }
    if ('comment' in entry) break;
    if (entry.op === 'glob') {
      tokens.push(entry.pattern);
      continue;
    }
    throw new ConfigurationError(
      `shell operator "${entry.op}" is not supported in a command; wrap it in "sh -c '...'"`,
      { command: commandLine },
    );
  }
  return tokens;
}

import { join, split } from 'shlex';
import { ConfigurationError } from '../shared/errors.js';
import type { Argv } from './types.js';

/**
 * Splits a command line into an argument vector: whitespace separates words,
 * quotes group them, backslash escapes the next character.
 *
 * There is no shell behind the result, so `$NAME`, globs, `#` and operator
 * characters such as `|` or `&` are ordinary word text.
 */
export function tokenize(line: string): Argv {
  let tokens: string[];
  try {
    tokens = split(line);
  } catch (err) {
    throw new ConfigurationError(
      `Cannot parse command line: ${err instanceof Error ? err.message : String(err)}`,
      { line },
    );
  }
  return toArgv(tokens, line);
}

export function toArgv(tokens: readonly string[], source?: string): Argv {
  const [program, ...rest] = tokens;
  if (program === undefined) {
    throw new ConfigurationError('Command must name a program', source === undefined ? undefined : { line: source });
  }
  return [program, ...rest];
}

export function render(argv: readonly string[]): string {
  return join([...argv]);
}

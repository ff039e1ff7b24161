/**
 * Redirection policy for one standard stream of a child process.
 *
 * - `inherit`: the child shares the caller's stream; nothing is captured.
 * - `pipe`: the child's stream is a pipe read (or, for stdin, written and closed) by the parent.
 * - `null`: the child's stream is the OS null device.
 */
export type Redirect = 'inherit' | 'pipe' | 'null';

export type StreamName = 'stdin' | 'stdout' | 'stderr';

export type StdioConfig = Record<StreamName, Redirect>;

/** Argument vector; element 0 names the program. */
export type Argv = readonly [string, ...string[]];

/** Result of `output()`: text by default, `Buffer` in binary mode. */
export interface Output<T extends string | Buffer = string> {
  /** Exit code, or the negated signal number when the child was killed by a signal. */
  readonly status: number;
  /** Captured content; `undefined` unless stdout was set to `pipe`. */
  readonly stdout?: T;
  /** Captured content; `undefined` unless stderr was set to `pipe`. */
  readonly stderr?: T;
  readonly success: boolean;
}

/** Frozen configuration handed to the spawner for one run. */
export interface SpawnRequest {
  readonly argv: Argv;
  readonly stdio: Readonly<StdioConfig>;
  readonly input?: string;
  /** When false, piped output is neither buffered nor returned. */
  readonly collect: boolean;
}

/** What the spawner reports before the builder decodes it. */
export interface RawOutput {
  readonly status: number;
  readonly stdout?: Buffer;
  readonly stderr?: Buffer;
}

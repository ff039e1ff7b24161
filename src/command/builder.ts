import { render, tokenize, toArgv } from './tokenizer.js';
import { spawnAsync, spawnSync } from './spawner.js';
import type { Argv, Output, RawOutput, Redirect, SpawnRequest, StdioConfig, StreamName } from './types.js';

/**
 * Shared state and chaining for {@link Command} and {@link BinaryCommand};
 * subclasses only choose how captured bytes are presented.
 */
abstract class CommandBase<T extends string | Buffer> {
  private readonly _argv: string[];
  private readonly _stdio: StdioConfig = { stdin: 'inherit', stdout: 'inherit', stderr: 'inherit' };
  private _input?: string;

  /**
   * @param command A command line split with shell quoting rules, or an
   *   argument vector used as given.
   * @throws ConfigurationError when no program is named or the line cannot be parsed.
   */
  constructor(command: string | readonly string[]) {
    const argv: Argv = typeof command === 'string' ? tokenize(command) : toArgv(command);
    this._argv = [...argv];
  }

  protected abstract decode(raw: Buffer): T;

  get argv(): Argv {
    return toArgv(this._argv);
  }

  get stdio(): Readonly<StdioConfig> {
    return { ...this._stdio };
  }

  /** Appends one argument verbatim; it is not tokenized. */
  arg(arg: string): this {
    this._argv.push(arg);
    return this;
  }

  args(args: Iterable<string>): this {
    for (const arg of args) {
      this._argv.push(arg);
    }
    return this;
  }

  stdin(redirect: Redirect): this {
    return this.redirect('stdin', redirect);
  }

  stdout(redirect: Redirect): this {
    return this.redirect('stdout', redirect);
  }

  stderr(redirect: Redirect): this {
    return this.redirect('stderr', redirect);
  }

  stdinPipe(): this {
    return this.stdin('pipe');
  }

  stdoutPipe(): this {
    return this.stdout('pipe');
  }

  stderrPipe(): this {
    return this.stderr('pipe');
  }

  stdinNull(): this {
    return this.stdin('null');
  }

  stdoutNull(): this {
    return this.stdout('null');
  }

  stderrNull(): this {
    return this.stderr('null');
  }

  stdinInherit(): this {
    return this.stdin('inherit');
  }

  stdoutInherit(): this {
    return this.stdout('inherit');
  }

  stderrInherit(): this {
    return this.stderr('inherit');
  }

  /** Pipes stdout and stderr; stdin is left as configured. */
  capture(): this {
    return this.stdoutPipe().stderrPipe();
  }

  allPipe(): this {
    return this.stdinPipe().stdoutPipe().stderrPipe();
  }

  allNull(): this {
    return this.stdinNull().stdoutNull().stderrNull();
  }

  /**
   * Feeds `text` to the child's stdin and switches stdin to `pipe`.
   * Redirecting stdin elsewhere afterwards leaves the text unused.
   */
  input(text: string): this {
    this._input = text;
    return this.stdinPipe();
  }

  /**
   * Runs the command and waits for it to exit.
   *
   * Piped streams are read to the end; streams that are not piped come back
   * `undefined`. A non-zero exit is reported in `status`, not thrown.
   *
   * @throws SpawnError when the process cannot be created.
   */
  async output(): Promise<Output<T>> {
    return this.present(await spawnAsync(this.request(true)));
  }

  /** Blocking form of `output()`. */
  outputSync(): Output<T> {
    return this.present(spawnSync(this.request(true)));
  }

  /**
   * Runs the command and resolves with its exit status.
   *
   * Piped output is never read. A child that writes more than the OS pipe
   * buffer into an unread pipe blocks forever; pair this with `inherit` or
   * `null` for chatty commands, or use `output()`.
   */
  async status(): Promise<number> {
    const { status } = await spawnAsync(this.request(false));
    return status;
  }

  /** Blocking form of `status()`. */
  statusSync(): number {
    return spawnSync(this.request(false)).status;
  }

  toString(): string {
    return render(this._argv);
  }

  /** Copies arguments, redirects and input onto another builder. */
  protected copyTo<C extends CommandBase<string | Buffer>>(target: C): C {
    if (this._input !== undefined) target.input(this._input);
    return target.stdin(this._stdio.stdin).stdout(this._stdio.stdout).stderr(this._stdio.stderr);
  }

  private redirect(stream: StreamName, redirect: Redirect): this {
    this._stdio[stream] = redirect;
    return this;
  }

  private request(collect: boolean): SpawnRequest {
    return {
      argv: this.argv,
      stdio: this.stdio,
      input: this._input,
      collect,
    };
  }

  private present(raw: RawOutput): Output<T> {
    return {
      status: raw.status,
      stdout: raw.stdout === undefined ? undefined : this.decode(raw.stdout),
      stderr: raw.stderr === undefined ? undefined : this.decode(raw.stderr),
      success: raw.status === 0,
    };
  }
}

/**
 * Process builder configured by method chaining.
 *
 * Every configuration method mutates the builder and returns it. Streams
 * default to `inherit`; the latest call for a stream wins. Captured output is
 * decoded as utf-8.
 *
 * A builder may be run any number of times. Each terminal call spawns one
 * independent process from the configuration as it stands at that moment.
 *
 * @example
 * const out = await new Command('grep -r TODO').arg('src').stdoutPipe().output();
 */
export class Command extends CommandBase<string> {
  /**
   * Returns a builder with the same configuration whose output keeps the
   * child's raw bytes. This builder is left unchanged.
   */
  binaryMode(): BinaryCommand {
    return this.copyTo(new BinaryCommand(this.argv));
  }

  protected decode(raw: Buffer): string {
    return raw.toString('utf8');
  }
}

/** A {@link Command} whose captured streams are returned as `Buffer`s. */
export class BinaryCommand extends CommandBase<Buffer> {
  protected decode(raw: Buffer): Buffer {
    return raw;
  }
}

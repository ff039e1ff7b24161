// Process boundary: every run of a Command passes through here.
// Maps the builder's redirect policies onto execa's stdio values, spawns,
// and settles the child into a RawOutput. Exit codes are data; only a child
// that never started (or overflowed its capture buffer) becomes an error.
import execa from 'execa';
import { constants } from 'node:os';
import { CommandError, CommandErrorCode, SpawnError } from '../shared/errors.js';
import { getConfig } from '../shared/config.js';
import { getLogger } from '../shared/logger.js';
import type { RawOutput, Redirect, SpawnRequest } from './types.js';

type ExecaStdio = 'inherit' | 'pipe' | 'ignore';

const STDIO: Record<Redirect, ExecaStdio> = {
  inherit: 'inherit',
  pipe: 'pipe',
  null: 'ignore',
};

function baseOptions(request: SpawnRequest) {
  return {
    stdin: STDIO[request.stdio.stdin],
    stdout: STDIO[request.stdio.stdout],
    stderr: STDIO[request.stdio.stderr],
    // A piped stdin is always written and closed, so children never wait on it.
    input: request.stdio.stdin === 'pipe' ? request.input ?? '' : undefined,
    // Bytes come back raw; the builder decodes them.
    encoding: null,
    stripFinalNewline: false,
    // Status-only runs keep nothing, so nothing can overflow.
    maxBuffer: request.collect ? getConfig().maxBuffer : Infinity,
    reject: false,
  };
}

export async function spawnAsync(request: SpawnRequest): Promise<RawOutput> {
  const [program, ...args] = request.argv;
  const options = baseOptions(request);
  getLogger().debug({ argv: request.argv, stdio: request.stdio }, 'spawning');

  let child: execa.ExecaChildProcess<Buffer> | undefined;
  let result: execa.ExecaReturnValue<Buffer>;
  try {
    child = execa(program, args, { ...options, buffer: request.collect });
    result = await child;
  } catch (err) {
    throw spawnFailure(request, err);
  } finally {
    // Unread pipes (status-only runs) would otherwise hold the event loop open.
    child?.stdout?.destroy();
    child?.stderr?.destroy();
  }
  return settle(request, result);
}

// The synchronous primitive always drains every pipe; `collect: false` only
// drops what it read.
export function spawnSync(request: SpawnRequest): RawOutput {
  const [program, ...args] = request.argv;
  const options = baseOptions(request);
  getLogger().debug({ argv: request.argv, stdio: request.stdio, sync: true }, 'spawning');

  let result: execa.ExecaSyncReturnValue<Buffer>;
  try {
    result = execa.sync(program, args, options);
  } catch (err) {
    throw spawnFailure(request, err);
  }
  return settle(request, result);
}

// With reject: false execa hands back non-zero exits, signals and spawn
// errors alike; only the first two carry a status.
function settle(request: SpawnRequest, result: execa.ExecaReturnBase<Buffer>): RawOutput {
  if (isOutputLimit(result)) {
    throw new CommandError(
      CommandErrorCode.OUTPUT_LIMIT,
      `Captured output exceeded ${getConfig().maxBuffer} bytes: ${request.argv[0]}`,
      { argv: request.argv },
    );
  }

  const status = statusOf(result);
  if (status === undefined) {
    throw spawnFailure(request, result);
  }

  getLogger().debug({ argv: request.argv, status }, 'exited');
  return {
    status,
    stdout: captured(request, 'stdout', result.stdout),
    stderr: captured(request, 'stderr', result.stderr),
  };
}

function captured(request: SpawnRequest, stream: 'stdout' | 'stderr', value: unknown): Buffer | undefined {
  if (!request.collect || request.stdio[stream] !== 'pipe') return undefined;
  return Buffer.isBuffer(value) ? value : Buffer.alloc(0);
}

function statusOf(result: execa.ExecaReturnBase<Buffer>): number | undefined {
  // exitCode is missing at run time when the child never exited normally.
  if (Number.isInteger(result.exitCode)) return result.exitCode;
  if (result.signal !== undefined && result.signal !== null) {
    const signalNumber = signalNumberOf(result.signal);
    if (signalNumber !== undefined) return -signalNumber;
  }
  return undefined;
}

function spawnFailure(request: SpawnRequest, err: unknown): SpawnError {
  const failure: object = typeof err === 'object' && err !== null ? err : {};
  return new SpawnError(`Failed to spawn ${request.argv[0]}`, {
    argv: request.argv,
    code: 'code' in failure && typeof failure.code === 'string' ? failure.code : undefined,
    cause: err instanceof Error ? err.message : String(err),
  });
}

function isOutputLimit(result: object): boolean {
  // async: get-stream's MaxBufferError; sync: spawnSync's ENOBUFS
  return ('name' in result && result.name === 'MaxBufferError') || ('code' in result && result.code === 'ENOBUFS');
}

function signalNumberOf(signal: string): number | undefined {
  for (const [name, value] of Object.entries(constants.signals)) {
    if (name === signal && typeof value === 'number') return value;
  }
  return undefined;
}

export enum CommandErrorCode {
  CONFIGURATION = 'CONFIGURATION',
  SPAWN_FAILED = 'SPAWN_FAILED',
  OUTPUT_LIMIT = 'OUTPUT_LIMIT',
}

export class CommandError extends Error {
  readonly code: CommandErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: CommandErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'CommandError';
    this.code = code;
    this.context = context;
  }
}

// Raised before anything is spawned: the command line or a setting is unusable.
export class ConfigurationError extends CommandError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(CommandErrorCode.CONFIGURATION, message, context);
    this.name = 'ConfigurationError';
  }
}

// The OS refused to create the child (missing executable, EACCES, EAGAIN...).
export class SpawnError extends CommandError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(CommandErrorCode.SPAWN_FAILED, message, context);
    this.name = 'SpawnError';
  }
}

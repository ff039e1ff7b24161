export { BinaryCommand, Command } from './command/builder.js';
export { tokenize } from './command/tokenizer.js';
export type { Argv, Output, Redirect, StdioConfig, StreamName } from './command/types.js';
export { CommandError, CommandErrorCode, ConfigurationError, SpawnError } from './shared/errors.js';
export { loadConfig } from './shared/config.js';
export type { CommandBuilderConfig, LogLevel } from './shared/config.js';

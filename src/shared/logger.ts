import pino from 'pino';
import type { Logger } from 'pino';
import { getConfig } from './config.js';

let instance: Logger | undefined;

// Built on first use so a bad COMMAND_BUILDER_LOG_LEVEL surfaces from the
// call that spawns, not from importing the package.
export function getLogger(): Logger {
  // fd 2: a child with inherited stdout must never see our records interleaved.
  instance ??= pino({ name: 'command-builder', level: getConfig().logLevel }, pino.destination(2));
  return instance;
}

import type * as Entry from '../../src/index.js';
import { BinaryCommand, Command, CommandErrorCode, ConfigurationError, SpawnError, loadConfig, tokenize } from '../../src/index.js';

describe('package entry point', () => {
  it('exposes the builder and its collaborators', () => {
    expect(new Command('git status').argv).toEqual(tokenize('git status'));
    expect(new Command('cat').binaryMode()).toBeInstanceOf(BinaryCommand);
    expect(loadConfig({}).logLevel).toBe('warn');
  });

  it('exposes the error taxonomy', () => {
    expect(new ConfigurationError('x').code).toBe(CommandErrorCode.CONFIGURATION);
    expect(new SpawnError('x').code).toBe(CommandErrorCode.SPAWN_FAILED);
  });
});

describe('invalid log level', () => {
  const previous = process.env['COMMAND_BUILDER_LOG_LEVEL'];

  afterEach(() => {
    if (previous === undefined) {
      delete process.env['COMMAND_BUILDER_LOG_LEVEL'];
    } else {
      process.env['COMMAND_BUILDER_LOG_LEVEL'] = previous;
    }
  });

  it('is reported by the call that spawns, not by the import', () => {
    process.env['COMMAND_BUILDER_LOG_LEVEL'] = 'loud';
    const loaded: { entry?: typeof Entry } = {};

    expect(() =>
      jest.isolateModules(() => {
        loaded.entry = require('../../src/index');
      }),
    ).not.toThrow();

    const entry = loaded.entry;
    if (entry === undefined) throw new Error('entry point did not load');
    const cmd = new entry.Command('echo hi').stdoutNull();
    expect(() => cmd.statusSync()).toThrow(/^Invalid COMMAND_BUILDER_LOG_LEVEL: /);
  });
});

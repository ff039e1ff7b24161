import { CommandError, CommandErrorCode, ConfigurationError, SpawnError } from '../../../src/shared/errors.js';

describe('ConfigurationError', () => {
  it('carries the rejected command line', () => {
    const err = new ConfigurationError('Command must name a program', { line: '   ' });
    expect(err).toBeInstanceOf(CommandError);
    expect(err).toMatchObject({
      name: 'ConfigurationError',
      code: CommandErrorCode.CONFIGURATION,
      context: { line: '   ' },
    });
  });

  it('may omit context', () => {
    expect(new ConfigurationError('Command must name a program').context).toBeUndefined();
  });
});

describe('SpawnError', () => {
  it('carries the argument vector and underlying cause', () => {
    const err = new SpawnError('Failed to spawn nope', { argv: ['nope', '-v'], code: 'ENOENT' });
    expect(err).toBeInstanceOf(CommandError);
    expect(err).toMatchObject({
      name: 'SpawnError',
      code: CommandErrorCode.SPAWN_FAILED,
      message: 'Failed to spawn nope',
      context: { argv: ['nope', '-v'], code: 'ENOENT' },
    });
  });
});

describe('CommandError', () => {
  it('is the common base for output limits', () => {
    const err = new CommandError(CommandErrorCode.OUTPUT_LIMIT, 'Captured output exceeded 10 bytes: node');
    expect(err.name).toBe('CommandError');
    expect(err).not.toBeInstanceOf(SpawnError);
  });
});

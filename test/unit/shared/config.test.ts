import { loadConfig } from '../../../src/shared/config.js';
import { ConfigurationError } from '../../../src/shared/errors.js';

describe('loadConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'warn', maxBuffer: 100_000_000 });
  });

  it('reads level and buffer ceiling from the environment', () => {
    const config = loadConfig({
      COMMAND_BUILDER_LOG_LEVEL: 'debug',
      COMMAND_BUILDER_MAX_BUFFER: '1024',
    });
    expect(config).toEqual({ logLevel: 'debug', maxBuffer: 1024 });
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ COMMAND_BUILDER_LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ COMMAND_BUILDER_LOG_LEVEL: 'loud' })).toThrow(
      /^Invalid COMMAND_BUILDER_LOG_LEVEL: /,
    );
  });

  it('rejects a non-positive buffer ceiling', () => {
    expect(() => loadConfig({ COMMAND_BUILDER_MAX_BUFFER: '-5' })).toThrow(
      /^Invalid COMMAND_BUILDER_MAX_BUFFER: /,
    );
  });

  it('records the offending variable in the error context', () => {
    try {
      loadConfig({ COMMAND_BUILDER_MAX_BUFFER: 'lots' });
      throw new Error('expected loadConfig to throw');
    } catch (err) {
      expect(err).toMatchObject({
        code: 'CONFIGURATION',
        context: { variable: 'COMMAND_BUILDER_MAX_BUFFER', value: 'lots' },
      });
    }
  });
});

import { buildConfig, parseEnv, resolveSessionConfig } from '../../src/cli/config';
import type { RawEnv } from '../../src/cli/config';
import { parseBooleanFlag } from '../../src/shared/utils/envFlags';

function parsedEnv(env: Record<string, string | undefined>): RawEnv {
  const result = parseEnv(env);
  if (!result.success || !result.data) {
    throw new Error(`unexpected validation failure: ${JSON.stringify(result.errors)}`);
  }
  return result.data;
}

describe('environment configuration', () => {
  it('applies defaults to an empty environment', () => {
    expect(parsedEnv({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'warn',
      LOG_FORMAT: 'pretty',
      PERFTREE_REFERENCE_ENGINE: 'stockfish',
      PERFTREE_QUERY_TIMEOUT_MS: 600000,
      PERFTREE_CHESS960: false,
      PERFTREE_DEFAULT_DEPTH: 1,
    });
  });

  it('coerces numeric and boolean variables', () => {
    const env = parsedEnv({
      PERFTREE_QUERY_TIMEOUT_MS: '0',
      PERFTREE_CHESS960: 'yes',
      PERFTREE_DEFAULT_DEPTH: '4',
    });

    expect(env.PERFTREE_QUERY_TIMEOUT_MS).toBe(0);
    expect(env.PERFTREE_CHESS960).toBe(true);
    expect(env.PERFTREE_DEFAULT_DEPTH).toBe(4);
  });

  it('reports invalid values by path', () => {
    const result = parseEnv({ LOG_LEVEL: 'chatty', PERFTREE_QUERY_TIMEOUT_MS: '-5' });

    expect(result.success).toBe(false);
    expect(result.errors?.map((error) => error.path).sort()).toEqual([
      'LOG_LEVEL',
      'PERFTREE_QUERY_TIMEOUT_MS',
    ]);
  });

  it('builds the typed config under Jest as the test environment', () => {
    const config = buildConfig(
      parsedEnv({ NODE_ENV: 'production', LOG_FILE: '  ', PERFTREE_REFERENCE_ENGINE: ' sf ' })
    );

    expect(config.nodeEnv).toBe('test');
    expect(config.isTest).toBe(true);
    expect(config.logging.file).toBeUndefined();
    expect(config.engines.referenceCommand).toBe('sf');
  });

  it('layers command-line overrides over the environment', () => {
    const base = buildConfig(parsedEnv({ PERFTREE_DEFAULT_DEPTH: '2' }));

    expect(resolveSessionConfig({ scriptCommand: './perft.sh' }, base)).toEqual({
      scriptCommand: './perft.sh',
      referenceCommand: 'stockfish',
      queryTimeoutMs: 600000,
      chess960: false,
      defaultDepth: 2,
    });
    expect(
      resolveSessionConfig(
        {
          scriptCommand: './perft.sh',
          referenceCommand: '/opt/sf',
          queryTimeoutMs: 50,
          chess960: true,
        },
        base
      )
    ).toMatchObject({ referenceCommand: '/opt/sf', queryTimeoutMs: 50, chess960: true });
  });

  describe('parseBooleanFlag', () => {
    it('accepts common truthy spellings', () => {
      for (const raw of ['1', 'true', 'TRUE', 'yes', 'on', ' On ']) {
        expect(parseBooleanFlag(raw)).toBe(true);
      }
    });

    it('treats other values as false and unset as the default', () => {
      expect(parseBooleanFlag('0', true)).toBe(false);
      expect(parseBooleanFlag('off', true)).toBe(false);
      expect(parseBooleanFlag(undefined, true)).toBe(true);
      expect(parseBooleanFlag('', false)).toBe(false);
    });
  });
});

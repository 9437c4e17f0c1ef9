import { describe, expect, it } from 'vitest';
import { resolveCliConfig } from './cli-config.js';

describe('resolveCliConfig', () => {
  it('defaults to info logging and no overrides', () => {
    const config = resolveCliConfig({}, {});

    expect(config.logLevel).toBe('info');
    expect(config.compile).toEqual({});
    expect(config.encoder).toEqual({});
    expect(config.workDir).toBeUndefined();
  });

  it('reads TIMEWEAVE_* environment variables', () => {
    const config = resolveCliConfig(
      {},
      {
        TIMEWEAVE_LOG_LEVEL: 'debug',
        TIMEWEAVE_FFMPEG_PATH: '/opt/ffmpeg',
        TIMEWEAVE_CRF: '20',
        TIMEWEAVE_DUCKING_DB: '-9',
        TIMEWEAVE_WORK_DIR: '/var/tmp/timeweave',
      },
    );

    expect(config).toEqual({
      logLevel: 'debug',
      compile: { duckingDb: -9 },
      encoder: { ffmpegPath: '/opt/ffmpeg', crf: 20 },
      workDir: '/var/tmp/timeweave',
    });
  });

  it('lets flags win over the environment', () => {
    const config = resolveCliConfig(
      { logLevel: 'warn', preset: 'veryfast', probeConcurrency: 2 },
      { TIMEWEAVE_LOG_LEVEL: 'debug', TIMEWEAVE_PRESET: 'slow', TIMEWEAVE_PROBE_CONCURRENCY: '8' },
    );

    expect(config.logLevel).toBe('warn');
    expect(config.encoder.preset).toBe('veryfast');
    expect(config.compile.probeConcurrency).toBe(2);
  });

  it('rejects unknown log levels and non-numeric values together', () => {
    let thrown: unknown;
    try {
      resolveCliConfig({ logLevel: 'loud' }, { TIMEWEAVE_PROBE_TIMEOUT_MS: 'soon' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toMatchObject({
      kind: 'ValidationError',
      issues: [
        { code: 'V016', location: { context: 'logLevel' } },
        { code: 'V016', location: { context: 'TIMEWEAVE_PROBE_TIMEOUT_MS' } },
      ],
    });
  });
});

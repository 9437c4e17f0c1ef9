import process from 'node:process';
import {
  ValidationErrorCode,
  createValidationError,
  createValidationIssue,
  isLogLevel,
  type CompileOptions,
  type LogLevel,
  type ValidationIssue,
} from '@timeweave/core';
import type { EncoderOptions } from '@timeweave/media';

/**
 * Settings a command line run can change. Every field is optional.
 */
export interface CliFlags {
  logLevel?: string;
  ffmpegPath?: string;
  ffprobePath?: string;
  preset?: string;
  crf?: number;
  audioBitrate?: string;
  probeConcurrency?: number;
  probeTimeoutMs?: number;
  duckingDb?: number;
  workDir?: string;
}

export interface CliConfig {
  logLevel: LogLevel;
  compile: CompileOptions;
  encoder: EncoderOptions;
  /** Directory for downloads and render side files; OS temp dir when unset */
  workDir?: string;
}

/**
 * Environment variable for each flag. `.env` files are loaded into the
 * environment before this is read.
 */
export const CLI_ENV_VARS = {
  logLevel: 'TIMEWEAVE_LOG_LEVEL',
  ffmpegPath: 'TIMEWEAVE_FFMPEG_PATH',
  ffprobePath: 'TIMEWEAVE_FFPROBE_PATH',
  preset: 'TIMEWEAVE_PRESET',
  crf: 'TIMEWEAVE_CRF',
  audioBitrate: 'TIMEWEAVE_AUDIO_BITRATE',
  probeConcurrency: 'TIMEWEAVE_PROBE_CONCURRENCY',
  probeTimeoutMs: 'TIMEWEAVE_PROBE_TIMEOUT_MS',
  duckingDb: 'TIMEWEAVE_DUCKING_DB',
  workDir: 'TIMEWEAVE_WORK_DIR',
} as const satisfies Record<keyof CliFlags, string>;

/**
 * Merge flags over environment variables. Flags win.
 */
export function resolveCliConfig(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): CliConfig {
  const issues: ValidationIssue[] = [];

  const text = (key: keyof typeof CLI_ENV_VARS, flag: string | undefined): string | undefined => {
    const value = flag ?? env[CLI_ENV_VARS[key]];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };

  const number = (key: keyof typeof CLI_ENV_VARS, flag: number | undefined): number | undefined => {
    if (flag !== undefined) {
      return flag;
    }
    const raw = text(key, undefined);
    if (raw === undefined) {
      return undefined;
    }
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
      issues.push(
        createValidationIssue(
          ValidationErrorCode.INVALID_COMPILE_OPTION,
          `${CLI_ENV_VARS[key]} must be a number, got "${raw}".`,
          { context: CLI_ENV_VARS[key] },
        ),
      );
      return undefined;
    }
    return parsed;
  };

  const levelText = text('logLevel', flags.logLevel) ?? 'info';
  let logLevel: LogLevel = 'info';
  if (isLogLevel(levelText)) {
    logLevel = levelText;
  } else {
    issues.push(
      createValidationIssue(
        ValidationErrorCode.INVALID_COMPILE_OPTION,
        `Invalid log level "${levelText}". Use debug, info, warn, error or silent.`,
        { context: 'logLevel' },
      ),
    );
  }

  const config: CliConfig = {
    logLevel,
    compile: {
      probeConcurrency: number('probeConcurrency', flags.probeConcurrency),
      probeTimeoutMs: number('probeTimeoutMs', flags.probeTimeoutMs),
      duckingDb: number('duckingDb', flags.duckingDb),
    },
    encoder: {
      ffmpegPath: text('ffmpegPath', flags.ffmpegPath),
      ffprobePath: text('ffprobePath', flags.ffprobePath),
      preset: text('preset', flags.preset),
      crf: number('crf', flags.crf),
      audioBitrate: text('audioBitrate', flags.audioBitrate),
    },
    workDir: text('workDir', flags.workDir),
  };

  if (issues.length > 0) {
    throw createValidationError(issues);
  }
  return config;
}

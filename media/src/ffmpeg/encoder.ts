import { execFile } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import {
  EncoderErrorCode,
  createEncoderError,
  type CompositionPlan,
  type Logger,
} from '@timeweave/core';
import { buildFfmpegCommand } from './command-builder.js';
import { readProcessFields } from './process-errors.js';
import { renderSrt } from './srt-writer.js';
import type {
  EncoderOptions,
  FfmpegCommand,
  FfmpegProgressSnapshot,
  RunEncoderOptions,
} from './types.js';

const MAX_FFMPEG_STDIO_BUFFER_BYTES = 64 * 1024 * 1024;
const FFMPEG_PROGRESS_PERCENT_STEP = 10;

/**
 * Run a built ffmpeg command to completion.
 *
 * Progress is logged in 10% steps when the expected duration is known.
 * Failures are never retried; they surface as EncoderError with ffmpeg's
 * stderr attached.
 */
export async function runEncoder(command: FfmpegCommand, options: RunEncoderOptions = {}): Promise<void> {
  const { logger = {}, signal, duration = 0 } = options;
  const startedAt = Date.now();
  let lastBucket = -1;

  logger.info?.('encoder.start', { inputs: command.inputFiles.length, output: command.outputPath });
  logger.debug?.('encoder.command', { ffmpegPath: command.ffmpegPath, args: command.args });

  await execFfmpeg(command.ffmpegPath, command.args, signal, (line) => {
    const snapshot = duration > 0 ? parseFfmpegProgressLine(line) : null;
    if (!snapshot) {
      return;
    }
    const rendered = Math.min(snapshot.timeSeconds, duration);
    const percent = Math.min(100, Math.floor((rendered / duration) * 100));
    const bucket = Math.floor(percent / FFMPEG_PROGRESS_PERCENT_STEP);
    if (bucket > lastBucket) {
      lastBucket = bucket;
      logger.info?.('encoder.progress', { percent, seconds: rendered, speed: snapshot.speed });
    }
  });

  logger.info?.('encoder.done', {
    output: command.outputPath,
    elapsedSeconds: Math.max(1, Math.floor((Date.now() - startedAt) / 1000)),
  });
}

export interface RenderPlanOptions extends EncoderOptions {
  /** Directory for the temporary SRT file; defaults to the OS temp dir */
  workDir?: string;
  signal?: AbortSignal;
  logger?: Partial<Logger>;
}

/**
 * Render a composition plan to an MP4 file: write the subtitle side file,
 * build the command and run ffmpeg once.
 */
export async function renderPlan(
  plan: CompositionPlan,
  outputPath: string,
  options: RenderPlanOptions = {},
): Promise<FfmpegCommand> {
  const { workDir, signal, logger = {}, ...encoderOptions } = options;
  const tempDir = join(workDir ?? tmpdir(), `timeweave-render-${randomUUID()}`);

  try {
    let subtitlePath: string | undefined;
    if (plan.subtitles.length > 0) {
      subtitlePath = join(tempDir, 'subtitles.srt');
      await writeSubtitles(subtitlePath, plan);
    }

    const command = buildFfmpegCommand(plan, outputPath, encoderOptions, { subtitlePath });
    await runEncoder(command, { duration: plan.output.duration, signal, logger });
    return command;
  } finally {
    await rm(tempDir, { recursive: true, force: true }).catch((error: unknown) => {
      logger.warn?.('encoder.cleanup.failed', {
        path: tempDir,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }
}

async function writeSubtitles(path: string, plan: CompositionPlan): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, renderSrt(plan.subtitles), 'utf8');
  } catch (error) {
    throw createEncoderError(
      EncoderErrorCode.SUBTITLE_WRITE_FAILED,
      `Failed to write subtitle file '${path}'.`,
      { cause: error },
    );
  }
}

/**
 * Runs ffmpeg to completion, handing each complete stderr line to `onLine`
 * as it arrives.
 */
async function execFfmpeg(
  ffmpegPath: string,
  args: string[],
  signal: AbortSignal | undefined,
  onLine: (line: string) => void,
): Promise<void> {
  let stderr = '';
  let pending = '';

  try {
    await new Promise<void>((resolve, reject) => {
      const child = execFile(ffmpegPath, args, { maxBuffer: MAX_FFMPEG_STDIO_BUFFER_BYTES, signal }, (error) =>
        error ? reject(error) : resolve(),
      );
      child.stderr?.on('data', (chunk) => {
        const text = String(chunk);
        stderr += text;
        const lines = (pending + text).split(/\r\n|\r|\n/);
        pending = lines.pop() ?? '';
        lines.forEach(onLine);
      });
    });
  } catch (error) {
    throw mapFfmpegError(error, ffmpegPath, stderr);
  }
}

function mapFfmpegError(error: unknown, ffmpegPath: string, streamedStderr: string): Error {
  if (error instanceof Error && error.name === 'AbortError') {
    return createEncoderError(EncoderErrorCode.FFMPEG_FAILED, 'FFmpeg render was cancelled.', { cause: error });
  }

  const fields = readProcessFields(error);
  const stderr = streamedStderr.trim() || fields.stderr;

  if (fields.code === 'ENOENT') {
    return createEncoderError(
      EncoderErrorCode.FFMPEG_NOT_FOUND,
      `FFmpeg not found at '${ffmpegPath}'. Ensure FFmpeg is installed and in your PATH.`,
      { cause: error, suggestion: 'Set TIMEWEAVE_FFMPEG_PATH or pass --ffmpeg-path.' },
    );
  }

  let exit = 'Unknown exit reason';
  if (fields.signal) {
    exit = `Killed by ${fields.signal}`;
  } else if (typeof fields.code === 'number') {
    exit = `Exit code: ${fields.code}`;
  }
  const detail = stderr || (error instanceof Error ? error.message : String(error));
  return createEncoderError(EncoderErrorCode.FFMPEG_FAILED, `FFmpeg render failed. ${exit}\n${detail}`, {
    cause: error,
  });
}

const PROGRESS_TIME = /time=(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/;
const PROGRESS_SPEED = /speed=\s*([\d.]+)x/;

/**
 * Reads the output position and speed from an ffmpeg status line.
 */
export function parseFfmpegProgressLine(line: string): FfmpegProgressSnapshot | null {
  const time = PROGRESS_TIME.exec(line);
  if (!time) {
    return null;
  }
  const [, hours, minutes, seconds] = time;
  const speed = PROGRESS_SPEED.exec(line);
  return {
    timeSeconds: Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds),
    speed: speed ? Number(speed[1]) : null,
  };
}

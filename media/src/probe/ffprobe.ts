import { execFile } from 'node:child_process';
import {
  RuntimeErrorCode,
  createAssetUnavailableError,
  type MediaInfo,
  type MediaProbe,
  type ProbeRequest,
} from '@timeweave/core';
import { FFMPEG_DEFAULTS } from '../ffmpeg/types.js';
import { readProcessFields } from '../ffmpeg/process-errors.js';

const MAX_FFPROBE_STDIO_BUFFER_BYTES = 10 * 1024 * 1024;

export interface FfprobeProbeOptions {
  /** Path to the ffprobe binary (default: 'ffprobe') */
  ffprobePath?: string;
}

/**
 * Creates a media probe backed by ffprobe.
 *
 * One ffprobe call per asset reads the container duration and every
 * stream's type and size.
 */
export function createFfprobeProbe(options: FfprobeProbeOptions = {}): MediaProbe {
  const ffprobePath = options.ffprobePath ?? FFMPEG_DEFAULTS.ffprobePath;

  return async (request) => {
    const stdout = await runFfprobe(ffprobePath, request);
    return parseFfprobeOutput(stdout, request.assetRef);
  };
}

async function runFfprobe(ffprobePath: string, request: ProbeRequest): Promise<string> {
  const { assetRef, localPath } = request;
  try {
    return await new Promise<string>((resolve, reject) => {
      execFile(
        ffprobePath,
        [
          '-v',
          'error',
          '-show_entries',
          'format=duration:stream=codec_type,width,height',
          '-of',
          'json',
          localPath,
        ],
        { encoding: 'utf8', maxBuffer: MAX_FFPROBE_STDIO_BUFFER_BYTES },
        (error, stdout) => {
          if (error) {
            reject(error);
            return;
          }
          resolve(stdout);
        },
      );
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const { code, stderr } = readProcessFields(error);
    const details = stderr || message;

    if (code === 'ENOENT') {
      throw createAssetUnavailableError(
        RuntimeErrorCode.ASSET_PROBE_FAILED,
        assetRef,
        `ffprobe was not found at '${ffprobePath}' while probing '${localPath}'. Ensure FFmpeg tools are installed and ffprobe is available in PATH.`,
        { cause: error, suggestion: 'Set TIMEWEAVE_FFPROBE_PATH or pass --ffprobe-path.' },
      );
    }

    if (details.includes('No such file or directory')) {
      throw createAssetUnavailableError(
        RuntimeErrorCode.ASSET_PROBE_FAILED,
        assetRef,
        `Failed to probe asset '${assetRef}' at '${localPath}': source file was not found.`,
        { cause: error },
      );
    }

    throw createAssetUnavailableError(
      RuntimeErrorCode.ASSET_PROBE_FAILED,
      assetRef,
      `Failed to probe asset '${assetRef}' at '${localPath}'. ${details}`,
      { cause: error },
    );
  }
}

/**
 * Reads ffprobe's `-of json` output. The container duration wins; the
 * first video stream supplies the resolution.
 */
export function parseFfprobeOutput(stdout: string, assetRef: string): MediaInfo {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw createAssetUnavailableError(
      RuntimeErrorCode.ASSET_PROBE_FAILED,
      assetRef,
      `ffprobe returned unreadable output for '${assetRef}'.`,
      { cause: error },
    );
  }

  const format: Record<string, unknown> = isRecord(parsed) && isRecord(parsed.format) ? parsed.format : {};
  const streams = isRecord(parsed) && Array.isArray(parsed.streams) ? parsed.streams.filter(isRecord) : [];
  const duration = typeof format.duration === 'string' || typeof format.duration === 'number'
    ? Number(format.duration)
    : Number.NaN;

  if (!Number.isFinite(duration) || duration <= 0) {
    throw createAssetUnavailableError(
      RuntimeErrorCode.ASSET_PROBE_FAILED,
      assetRef,
      `ffprobe reported no usable duration for '${assetRef}'.`,
      { suggestion: 'Still images and streams without a container duration cannot be timed.' },
    );
  }

  const video = streams.find((stream) => stream.codec_type === 'video');
  const info: MediaInfo = {
    duration,
    hasVideo: video !== undefined,
    hasAudio: streams.some((stream) => stream.codec_type === 'audio'),
  };
  if (video && typeof video.width === 'number' && typeof video.height === 'number') {
    info.width = video.width;
    info.height = video.height;
  }
  return info;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

import type { Logger } from '@timeweave/core';

/**
 * A fully built ffmpeg invocation.
 */
export interface FfmpegCommand {
  /** Path to the FFmpeg binary */
  ffmpegPath: string;
  /** Command arguments */
  args: string[];
  /** Input files, in `-i` order */
  inputFiles: string[];
  /** The filter_complex graph passed with the arguments */
  filterGraph: string;
  /** Output file path */
  outputPath: string;
}

/**
 * Encoder settings exposed as configuration.
 */
export interface EncoderOptions {
  /** Path to the FFmpeg binary */
  ffmpegPath?: string;
  /** Path to the ffprobe binary */
  ffprobePath?: string;
  /** x264 encoding preset */
  preset?: string;
  /** Constant rate factor (0-51) */
  crf?: number;
  /** AAC bitrate, e.g. '192k' */
  audioBitrate?: string;
}

export type ResolvedEncoderOptions = Required<EncoderOptions>;

export const FFMPEG_DEFAULTS: ResolvedEncoderOptions = {
  ffmpegPath: 'ffmpeg',
  ffprobePath: 'ffprobe',
  preset: 'medium',
  crf: 23,
  audioBitrate: '192k',
};

export function resolveEncoderOptions(options: EncoderOptions = {}): ResolvedEncoderOptions {
  return {
    ffmpegPath: options.ffmpegPath ?? FFMPEG_DEFAULTS.ffmpegPath,
    ffprobePath: options.ffprobePath ?? FFMPEG_DEFAULTS.ffprobePath,
    preset: options.preset ?? FFMPEG_DEFAULTS.preset,
    crf: options.crf ?? FFMPEG_DEFAULTS.crf,
    audioBitrate: options.audioBitrate ?? FFMPEG_DEFAULTS.audioBitrate,
  };
}

/**
 * Side files the command refers to besides the plan inputs.
 */
export interface SideFiles {
  /** SRT file holding the plan's subtitle cues */
  subtitlePath?: string;
}

/**
 * Parsed from ffmpeg's `time=... speed=...x` status lines.
 */
export interface FfmpegProgressSnapshot {
  timeSeconds: number;
  speed: number | null;
}

export interface RunEncoderOptions {
  /** Expected output duration, used to report progress as a percentage */
  duration?: number;
  signal?: AbortSignal;
  logger?: Partial<Logger>;
}

export { createFfprobeProbe, parseFfprobeOutput } from './probe/ffprobe.js';
export type { FfprobeProbeOptions } from './probe/ffprobe.js';

export { createAssetFetcher, downloadFileName, isRemoteReference } from './assets/fetcher.js';
export type { AssetFetcherOptions } from './assets/fetcher.js';

export { buildFfmpegCommand, escapeFilterPath } from './ffmpeg/command-builder.js';
export { buildAudioMixFilter, buildVolumeFilter } from './ffmpeg/audio-mixer.js';
export { formatSrtTimestamp, renderSrt } from './ffmpeg/srt-writer.js';
export { parseFfmpegProgressLine, renderPlan, runEncoder } from './ffmpeg/encoder.js';
export type { RenderPlanOptions } from './ffmpeg/encoder.js';
export { FFMPEG_DEFAULTS, resolveEncoderOptions } from './ffmpeg/types.js';
export type {
  EncoderOptions,
  FfmpegCommand,
  FfmpegProgressSnapshot,
  ResolvedEncoderOptions,
  RunEncoderOptions,
  SideFiles,
} from './ffmpeg/types.js';

/**
 * Shared builders for compiler tests.
 */
import type { AssetTable, MediaInfo, MediaProbe, ResolvedAsset } from '../assets/types.js';
import type { ResolvedCompileOptions } from '../config.js';
import { COMPILER_DEFAULTS } from '../config.js';
import { OUTPUT_DEFAULTS } from '../spec/parser.js';
import { parseSpec } from '../spec/validator.js';
import type { ClipSpec, VideoSpec } from '../spec/types.js';

export const TEST_OPTIONS: ResolvedCompileOptions = { ...COMPILER_DEFAULTS };

/** A resolved video asset with audio, 1920x1080 unless overridden. */
export function videoAsset(ref: string, duration: number, overrides: Partial<MediaInfo> = {}): ResolvedAsset {
  return {
    ref,
    localPath: `/media/${ref}`,
    duration,
    width: 1920,
    height: 1080,
    hasVideo: true,
    hasAudio: true,
    ...overrides,
  };
}

/** A resolved audio-only asset. */
export function audioAsset(ref: string, duration: number): ResolvedAsset {
  return { ref, localPath: `/media/${ref}`, duration, hasVideo: false, hasAudio: true };
}

export function assetTable(...assets: ResolvedAsset[]): AssetTable {
  return new Map(assets.map((asset) => [asset.ref, asset]));
}

/** Parses a document that the test expects to be valid. */
export function specFrom(raw: unknown): VideoSpec {
  return parseSpec(raw);
}

/** A clip using `<id>.mp4` as its asset. */
export function clipSpec(id: string, start: number, end: number, overrides: Partial<ClipSpec> = {}): ClipSpec {
  return {
    id,
    asset: `${id}.mp4`,
    start,
    end,
    allowTrim: false,
    gainDb: 0,
    blank: false,
    color: 'black',
    ...overrides,
  };
}

/**
 * Builds a VideoSpec directly, bypassing validation, so later stages can be
 * fed inputs the validator would refuse.
 */
export function rawVideoSpec(clips: ClipSpec[], overrides: Partial<VideoSpec> = {}): VideoSpec {
  return {
    output: { ...OUTPUT_DEFAULTS },
    clips,
    overlays: [],
    subtitles: [],
    audio: [],
    totalDuration: clips.reduce((max, clip) => Math.max(max, clip.end), 0),
    ...overrides,
  };
}

/**
 * Probe backed by a fixed table. Unknown references reject like a missing file.
 */
export function tableProbe(assets: AssetTable): MediaProbe {
  return async ({ assetRef }) => {
    const asset = assets.get(assetRef);
    if (!asset) {
      throw new Error(`No such file: ${assetRef}`);
    }
    return {
      duration: asset.duration,
      width: asset.width,
      height: asset.height,
      hasVideo: asset.hasVideo,
      hasAudio: asset.hasAudio,
    };
  };
}

import { createInternalConsistencyError, createTimelineOverlapError } from '../errors/index.js';
import type { AssetTable } from '../assets/types.js';
import type { ResolvedCompileOptions } from '../config.js';
import type { AudioTrackSpec, Seconds, TimeRange, VideoSpec } from '../spec/types.js';
import type { CompiledTimeline, TimeTransform } from '../timeline/compiler.js';
import { clipRange, mergeRanges, sortByStart } from '../timeline/intervals.js';

export type AudioLayerKind = 'narration' | 'base' | 'bgm';

/**
 * Constant gain over [start, end).
 */
export interface GainSegment {
  start: Seconds;
  end: Seconds;
  gainDb: number;
}

/**
 * One time-bounded audio layer of the mix.
 */
export interface AudioLayer {
  id: string;
  kind: AudioLayerKind;
  assetRef: string;
  /** Base layers only: the timeline segment the audio belongs to */
  segmentIndex?: number;
  /** Timeline position */
  start: Seconds;
  end: Seconds;
  /** Offset into the source where the layer begins */
  sourceIn: Seconds;
  /** Repeat the source from sourceIn until the layer ends */
  loop: boolean;
  /** Gain before ducking */
  gainDb: number;
  fadeIn: Seconds;
  fadeOut: Seconds;
  /** 0 = narration, 1 = base, 2 = bgm */
  priority: number;
  /** Piecewise-constant gain covering [start, end] */
  envelope: GainSegment[];
}

/**
 * A base segment whose own audio is dropped because its video is time-stretched.
 */
export interface SilencedRange {
  segmentIndex: number;
  clipId: string;
  start: Seconds;
  end: Seconds;
  reason: Extract<TimeTransform, 'slow-motion' | 'speed-up'>;
}

export interface AudioMixPlan {
  totalDuration: Seconds;
  duckingDb: number;
  /** Merged narration intervals */
  duckingIntervals: TimeRange[];
  /** Ordered by priority, then start, then id */
  layers: AudioLayer[];
  silenced: SilencedRange[];
}

const LAYER_PRIORITY: Record<AudioLayerKind, number> = {
  narration: 0,
  base: 1,
  bgm: 2,
};

type MixOptions = Pick<ResolvedCompileOptions, 'duckingDb' | 'gapTolerance'>;

/**
 * Builds the layered mix: narration at full gain, base and bgm ducked while
 * narration plays, bgm looped to the end of the timeline.
 *
 * Raw audio of a time-stretched segment is never pitch-stretched; the
 * segment is recorded as silenced instead.
 */
export function planAudioMix(
  spec: VideoSpec,
  timeline: CompiledTimeline,
  assets: AssetTable,
  options: MixOptions,
): AudioMixPlan {
  const { totalDuration } = timeline;
  const bounds: TimeRange = { start: 0, end: totalDuration };
  const layers: Array<Omit<AudioLayer, 'envelope'>> = [];
  const silenced: SilencedRange[] = [];

  for (const segment of timeline.segments) {
    if (segment.assetRef === null || !segment.hasAudio) {
      continue;
    }
    if (segment.timeTransform === 'slow-motion' || segment.timeTransform === 'speed-up') {
      silenced.push({
        segmentIndex: segment.index,
        clipId: segment.clipId,
        start: segment.start,
        end: segment.end,
        reason: segment.timeTransform,
      });
      continue;
    }
    layers.push({
      id: `base:${segment.clipId}`,
      kind: 'base',
      assetRef: segment.assetRef,
      segmentIndex: segment.index,
      start: segment.start,
      end: segment.end,
      sourceIn: segment.trimIn,
      loop: false,
      gainDb: segment.gainDb,
      fadeIn: 0,
      fadeOut: 0,
      priority: LAYER_PRIORITY.base,
    });
  }

  // Unclipped end of every placed track, for tracks that follow it.
  const trackEnds = new Map<string, Seconds>();
  for (const track of spec.audio) {
    const start = track.after === undefined ? track.start : trackEnds.get(track.after);
    if (start === undefined) {
      throw createInternalConsistencyError(
        `Audio track '${track.id}' follows '${track.after}', which was not placed before it.`,
        'audio',
      );
    }
    const placed = buildTrackLayer({ ...track, start }, assets, bounds, options.gapTolerance);
    trackEnds.set(track.id, placed.end);
    if (placed.layer) {
      layers.push(placed.layer);
    }
  }

  const narration = sortByStart(layers.filter((layer) => layer.kind === 'narration'));
  assertNarrationDisjoint(narration, options.gapTolerance);
  const duckingIntervals = mergeRanges(narration, 0);

  const ordered = [...layers].sort(
    (a, b) => a.priority - b.priority || a.start - b.start || a.id.localeCompare(b.id),
  );

  return {
    totalDuration,
    duckingDb: options.duckingDb,
    duckingIntervals,
    layers: ordered.map((layer) => ({
      ...layer,
      envelope:
        layer.kind === 'narration'
          ? [{ start: layer.start, end: layer.end, gainDb: layer.gainDb }]
          : buildGainEnvelope(layer, duckingIntervals, options.duckingDb),
    })),
    silenced,
  };
}

function buildTrackLayer(
  track: AudioTrackSpec,
  assets: AssetTable,
  bounds: TimeRange,
  tolerance: number,
): { end: Seconds; layer?: Omit<AudioLayer, 'envelope'> } {
  const asset = assets.get(track.asset);
  if (!asset) {
    throw createInternalConsistencyError(
      `Audio track '${track.id}' references asset '${track.asset}' which was never resolved.`,
      'audio',
    );
  }

  const playable = Math.max(0, asset.duration - track.trimIn);
  const declaredEnd = track.end ?? (track.kind === 'bgm' ? bounds.end : track.start + playable);
  const range = clipRange({ start: track.start, end: declaredEnd }, bounds, tolerance);
  if (!range) {
    return { end: declaredEnd };
  }

  const layer: Omit<AudioLayer, 'envelope'> = {
    id: track.id,
    kind: track.kind,
    assetRef: track.asset,
    start: range.start,
    end: range.end,
    sourceIn: track.trimIn,
    loop: track.kind === 'bgm' && playable < range.end - range.start - tolerance,
    gainDb: track.gainDb,
    fadeIn: track.fadeIn,
    fadeOut: track.fadeOut,
    priority: LAYER_PRIORITY[track.kind],
  };
  return { end: declaredEnd, layer };
}

function assertNarrationDisjoint(narration: Array<TimeRange & { id: string }>, tolerance: number): void {
  for (let i = 1; i < narration.length; i += 1) {
    const previous = narration[i - 1];
    const current = narration[i];
    if (previous && current && current.start < previous.end - tolerance) {
      throw createTimelineOverlapError(
        `Narration tracks '${previous.id}' and '${current.id}' overlap on [${current.start}, ${Math.min(previous.end, current.end)}].`,
        { entity: `audio track '${current.id}'`, context: 'start' },
      );
    }
  }
}

/**
 * Splits a layer's interval at the ducking edges: nominal gain outside
 * narration, nominal + duckingDb inside it.
 */
export function buildGainEnvelope(
  layer: TimeRange & { gainDb: number },
  duckingIntervals: TimeRange[],
  duckingDb: number,
): GainSegment[] {
  const envelope: GainSegment[] = [];
  let cursor = layer.start;

  for (const duck of duckingIntervals) {
    const overlap = clipRange(duck, layer);
    if (!overlap) {
      continue;
    }
    if (overlap.start > cursor) {
      envelope.push({ start: cursor, end: overlap.start, gainDb: layer.gainDb });
    }
    envelope.push({ start: overlap.start, end: overlap.end, gainDb: layer.gainDb + duckingDb });
    cursor = overlap.end;
  }

  if (cursor < layer.end) {
    envelope.push({ start: cursor, end: layer.end, gainDb: layer.gainDb });
  }
  return envelope;
}

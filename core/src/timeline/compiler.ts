import {
  createInternalConsistencyError,
  createTimelineGapError,
  createTimelineOverlapError,
  createUnfeasibleTimingError,
} from '../errors/index.js';
import type { AssetTable } from '../assets/types.js';
import type { ResolvedCompileOptions } from '../config.js';
import type { Logger } from '../logger.js';
import type { ClipSpec, Seconds, VideoSpec } from '../spec/types.js';
import { sortByStart } from './intervals.js';

/**
 * How a segment's source material is fitted into its slot:
 * - none: source and slot match within the speed epsilon
 * - trim: a too-long source was cut at trimIn + slot (allowTrim)
 * - slow-motion: source shorter than the slot, stretched to fill it
 * - speed-up: source longer than the slot, compressed to fit it
 * - blank: placeholder with no source
 */
export type TimeTransform = 'none' | 'trim' | 'slow-motion' | 'speed-up' | 'blank';

/**
 * One resolved base-track interval.
 */
export interface TimelineSegment {
  /** Position in timeline order */
  index: number;
  clipId: string;
  /** Null for blank segments */
  assetRef: string | null;
  start: Seconds;
  end: Seconds;
  slotDuration: Seconds;
  trimIn: Seconds;
  trimOut: Seconds;
  /** trimOut - trimIn */
  sourceDuration: Seconds;
  /** sourceDuration / slotDuration */
  speedFactor: number;
  timeTransform: TimeTransform;
  /** sourceDuration / speedFactor; equals slotDuration */
  renderedDuration: Seconds;
  gainDb: number;
  /** Whether the source carries an audio stream */
  hasAudio: boolean;
  /** Fill colour for blank segments */
  color?: string;
}

export interface CompiledTimeline {
  segments: TimelineSegment[];
  totalDuration: Seconds;
}

type TimingOptions = Pick<
  ResolvedCompileOptions,
  'speedEpsilon' | 'gapTolerance' | 'minSpeedFactor' | 'maxSpeedFactor'
>;

/**
 * Computes a TimelineSegment for every base clip and checks that the
 * segments cover [0, totalDuration] without gaps or overlaps.
 *
 * Sources shorter than their slot are slowed down, never looped or frozen;
 * longer ones are sped up unless the clip allows trimming.
 */
export function compileTimeline(
  spec: VideoSpec,
  assets: AssetTable,
  options: TimingOptions,
  logger: Partial<Logger> = {},
): CompiledTimeline {
  const ordered = sortByStart(spec.clips);
  const segments = ordered.map((clip, index) => buildSegment(clip, index, assets, options));

  assertContiguous(segments, options.gapTolerance);

  const totalDuration = segments.reduce((max, segment) => Math.max(max, segment.end), 0);
  for (const segment of segments) {
    logger.debug?.('timeline.segment', {
      clipId: segment.clipId,
      start: segment.start,
      end: segment.end,
      speedFactor: segment.speedFactor,
      timeTransform: segment.timeTransform,
    });
  }

  return { segments, totalDuration };
}

function buildSegment(
  clip: ClipSpec,
  index: number,
  assets: AssetTable,
  options: TimingOptions,
): TimelineSegment {
  const slotDuration = clip.end - clip.start;
  const base = {
    index,
    clipId: clip.id,
    start: clip.start,
    end: clip.end,
    slotDuration,
    gainDb: clip.gainDb,
  };

  if (clip.blank || clip.asset === undefined) {
    return {
      ...base,
      assetRef: null,
      trimIn: 0,
      trimOut: slotDuration,
      sourceDuration: slotDuration,
      speedFactor: 1,
      timeTransform: 'blank',
      renderedDuration: slotDuration,
      hasAudio: false,
      color: clip.color,
    };
  }

  const asset = assets.get(clip.asset);
  if (!asset) {
    throw createInternalConsistencyError(
      `Clip '${clip.id}' references asset '${clip.asset}' which was never resolved.`,
      'timeline',
    );
  }

  const location = { entity: `clip '${clip.id}'` };
  const trimIn = clip.trimIn ?? 0;
  let trimOut = clip.trimOut ?? asset.duration;

  if (trimOut > asset.duration + options.speedEpsilon) {
    throw createUnfeasibleTimingError(
      `Clip '${clip.id}' trims to ${trimOut}s but asset '${clip.asset}' is only ${asset.duration}s long.`,
      { ...location, context: 'trimOut' },
      'Lower trimOut to the source length.',
    );
  }
  if (trimIn >= trimOut) {
    throw createUnfeasibleTimingError(
      `Clip '${clip.id}' starts at ${trimIn}s into a ${trimOut}s source; nothing is left to play.`,
      { ...location, context: 'trimIn' },
    );
  }

  let sourceDuration = trimOut - trimIn;
  let timeTransform: TimeTransform;

  if (Math.abs(sourceDuration - slotDuration) <= options.speedEpsilon) {
    timeTransform = 'none';
  } else if (sourceDuration < slotDuration) {
    timeTransform = 'slow-motion';
  } else if (clip.allowTrim) {
    trimOut = trimIn + slotDuration;
    sourceDuration = trimOut - trimIn;
    timeTransform = 'trim';
  } else {
    timeTransform = 'speed-up';
  }

  const speedFactor = sourceDuration / slotDuration;
  if (
    (timeTransform === 'slow-motion' || timeTransform === 'speed-up') &&
    (speedFactor < options.minSpeedFactor || speedFactor > options.maxSpeedFactor)
  ) {
    throw createUnfeasibleTimingError(
      `Clip '${clip.id}' needs speed factor ${speedFactor} (${sourceDuration}s of source in a ${slotDuration}s slot), outside the allowed range [${options.minSpeedFactor}, ${options.maxSpeedFactor}].`,
      { ...location, context: 'speedFactor' },
      timeTransform === 'speed-up'
        ? 'Set "allowTrim": true or trim the source so it fits the slot.'
        : 'Use a longer source or a shorter slot.',
    );
  }

  return {
    ...base,
    assetRef: clip.asset,
    trimIn,
    trimOut,
    sourceDuration,
    speedFactor,
    timeTransform,
    renderedDuration: sourceDuration / speedFactor,
    hasAudio: asset.hasAudio,
  };
}

function assertContiguous(segments: TimelineSegment[], tolerance: number): void {
  const first = segments[0];
  if (!first) {
    throw createInternalConsistencyError('Timeline has no segments.', 'timeline');
  }
  if (first.start > tolerance) {
    throw createTimelineGapError(`Base track has a gap on [0, ${first.start}].`, {
      entity: `clip '${first.clipId}'`,
      context: 'start',
    });
  }

  for (let i = 1; i < segments.length; i += 1) {
    const previous = segments[i - 1];
    const current = segments[i];
    if (!previous || !current) {
      continue;
    }
    const delta = current.start - previous.end;
    if (delta > tolerance) {
      throw createTimelineGapError(
        `Base track has a gap on [${previous.end}, ${current.start}] between clips '${previous.clipId}' and '${current.clipId}'.`,
        { entity: `clip '${current.clipId}'`, context: 'start' },
      );
    }
    if (delta < -tolerance) {
      throw createTimelineOverlapError(
        `Clips '${previous.clipId}' and '${current.clipId}' overlap on [${current.start}, ${previous.end}].`,
        { entity: `clip '${current.clipId}'`, context: 'start' },
      );
    }
  }
}

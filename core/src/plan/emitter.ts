import { createInternalConsistencyError } from '../errors/index.js';
import type { AssetTable } from '../assets/types.js';
import type { AudioMixPlan } from '../audio/mix-planner.js';
import type { ResolvedCompileOptions } from '../config.js';
import type { OverlayResolution } from '../overlays/resolver.js';
import type { TimeRange, VideoSpec } from '../spec/types.js';
import type { CompiledTimeline, TimelineSegment } from '../timeline/compiler.js';
import { roundTime, sortByStart } from '../timeline/intervals.js';
import {
  PLAN_PHASES,
  PLAN_VERSION,
  type CompositionPlan,
  type PlanAudioLayer,
  type PlanInput,
  type PlanOperation,
  type PlanSubtitleCue,
} from './types.js';

/**
 * Everything the upstream stages produced for one compile run.
 */
export interface PlanSources {
  spec: VideoSpec;
  assets: AssetTable;
  timeline: CompiledTimeline;
  overlays: OverlayResolution;
  audio: AudioMixPlan;
}

type EmitOptions = Pick<ResolvedCompileOptions, 'gapTolerance'>;

const BASE_LABEL = 'base';
const AUDIO_LABEL = 'audio';
const OUTPUT_LABEL = 'output';

/**
 * Linearizes the compiled timeline, overlay stacks, subtitle cues and audio
 * mix into one ordered operation list.
 *
 * Every operation names the stream labels it consumes and the one it
 * produces, so the encoder can wire the graph without inferring anything.
 */
export function emitCompositionPlan(sources: PlanSources, options: EmitOptions): CompositionPlan {
  const { spec, timeline, overlays, audio } = sources;
  const inputs = createInputRegistry(sources.assets);
  const operations: PlanOperation[] = [];

  assertSegmentsContiguous(timeline, options.gapTolerance);

  // trim
  const segmentLabels = new Map<number, string>();
  for (const segment of timeline.segments) {
    const output = `seg${segment.index}:trim`;
    if (segment.assetRef === null) {
      operations.push({
        id: `generate:${segment.index}`,
        phase: 'trim',
        op: 'generate',
        inputs: [],
        output,
        segmentIndex: segment.index,
        clipId: segment.clipId,
        color: segment.color ?? 'black',
        duration: roundTime(segment.slotDuration),
      });
    } else {
      operations.push({
        id: `trim:${segment.index}`,
        phase: 'trim',
        op: 'trim',
        inputs: [inputs.register(segment.assetRef)],
        output,
        segmentIndex: segment.index,
        clipId: segment.clipId,
        from: roundTime(segment.trimIn),
        to: roundTime(trimEnd(segment)),
      });
    }
    segmentLabels.set(segment.index, output);
  }

  // speed
  for (const segment of timeline.segments) {
    if (segment.timeTransform !== 'slow-motion' && segment.timeTransform !== 'speed-up') {
      continue;
    }
    const output = `seg${segment.index}:speed`;
    operations.push({
      id: `speed:${segment.index}`,
      phase: 'speed',
      op: 'speed',
      inputs: [`seg${segment.index}:trim`],
      output,
      segmentIndex: segment.index,
      speedFactor: segment.speedFactor,
      ptsFactor: 1 / segment.speedFactor,
      duration: roundTime(segment.renderedDuration),
    });
    segmentLabels.set(segment.index, output);
  }

  // scale
  const concatInputs: string[] = [];
  for (const segment of timeline.segments) {
    const output = `seg${segment.index}`;
    operations.push({
      id: `scale:seg${segment.index}`,
      phase: 'scale',
      op: 'scale',
      inputs: [segmentLabels.get(segment.index) ?? `seg${segment.index}:trim`],
      output,
      target: 'segment',
      targetId: segment.clipId,
      width: spec.output.width,
      height: spec.output.height,
      fit: 'contain',
      fps: spec.output.fps,
    });
    concatInputs.push(output);
  }

  const visibleOverlays = overlays.overlays.filter((overlay) => overlay.intervals.length > 0);
  for (const overlay of visibleOverlays) {
    operations.push({
      id: `scale:ov:${overlay.id}`,
      phase: 'scale',
      op: 'scale',
      inputs: [inputs.register(overlay.assetRef)],
      output: `ov:${overlay.id}:scaled`,
      target: 'overlay',
      targetId: overlay.id,
      width: overlay.transform.width,
      height: overlay.transform.height,
      fit: 'stretch',
    });
  }

  // concat
  operations.push({
    id: 'concat',
    phase: 'concat',
    op: 'concat',
    inputs: concatInputs,
    output: BASE_LABEL,
    segmentCount: concatInputs.length,
    duration: roundTime(timeline.totalDuration),
  });

  // overlay
  let video = BASE_LABEL;
  visibleOverlays.forEach((overlay, layer) => {
    const output = `video:${layer}`;
    operations.push({
      id: `overlay:${overlay.id}`,
      phase: 'overlay',
      op: 'overlay',
      inputs: [video, `ov:${overlay.id}:scaled`],
      output,
      overlayId: overlay.id,
      drawOrder: overlay.drawOrder,
      x: overlay.transform.x,
      y: overlay.transform.y,
      intervals: overlay.intervals.map(roundRange),
    });
    video = output;
  });

  // subtitles
  const subtitles: PlanSubtitleCue[] = sortByStart(spec.subtitles).map((cue, index) => ({
    index: index + 1,
    id: cue.id,
    start: roundTime(cue.start),
    end: roundTime(cue.end),
    text: cue.text,
    ...(cue.style ? { style: cue.style } : {}),
  }));
  if (subtitles.length > 0) {
    operations.push({
      id: 'subtitles',
      phase: 'subtitles',
      op: 'subtitles',
      inputs: [video],
      output: 'video:subtitles',
      mode: spec.output.subtitleMode,
      cueCount: subtitles.length,
    });
    video = 'video:subtitles';
  }

  // mix
  const layers: PlanAudioLayer[] = audio.layers.map((layer) => ({
    ...layer,
    input: inputs.register(layer.assetRef),
    start: roundTime(layer.start),
    end: roundTime(layer.end),
    sourceIn: roundTime(layer.sourceIn),
    fadeIn: roundTime(layer.fadeIn),
    fadeOut: roundTime(layer.fadeOut),
    envelope: layer.envelope.map((gain) => ({ ...roundRange(gain), gainDb: gain.gainDb })),
  }));
  operations.push({
    id: 'mix',
    phase: 'mix',
    op: 'mix',
    inputs: [...new Set(layers.map((layer) => layer.input))],
    output: AUDIO_LABEL,
    duration: roundTime(audio.totalDuration),
    duckingDb: audio.duckingDb,
    layers,
    silenced: audio.silenced.map((range) => ({ ...range, ...roundRange(range) })),
  });

  // finalize
  operations.push({
    id: 'finalize',
    phase: 'finalize',
    op: 'finalize',
    inputs: [video, AUDIO_LABEL],
    output: OUTPUT_LABEL,
    width: spec.output.width,
    height: spec.output.height,
    fps: spec.output.fps,
    duration: roundTime(timeline.totalDuration),
  });

  const plan: CompositionPlan = {
    version: PLAN_VERSION,
    output: {
      width: spec.output.width,
      height: spec.output.height,
      fps: spec.output.fps,
      duration: roundTime(timeline.totalDuration),
      subtitleMode: spec.output.subtitleMode,
    },
    inputs: inputs.list(),
    operations,
    subtitles,
    overlayStacks: overlays.stacks.map((stack) => ({
      ...roundRange(stack),
      overlayIds: [...stack.overlayIds],
    })),
  };

  assertPlanConsistent(plan, options.gapTolerance);
  return plan;
}

/**
 * Renders a plan as deterministic JSON. Equal plans produce identical text.
 */
export function serializeCompositionPlan(plan: CompositionPlan): string {
  return `${JSON.stringify(plan, null, 2)}\n`;
}

/**
 * Sources within the speed epsilon of their slot are cut at the slot length
 * so the concatenated base track lasts exactly totalDuration.
 */
function trimEnd(segment: TimelineSegment): number {
  return segment.timeTransform === 'none' ? segment.trimIn + segment.slotDuration : segment.trimOut;
}

function roundRange(range: TimeRange): TimeRange {
  return { start: roundTime(range.start), end: roundTime(range.end) };
}

interface InputRegistry {
  register(assetRef: string): string;
  list(): PlanInput[];
}

/** Assigns input labels in first-use order, once per asset. */
function createInputRegistry(assets: AssetTable): InputRegistry {
  const byRef = new Map<string, PlanInput>();
  return {
    register(assetRef) {
      const existing = byRef.get(assetRef);
      if (existing) {
        return existing.id;
      }
      const asset = assets.get(assetRef);
      if (!asset) {
        throw createInternalConsistencyError(
          `Asset '${assetRef}' is used by the plan but was never resolved.`,
          'inputs',
        );
      }
      const input: PlanInput = {
        id: `input:${byRef.size}`,
        assetRef,
        localPath: asset.localPath,
        duration: roundTime(asset.duration),
        ...(asset.width !== undefined ? { width: asset.width } : {}),
        ...(asset.height !== undefined ? { height: asset.height } : {}),
        hasVideo: asset.hasVideo,
        hasAudio: asset.hasAudio,
      };
      byRef.set(assetRef, input);
      return input.id;
    },
    list() {
      return [...byRef.values()];
    },
  };
}

function assertSegmentsContiguous(timeline: CompiledTimeline, tolerance: number): void {
  let cursor = 0;
  for (const segment of timeline.segments) {
    if (Math.abs(segment.start - cursor) > tolerance) {
      throw createInternalConsistencyError(
        `Segment ${segment.index} ('${segment.clipId}') starts at ${segment.start}, expected ${cursor}.`,
        'timeline',
      );
    }
    if (Math.abs(segment.renderedDuration - segment.slotDuration) > tolerance) {
      throw createInternalConsistencyError(
        `Segment ${segment.index} ('${segment.clipId}') renders ${segment.renderedDuration}s into a ${segment.slotDuration}s slot.`,
        'timeline',
      );
    }
    cursor = segment.end;
  }
  if (Math.abs(cursor - timeline.totalDuration) > tolerance) {
    throw createInternalConsistencyError(
      `Segments end at ${cursor} but the timeline lasts ${timeline.totalDuration}.`,
      'timeline',
    );
  }
}

/**
 * Checks the structural invariants of an emitted plan: phases in order,
 * every label defined once and before use, segment durations summing to the
 * output duration, overlay intervals and audio layers inside the timeline.
 */
export function assertPlanConsistent(plan: CompositionPlan, tolerance: number): void {
  const fail = (message: string, context: string): never => {
    throw createInternalConsistencyError(message, context);
  };

  const defined = new Set(plan.inputs.map((input) => input.id));
  let phaseIndex = 0;
  for (const operation of plan.operations) {
    const index = PLAN_PHASES.indexOf(operation.phase);
    if (index < phaseIndex) {
      fail(`Operation '${operation.id}' (${operation.phase}) appears after phase '${PLAN_PHASES[phaseIndex]}'.`, 'operations');
    }
    phaseIndex = index;
    for (const label of operation.inputs) {
      if (!defined.has(label)) {
        fail(`Operation '${operation.id}' reads '${label}' before it is produced.`, 'operations');
      }
    }
    if (defined.has(operation.output)) {
      fail(`Stream '${operation.output}' is produced more than once.`, 'operations');
    }
    defined.add(operation.output);
  }

  const last = plan.operations[plan.operations.length - 1];
  if (!last || last.op !== 'finalize' || plan.operations.filter((operation) => operation.op === 'finalize').length !== 1) {
    fail('Plan must end with exactly one finalize operation.', 'operations');
  }

  const total = plan.output.duration;
  const segmentDurations = new Map<number, number>();
  for (const operation of plan.operations) {
    switch (operation.op) {
      case 'trim':
        segmentDurations.set(operation.segmentIndex, operation.to - operation.from);
        break;
      case 'generate':
      case 'speed':
        segmentDurations.set(operation.segmentIndex, operation.duration);
        break;
      case 'concat':
        if (Math.abs(operation.duration - total) > tolerance) {
          fail(`Concatenated base lasts ${operation.duration}s but the output lasts ${total}s.`, 'concat');
        }
        break;
      case 'overlay':
        assertInsideTimeline(operation.intervals, total, tolerance, `overlay '${operation.overlayId}'`, fail);
        break;
      case 'mix':
        assertInsideTimeline(operation.layers, total, tolerance, 'audio layers', fail);
        break;
      default:
        break;
    }
  }

  assertInsideTimeline(plan.overlayStacks, total, tolerance, 'overlay stacks', fail);
  const layered = new Set(
    plan.operations.flatMap((operation) => (operation.op === 'overlay' ? [operation.overlayId] : [])),
  );
  for (const stack of plan.overlayStacks) {
    const missing = stack.overlayIds.find((id) => !layered.has(id));
    if (missing !== undefined) {
      fail(`Overlay stack [${stack.start}, ${stack.end}] names '${missing}', which is never layered.`, 'overlayStacks');
    }
  }

  const summed = [...segmentDurations.values()].reduce((sum, duration) => sum + duration, 0);
  if (Math.abs(summed - total) > tolerance * Math.max(1, segmentDurations.size)) {
    fail(`Segment durations sum to ${roundTime(summed)}s but the output lasts ${total}s.`, 'segments');
  }
}

function assertInsideTimeline(
  ranges: readonly TimeRange[],
  total: number,
  tolerance: number,
  owner: string,
  fail: (message: string, context: string) => never,
): void {
  for (const range of ranges) {
    if (range.start < -tolerance || range.end > total + tolerance || range.end <= range.start) {
      fail(`${owner} has range [${range.start}, ${range.end}] outside [0, ${total}].`, 'bounds');
    }
  }
}

import type { AudioLayer, SilencedRange } from '../audio/mix-planner.js';
import type { Seconds, SubtitleMode, SubtitleStyle, TimeRange } from '../spec/types.js';

export const PLAN_VERSION = 1;

/**
 * Operation phases in execution order. The base track is concatenated
 * before overlays are layered, because overlay intervals are
 * timeline-absolute.
 */
export const PLAN_PHASES = [
  'trim',
  'speed',
  'scale',
  'concat',
  'overlay',
  'subtitles',
  'mix',
  'finalize',
] as const;

export type PlanPhase = (typeof PLAN_PHASES)[number];

/**
 * A media file the encoder must open. Each unique asset appears once.
 */
export interface PlanInput {
  /** Stream label, e.g. "input:0" */
  id: string;
  assetRef: string;
  localPath: string;
  duration: Seconds;
  width?: number;
  height?: number;
  hasVideo: boolean;
  hasAudio: boolean;
}

interface OperationBase {
  id: string;
  /** Stream labels consumed, in order */
  inputs: string[];
  /** Stream label produced */
  output: string;
}

/** Cuts [from, to) out of a source's video stream (source time). */
export interface TrimOperation extends OperationBase {
  phase: 'trim';
  op: 'trim';
  segmentIndex: number;
  clipId: string;
  from: Seconds;
  to: Seconds;
}

/** Produces a solid-colour stream for a blank segment. */
export interface GenerateOperation extends OperationBase {
  phase: 'trim';
  op: 'generate';
  segmentIndex: number;
  clipId: string;
  color: string;
  duration: Seconds;
}

/** Retimes a segment so it lasts exactly `duration`. */
export interface SpeedOperation extends OperationBase {
  phase: 'speed';
  op: 'speed';
  segmentIndex: number;
  speedFactor: number;
  /** Presentation-timestamp multiplier, 1 / speedFactor */
  ptsFactor: number;
  duration: Seconds;
}

/**
 * Resizes a stream. Segments are fitted inside the frame and padded
 * (`contain`) at the output frame rate; overlays are resized exactly
 * (`stretch`).
 */
export interface ScaleOperation extends OperationBase {
  phase: 'scale';
  op: 'scale';
  target: 'segment' | 'overlay';
  targetId: string;
  width: number;
  height: number;
  fit: 'contain' | 'stretch';
  fps?: number;
}

/** Joins the base segments in timeline order. */
export interface ConcatOperation extends OperationBase {
  phase: 'concat';
  op: 'concat';
  segmentCount: number;
  duration: Seconds;
}

/** Draws a scaled overlay at (x, y) during its intervals. */
export interface OverlayOperation extends OperationBase {
  phase: 'overlay';
  op: 'overlay';
  overlayId: string;
  drawOrder: number;
  x: number;
  y: number;
  intervals: TimeRange[];
}

/** Burns the plan's subtitle cues into the video, or attaches them as a stream. */
export interface SubtitlesOperation extends OperationBase {
  phase: 'subtitles';
  op: 'subtitles';
  mode: SubtitleMode;
  cueCount: number;
}

export interface PlanAudioLayer extends AudioLayer {
  /** Plan input the layer reads from */
  input: string;
}

/** Mixes every audio layer into one stream lasting `duration`. */
export interface MixOperation extends OperationBase {
  phase: 'mix';
  op: 'mix';
  duration: Seconds;
  duckingDb: number;
  layers: PlanAudioLayer[];
  silenced: SilencedRange[];
}

/** Muxes the final video and audio streams into the output. */
export interface FinalizeOperation extends OperationBase {
  phase: 'finalize';
  op: 'finalize';
  width: number;
  height: number;
  fps: number;
  duration: Seconds;
}

export type PlanOperation =
  | TrimOperation
  | GenerateOperation
  | SpeedOperation
  | ScaleOperation
  | ConcatOperation
  | OverlayOperation
  | SubtitlesOperation
  | MixOperation
  | FinalizeOperation;

export interface PlanSubtitleCue {
  /** 1-based, in timeline order */
  index: number;
  id: string;
  start: Seconds;
  end: Seconds;
  text: string;
  style?: SubtitleStyle;
}

/**
 * The compiler's sole output: a fully ordered, declarative operation list
 * with no timing left for the encoder to infer.
 */
/** Overlays visible together over one output range, bottom first. */
export interface PlanOverlayStack {
  start: Seconds;
  end: Seconds;
  overlayIds: string[];
}

export interface CompositionPlan {
  version: typeof PLAN_VERSION;
  output: {
    width: number;
    height: number;
    fps: number;
    duration: Seconds;
    subtitleMode: SubtitleMode;
  };
  inputs: PlanInput[];
  operations: PlanOperation[];
  subtitles: PlanSubtitleCue[];
  /** Draw order per output range; ranges with nothing visible are omitted */
  overlayStacks: PlanOverlayStack[];
}

import type {
  ConcatOperation,
  GenerateOperation,
  OverlayOperation,
  ScaleOperation,
  SpeedOperation,
  TrimOperation,
} from '@timeweave/core';
import { formatNumber } from './format.js';

/**
 * Frame settings shared by every base segment.
 */
export interface FrameOptions {
  width: number;
  height: number;
  fps: number;
}

/**
 * Cut a segment out of its source and restart its timestamps at zero.
 *
 * @param input - Source video pad, e.g. `[0:v]`
 */
export function buildTrimFilter(op: TrimOperation, input: string, output: string): string {
  return `${input}trim=start=${formatNumber(op.from)}:end=${formatNumber(op.to)},setpts=PTS-STARTPTS${output}`;
}

/**
 * Solid-colour source for a blank segment.
 */
export function buildGenerateFilter(op: GenerateOperation, frame: FrameOptions, output: string): string {
  return `color=c=${op.color}:s=${frame.width}x${frame.height}:r=${frame.fps}:d=${formatNumber(op.duration)}${output}`;
}

/**
 * Retime a segment. setpts multiplies timestamps, so a factor above 1
 * slows playback down.
 */
export function buildSpeedFilter(op: SpeedOperation, input: string, output: string): string {
  return `${input}setpts=${formatNumber(op.ptsFactor)}*PTS${output}`;
}

/**
 * Resize a stream.
 *
 * - contain: fit inside the frame, pad with black bars, force the frame rate
 * - stretch: resize to exactly the requested size
 */
export function buildScaleFilter(op: ScaleOperation, input: string, output: string): string {
  const { width, height } = op;

  if (op.fit === 'stretch') {
    return `${input}scale=${width}:${height}${output}`;
  }

  const filters = [buildContainScale(width, height), buildPadFilter(width, height), 'setsar=1'];
  if (op.fps !== undefined) {
    filters.push(`fps=${op.fps}`);
  }
  filters.push('format=yuv420p');

  return `${input}${filters.join(',')}${output}`;
}

/**
 * Join segments end to end. Every segment already has the same size,
 * sample aspect ratio and frame rate.
 */
export function buildConcatFilter(op: ConcatOperation, inputs: string[], output: string): string {
  return `${inputs.join('')}concat=n=${op.segmentCount}:v=1:a=0${output}`;
}

/**
 * Draw an overlay on the video during its intervals.
 *
 * The overlay's own timestamps are shifted so that it starts playing at
 * its first interval instead of at zero.
 */
export function buildOverlayFilter(
  op: OverlayOperation,
  base: string,
  overlay: string,
  shifted: string,
  output: string,
): string {
  const firstStart = op.intervals[0]?.start ?? 0;

  return [
    `${overlay}setpts=PTS-STARTPTS+${formatNumber(firstStart)}/TB${shifted}`,
    `${base}${shifted}overlay=x=${op.x}:y=${op.y}:enable='${buildEnableExpression(op)}'${output}`,
  ].join(';');
}

/**
 * `between(t,a,b)` terms summed, one per visibility interval.
 */
export function buildEnableExpression(op: Pick<OverlayOperation, 'intervals'>): string {
  return op.intervals
    .map((interval) => `between(t,${formatNumber(interval.start)},${formatNumber(interval.end)})`)
    .join('+');
}

function buildContainScale(width: number, height: number): string {
  return `scale=${width}:${height}:force_original_aspect_ratio=decrease`;
}

function buildPadFilter(width: number, height: number): string {
  return `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:black`;
}

import {
  ValidationErrorCode,
  createAssetUnavailableError,
  createInternalConsistencyError,
  createValidationError,
  createValidationIssue,
  RuntimeErrorCode,
  type ValidationIssue,
} from '../errors/index.js';
import type { AssetTable, ResolvedAsset } from '../assets/types.js';
import type { ResolvedCompileOptions } from '../config.js';
import type { OutputSettings, OverlaySpec, Seconds, TimeRange, VideoSpec } from '../spec/types.js';
import { clipRange, mergeRanges, rangesOverlap } from '../timeline/intervals.js';

/**
 * Pixel placement of an overlay on the output frame.
 */
export interface OverlayTransform {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ResolvedOverlay {
  id: string;
  assetRef: string;
  declarationIndex: number;
  /** zIndex ?? 0 */
  zIndex: number;
  hasExplicitZIndex: boolean;
  /** Rank in draw order, 0 = bottom */
  drawOrder: number;
  transform: OverlayTransform;
  /** Disjoint, sorted, inside [0, totalDuration] */
  intervals: TimeRange[];
}

/**
 * The overlays visible throughout [start, end), bottom to top.
 */
export interface OverlayStack {
  start: Seconds;
  end: Seconds;
  overlayIds: string[];
}

export interface OverlayResolution {
  /** In draw order, bottom first */
  overlays: ResolvedOverlay[];
  stacks: OverlayStack[];
}

type OverlayOptions = Pick<ResolvedCompileOptions, 'gapTolerance' | 'zIndexTiePolicy'>;

/**
 * Resolves every overlay's visibility windows onto the timeline and builds
 * the per-range draw stacks.
 *
 * Draw order: effective z-index ascending, ties broken by declaration order
 * (later declarations draw on top).
 */
export function resolveOverlays(
  spec: VideoSpec,
  assets: AssetTable,
  options: OverlayOptions,
): OverlayResolution {
  const bounds: TimeRange = { start: 0, end: spec.totalDuration };

  const unordered = spec.overlays.map((overlay) => {
    const asset = assets.get(overlay.asset);
    if (!asset) {
      throw createInternalConsistencyError(
        `Overlay '${overlay.id}' references asset '${overlay.asset}' which was never resolved.`,
        'overlays',
      );
    }
    return {
      id: overlay.id,
      assetRef: overlay.asset,
      declarationIndex: overlay.declarationIndex,
      zIndex: overlay.zIndex ?? 0,
      hasExplicitZIndex: overlay.zIndex !== undefined,
      drawOrder: 0,
      transform: computeTransform(overlay, asset, spec.output),
      intervals: resolveIntervals(overlay, asset, bounds, options.gapTolerance),
    } satisfies ResolvedOverlay;
  });

  const overlays = [...unordered]
    .sort((a, b) => a.zIndex - b.zIndex || a.declarationIndex - b.declarationIndex)
    .map((overlay, drawOrder) => ({ ...overlay, drawOrder }));

  if (options.zIndexTiePolicy === 'reject') {
    assertNoZIndexConflicts(overlays, options.gapTolerance);
  }

  return { overlays, stacks: buildStacks(overlays) };
}

/**
 * Fills in open-ended windows, clips them to the timeline and merges
 * overlapping or touching ones.
 */
export function resolveIntervals(
  overlay: OverlaySpec,
  asset: ResolvedAsset,
  bounds: TimeRange,
  tolerance: number,
): TimeRange[] {
  const clipped: TimeRange[] = [];
  for (const window of overlay.windows) {
    const end = window.end ?? window.start + asset.duration;
    const range = clipRange({ start: window.start, end }, bounds, tolerance);
    if (range) {
      clipped.push(range);
    }
  }
  return mergeRanges(clipped, tolerance);
}

function computeTransform(
  overlay: OverlaySpec,
  asset: ResolvedAsset,
  output: OutputSettings,
): OverlayTransform {
  const { position, size } = overlay;

  switch (overlay.units) {
    case 'absolute':
      return {
        x: Math.round(position.x),
        y: Math.round(position.y),
        width: Math.round(size.width),
        height: Math.round(size.height),
      };
    case 'source': {
      if (asset.width === undefined || asset.height === undefined) {
        throw createAssetUnavailableError(
          RuntimeErrorCode.ASSET_PROBE_FAILED,
          overlay.asset,
          `Overlay '${overlay.id}' is sized relative to its source, but asset '${overlay.asset}' has no video resolution.`,
          { suggestion: 'Use "units": "normalized" or "absolute" for this overlay.' },
        );
      }
      return {
        x: Math.round(position.x * output.width),
        y: Math.round(position.y * output.height),
        width: Math.round(size.width * asset.width),
        height: Math.round(size.height * asset.height),
      };
    }
    case 'normalized':
      return {
        x: Math.round(position.x * output.width),
        y: Math.round(position.y * output.height),
        width: Math.round(size.width * output.width),
        height: Math.round(size.height * output.height),
      };
  }
}

function assertNoZIndexConflicts(overlays: ResolvedOverlay[], tolerance: number): void {
  const issues: ValidationIssue[] = [];
  for (let i = 0; i < overlays.length; i += 1) {
    for (let j = i + 1; j < overlays.length; j += 1) {
      const a = overlays[i];
      const b = overlays[j];
      if (!a || !b || !a.hasExplicitZIndex || !b.hasExplicitZIndex || a.zIndex !== b.zIndex) {
        continue;
      }
      const clash = a.intervals.some((left) => b.intervals.some((right) => rangesOverlap(left, right, tolerance)));
      if (clash) {
        issues.push(
          createValidationIssue(
            ValidationErrorCode.Z_INDEX_CONFLICT,
            `Overlays '${a.id}' and '${b.id}' share zIndex ${a.zIndex} while visible at the same time.`,
            { entity: `overlay '${b.id}'`, context: 'zIndex' },
            'Give the overlays distinct zIndex values.',
          ),
        );
      }
    }
  }
  if (issues.length > 0) {
    throw createValidationError(issues);
  }
}

/**
 * Splits the timeline at every interval edge and records which overlays are
 * visible in each piece. Consecutive pieces with identical stacks are merged;
 * pieces with nothing visible are omitted.
 */
function buildStacks(overlays: ResolvedOverlay[]): OverlayStack[] {
  const edges = [
    ...new Set(overlays.flatMap((overlay) => overlay.intervals.flatMap((range) => [range.start, range.end]))),
  ].sort((a, b) => a - b);

  const stacks: OverlayStack[] = [];
  for (let i = 1; i < edges.length; i += 1) {
    const start = edges[i - 1];
    const end = edges[i];
    if (start === undefined || end === undefined) {
      continue;
    }
    const overlayIds = overlays
      .filter((overlay) => overlay.intervals.some((range) => range.start <= start && range.end >= end))
      .map((overlay) => overlay.id);
    if (overlayIds.length === 0) {
      continue;
    }

    const last = stacks[stacks.length - 1];
    if (last && last.end === start && sameIds(last.overlayIds, overlayIds)) {
      last.end = end;
    } else {
      stacks.push({ start, end, overlayIds });
    }
  }
  return stacks;
}

function sameIds(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((id, index) => b[index] === id);
}

import { createDurationResolver } from './assets/duration-resolver.js';
import { checkAssetStreams } from './assets/stream-check.js';
import type { AssetFetcher, AssetTable, MediaProbe } from './assets/types.js';
import { planAudioMix, type AudioMixPlan } from './audio/mix-planner.js';
import { resolveCompileOptions, type CompileOptions, type ResolvedCompileOptions } from './config.js';
import { createValidationError } from './errors/index.js';
import type { Logger } from './logger.js';
import { resolveOverlays, type OverlayResolution } from './overlays/resolver.js';
import { emitCompositionPlan } from './plan/emitter.js';
import type { CompositionPlan } from './plan/types.js';
import type { VideoSpec } from './spec/types.js';
import { validateSpec } from './spec/validator.js';
import { compileTimeline, type CompiledTimeline } from './timeline/compiler.js';

export interface CompileContext {
  probe: MediaProbe;
  fetcher?: AssetFetcher;
  logger?: Partial<Logger>;
  /** Spec file the document came from, for error reporting */
  filePath?: string;
}

export interface CompileResult {
  spec: VideoSpec;
  assets: AssetTable;
  timeline: CompiledTimeline;
  overlays: OverlayResolution;
  audio: AudioMixPlan;
  plan: CompositionPlan;
}

const noopLogger: Partial<Logger> = {};

/**
 * Compiles a raw spec document into a CompositionPlan.
 *
 * Validation runs first and reports every issue; assets are then probed
 * (concurrently, once each) before any timing is computed. Any failure
 * aborts the run; no partial plan is returned.
 */
export async function compile(
  raw: unknown,
  context: CompileContext,
  options: CompileOptions = {},
): Promise<CompileResult> {
  const logger = context.logger ?? noopLogger;
  const resolved = resolveCompileOptions(options);

  logger.info?.('compile.start', { filePath: context.filePath });
  const validation = validateSpec(raw, { gapTolerance: resolved.gapTolerance, filePath: context.filePath });
  for (const warning of validation.warnings) {
    logger.warn?.(warning.message, { code: warning.code, entity: warning.location.entity });
  }
  if (!validation.spec) {
    throw createValidationError(validation.issues, { filePath: context.filePath });
  }
  const spec = validation.spec;

  const resolver = createDurationResolver({
    probe: context.probe,
    fetcher: context.fetcher,
    concurrency: resolved.probeConcurrency,
    timeoutMs: resolved.probeTimeoutMs,
    logger,
  });
  const assets = await resolver.resolveAll(collectAssetRefs(spec));
  logger.info?.('compile.assets', { count: assets.size });

  const result = buildCompositionPlan(spec, assets, resolved, { logger, filePath: context.filePath });
  logger.info?.('compile.done', {
    duration: result.plan.output.duration,
    operations: result.plan.operations.length,
  });
  return result;
}

/**
 * Runs the pure stages against an already-resolved asset table. Assets
 * lacking the stream their use reads are reported together as a
 * ValidationError before any timing is computed.
 */
export function buildCompositionPlan(
  spec: VideoSpec,
  assets: AssetTable,
  options: ResolvedCompileOptions,
  context: Pick<CompileContext, 'logger' | 'filePath'> = {},
): CompileResult {
  const logger = context.logger ?? noopLogger;
  const streamIssues = checkAssetStreams(spec, assets);
  if (streamIssues.length > 0) {
    throw createValidationError(streamIssues, { filePath: context.filePath });
  }
  const timeline = compileTimeline(spec, assets, options, logger);
  const overlays = resolveOverlays(spec, assets, options);
  const audio = planAudioMix(spec, timeline, assets, options);
  const plan = emitCompositionPlan({ spec, assets, timeline, overlays, audio }, options);
  return { spec, assets, timeline, overlays, audio, plan };
}

/**
 * Every asset the spec references, in first-reference order.
 */
export function collectAssetRefs(spec: VideoSpec): string[] {
  const refs = new Set<string>();
  for (const clip of spec.clips) {
    if (!clip.blank && clip.asset !== undefined) {
      refs.add(clip.asset);
    }
  }
  for (const overlay of spec.overlays) {
    refs.add(overlay.asset);
  }
  for (const track of spec.audio) {
    refs.add(track.asset);
  }
  return [...refs];
}

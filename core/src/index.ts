export * from './errors/index.js';
export * from './spec/index.js';
export type { LogLevel, LogMeta, Logger } from './logger.js';
export { LOG_LEVELS, isLogLevel, isLevelEnabled } from './logger.js';
export type { CompileOptions, ResolvedCompileOptions, ZIndexTiePolicy } from './config.js';
export { COMPILER_DEFAULTS, resolveCompileOptions } from './config.js';

export type {
  AssetFetcher,
  AssetTable,
  FetchRequest,
  MediaInfo,
  MediaProbe,
  ProbeRequest,
  ResolvedAsset,
} from './assets/types.js';
export { createDurationResolver } from './assets/duration-resolver.js';
export type { DurationResolver, DurationResolverOptions } from './assets/duration-resolver.js';

export { compileTimeline } from './timeline/compiler.js';
export type { CompiledTimeline, TimelineSegment, TimeTransform } from './timeline/compiler.js';
export { clipRange, formatRange, mergeRanges, rangesOverlap, roundTime, sortByStart } from './timeline/intervals.js';

export { resolveOverlays, resolveIntervals } from './overlays/resolver.js';
export type { OverlayResolution, OverlayStack, OverlayTransform, ResolvedOverlay } from './overlays/resolver.js';

export { planAudioMix, buildGainEnvelope } from './audio/mix-planner.js';
export type { AudioLayer, AudioLayerKind, AudioMixPlan, GainSegment, SilencedRange } from './audio/mix-planner.js';

export { emitCompositionPlan, serializeCompositionPlan, assertPlanConsistent } from './plan/emitter.js';
export type { PlanSources } from './plan/emitter.js';
export { PLAN_PHASES, PLAN_VERSION } from './plan/types.js';
export type {
  CompositionPlan,
  ConcatOperation,
  FinalizeOperation,
  GenerateOperation,
  MixOperation,
  OverlayOperation,
  PlanAudioLayer,
  PlanInput,
  PlanOperation,
  PlanOverlayStack,
  PlanPhase,
  PlanSubtitleCue,
  ScaleOperation,
  SpeedOperation,
  SubtitlesOperation,
  TrimOperation,
} from './plan/types.js';

export { compile, buildCompositionPlan, collectAssetRefs } from './compile.js';
export type { CompileContext, CompileResult } from './compile.js';

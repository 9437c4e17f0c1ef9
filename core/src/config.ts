import {
  ValidationErrorCode,
  createValidationError,
  createValidationIssue,
  type ValidationIssue,
} from './errors/index.js';

/**
 * How overlays that share an explicit z-index and overlap in time are
 * ordered: by declaration order, or rejected as ambiguous.
 */
export type ZIndexTiePolicy = 'declaration-order' | 'reject';

/**
 * Tunables for a compile run. Every field is optional and falls back to
 * {@link COMPILER_DEFAULTS}.
 */
export interface CompileOptions {
  /** Max difference (seconds) between source and slot treated as "same length" */
  speedEpsilon?: number;
  /** Max distance (seconds) between two clip edges still treated as touching */
  gapTolerance?: number;
  /** Slowest allowed playback (source/slot ratio) */
  minSpeedFactor?: number;
  /** Fastest allowed playback (source/slot ratio) */
  maxSpeedFactor?: number;
  /** Gain change (dB, negative) applied to base and bgm audio under narration */
  duckingDb?: number;
  /** Max number of assets probed at the same time */
  probeConcurrency?: number;
  /** Per-asset probe timeout in milliseconds */
  probeTimeoutMs?: number;
  zIndexTiePolicy?: ZIndexTiePolicy;
}

export type ResolvedCompileOptions = Required<CompileOptions>;

export const COMPILER_DEFAULTS: ResolvedCompileOptions = {
  speedEpsilon: 0.001,
  gapTolerance: 0.001,
  minSpeedFactor: 0.25,
  maxSpeedFactor: 4,
  duckingDb: -12,
  probeConcurrency: 4,
  probeTimeoutMs: 30_000,
  zIndexTiePolicy: 'declaration-order',
};

/**
 * Merges caller options over the defaults and rejects nonsensical values.
 */
export function resolveCompileOptions(options: CompileOptions = {}): ResolvedCompileOptions {
  const resolved: ResolvedCompileOptions = {
    speedEpsilon: options.speedEpsilon ?? COMPILER_DEFAULTS.speedEpsilon,
    gapTolerance: options.gapTolerance ?? COMPILER_DEFAULTS.gapTolerance,
    minSpeedFactor: options.minSpeedFactor ?? COMPILER_DEFAULTS.minSpeedFactor,
    maxSpeedFactor: options.maxSpeedFactor ?? COMPILER_DEFAULTS.maxSpeedFactor,
    duckingDb: options.duckingDb ?? COMPILER_DEFAULTS.duckingDb,
    probeConcurrency: options.probeConcurrency ?? COMPILER_DEFAULTS.probeConcurrency,
    probeTimeoutMs: options.probeTimeoutMs ?? COMPILER_DEFAULTS.probeTimeoutMs,
    zIndexTiePolicy: options.zIndexTiePolicy ?? COMPILER_DEFAULTS.zIndexTiePolicy,
  };

  const issues: ValidationIssue[] = [];
  const reject = (field: keyof CompileOptions, message: string): void => {
    issues.push(
      createValidationIssue(ValidationErrorCode.INVALID_COMPILE_OPTION, message, {
        context: `options.${field}`,
      }),
    );
  };

  if (!isNonNegative(resolved.speedEpsilon)) {
    reject('speedEpsilon', `speedEpsilon must be a non-negative number, got ${resolved.speedEpsilon}.`);
  }
  if (!isNonNegative(resolved.gapTolerance)) {
    reject('gapTolerance', `gapTolerance must be a non-negative number, got ${resolved.gapTolerance}.`);
  }
  if (!isPositive(resolved.minSpeedFactor) || resolved.minSpeedFactor > 1) {
    reject('minSpeedFactor', `minSpeedFactor must be in (0, 1], got ${resolved.minSpeedFactor}.`);
  }
  if (!Number.isFinite(resolved.maxSpeedFactor) || resolved.maxSpeedFactor < 1) {
    reject('maxSpeedFactor', `maxSpeedFactor must be at least 1, got ${resolved.maxSpeedFactor}.`);
  }
  if (!Number.isFinite(resolved.duckingDb) || resolved.duckingDb > 0) {
    reject('duckingDb', `duckingDb must be zero or negative, got ${resolved.duckingDb}.`);
  }
  if (!Number.isInteger(resolved.probeConcurrency) || resolved.probeConcurrency < 1) {
    reject('probeConcurrency', `probeConcurrency must be a positive integer, got ${resolved.probeConcurrency}.`);
  }
  if (!isPositive(resolved.probeTimeoutMs)) {
    reject('probeTimeoutMs', `probeTimeoutMs must be positive, got ${resolved.probeTimeoutMs}.`);
  }
  if (resolved.zIndexTiePolicy !== 'declaration-order' && resolved.zIndexTiePolicy !== 'reject') {
    reject('zIndexTiePolicy', `zIndexTiePolicy must be "declaration-order" or "reject".`);
  }

  if (issues.length > 0) {
    throw createValidationError(issues);
  }
  return resolved;
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

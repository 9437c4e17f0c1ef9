/**
 * Error code constants for Timeweave.
 *
 * Code format: {Category}{Number}
 * - V: Validation errors (V000-V099)
 * - W: Validation warnings (W001-W099)
 * - R: Runtime errors raised while compiling (R001-R099)
 * - E: Encoder errors (E001-E099)
 */

// =============================================================================
// Validation Error Codes (V000-V099)
// =============================================================================

export const ValidationErrorCode = {
  // V000: Aggregate failure carrying every issue
  VALIDATION_FAILED: 'V000',

  // V001-V005: Document shape
  INVALID_DOCUMENT: 'V001',
  MISSING_REQUIRED_FIELD: 'V002',
  INVALID_NUMBER: 'V003',
  INVALID_TIME_RANGE: 'V004',
  MISSING_ASSET_REFERENCE: 'V005',

  // V006-V011: Timeline consistency
  DUPLICATE_ID: 'V006',
  CLIP_OVERLAP: 'V007',
  TIMELINE_GAP: 'V008',
  SUBTITLE_OVERLAP: 'V009',
  NARRATION_OVERLAP: 'V010',
  OUT_OF_BOUNDS: 'V011',

  // V012-V018: Settings, references and asset streams
  INVALID_OUTPUT_SETTINGS: 'V012',
  INVALID_ENUM_VALUE: 'V013',
  INVALID_TRIM_RANGE: 'V014',
  Z_INDEX_CONFLICT: 'V015',
  INVALID_COMPILE_OPTION: 'V016',
  INVALID_TRACK_REFERENCE: 'V017',
  ASSET_STREAM_MISSING: 'V018',
} as const;

export type ValidationErrorCodeValue = (typeof ValidationErrorCode)[keyof typeof ValidationErrorCode];

// =============================================================================
// Warning Codes (W001-W099)
// =============================================================================

export const WarningCode = {
  WINDOW_CLIPPED: 'W001',
  AUDIO_CLIPPED: 'W002',
} as const;

export type WarningCodeValue = (typeof WarningCode)[keyof typeof WarningCode];

// =============================================================================
// Runtime Error Codes (R001-R099)
// =============================================================================

export const RuntimeErrorCode = {
  // R001-R009: Assets
  ASSET_PROBE_FAILED: 'R001',
  ASSET_PROBE_TIMEOUT: 'R002',
  ASSET_FETCH_FAILED: 'R003',

  // R010-R019: Timeline invariants
  TIMELINE_GAP: 'R010',
  TIMELINE_OVERLAP: 'R011',

  // R020-R029: Timing
  UNFEASIBLE_TIMING: 'R020',

  // R030-R039: Plan emission
  INTERNAL_CONSISTENCY: 'R030',
} as const;

export type RuntimeErrorCodeValue = (typeof RuntimeErrorCode)[keyof typeof RuntimeErrorCode];

// =============================================================================
// Encoder Error Codes (E001-E099)
// =============================================================================

export const EncoderErrorCode = {
  FFMPEG_NOT_FOUND: 'E001',
  FFMPEG_FAILED: 'E002',
  SUBTITLE_WRITE_FAILED: 'E003',
} as const;

export type EncoderErrorCodeValue = (typeof EncoderErrorCode)[keyof typeof EncoderErrorCode];

/**
 * All error codes in the system.
 */
export type ErrorCode =
  | ValidationErrorCodeValue
  | WarningCodeValue
  | RuntimeErrorCodeValue
  | EncoderErrorCodeValue;

/**
 * Maps error code prefixes to their categories.
 */
export const ERROR_CODE_CATEGORIES = {
  V: 'validation',
  W: 'validation',
  R: 'runtime',
  E: 'encoder',
} as const;

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: string): 'validation' | 'runtime' | 'encoder' {
  switch (code.charAt(0)) {
    case 'V':
    case 'W':
      return ERROR_CODE_CATEGORIES.V;
    case 'E':
      return ERROR_CODE_CATEGORIES.E;
    default:
      return ERROR_CODE_CATEGORIES.R;
  }
}

/**
 * Gets the severity for an error code.
 */
export function getErrorSeverity(code: string): 'error' | 'warning' {
  return code.startsWith('W') ? 'warning' : 'error';
}

/**
 * Timeweave error system.
 *
 * - V (Validation): malformed or contradictory specs
 * - W (Warnings): soft validation findings
 * - R (Runtime): asset, timeline and plan failures during a compile
 * - E (Encoder): ffmpeg invocation failures
 */

export type {
  ErrorCategory,
  ErrorKind,
  ErrorLocation,
  ErrorSeverity,
  TimeweaveError,
  ValidationIssue,
} from './types.js';
export { isTimeweaveError, isErrorKind } from './types.js';

export {
  ValidationErrorCode,
  WarningCode,
  RuntimeErrorCode,
  EncoderErrorCode,
  ERROR_CODE_CATEGORIES,
  getErrorCategory,
  getErrorSeverity,
} from './codes.js';
export type {
  ValidationErrorCodeValue,
  WarningCodeValue,
  RuntimeErrorCodeValue,
  EncoderErrorCodeValue,
  ErrorCode,
} from './codes.js';

export type { CreateErrorOptions } from './helpers.js';
export {
  createTimeweaveError,
  createValidationError,
  createAssetUnavailableError,
  createTimelineGapError,
  createTimelineOverlapError,
  createUnfeasibleTimingError,
  createInternalConsistencyError,
  createEncoderError,
  createValidationIssue,
  formatError,
  formatValidationIssue,
} from './helpers.js';

/**
 * Error creation helpers.
 *
 * Provides factory functions for every error kind so that category,
 * severity and naming stay consistent across the compiler.
 */

import type {
  ErrorKind,
  ErrorLocation,
  ErrorSeverity,
  TimeweaveError,
  ValidationIssue,
} from './types.js';
import {
  RuntimeErrorCode,
  ValidationErrorCode,
  getErrorCategory,
  getErrorSeverity,
} from './codes.js';

/**
 * Options for creating a Timeweave error.
 */
export interface CreateErrorOptions {
  kind: ErrorKind;
  /** Error code (e.g. 'V004', 'R020') */
  code: string;
  message: string;
  location?: ErrorLocation;
  suggestion?: string;
  issues?: ValidationIssue[];
  /** Original error that caused this error */
  cause?: unknown;
}

/**
 * Creates a TimeweaveError with the given options.
 *
 * The category and severity are inferred from the error code.
 */
export function createTimeweaveError(options: CreateErrorOptions): TimeweaveError {
  const { kind, code, message, location, suggestion, issues, cause } = options;

  return Object.assign(new Error(message, { cause }), {
    name: kind,
    kind,
    code,
    category: getErrorCategory(code),
    severity: getErrorSeverity(code),
    location,
    suggestion,
    issues,
  });
}

/**
 * Creates the aggregated ValidationError raised when a spec has at least one
 * error-severity issue. Every issue found is attached, not just the first.
 */
export function createValidationError(
  issues: ValidationIssue[],
  options: { filePath?: string } = {},
): TimeweaveError {
  const errors = issues.filter((issue) => issue.severity === 'error');
  const count = errors.length;
  return createTimeweaveError({
    kind: 'ValidationError',
    code: ValidationErrorCode.VALIDATION_FAILED,
    message: `Video spec is invalid: ${count} ${count === 1 ? 'problem' : 'problems'} found.`,
    location: options.filePath ? { filePath: options.filePath } : undefined,
    issues,
  });
}

/**
 * Creates an AssetUnavailableError (R001-R009).
 */
export function createAssetUnavailableError(
  code: string,
  assetRef: string,
  message: string,
  options: { cause?: unknown; suggestion?: string } = {},
): TimeweaveError {
  return createTimeweaveError({
    kind: 'AssetUnavailableError',
    code,
    message,
    location: { entity: `asset '${assetRef}'` },
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

/**
 * Creates a TimelineGapError (R010).
 */
export function createTimelineGapError(
  message: string,
  location: ErrorLocation,
): TimeweaveError {
  return createTimeweaveError({
    kind: 'TimelineGapError',
    code: RuntimeErrorCode.TIMELINE_GAP,
    message,
    location,
    suggestion: 'Extend the neighbouring clips or insert a blank clip to fill the gap.',
  });
}

/**
 * Creates a TimelineOverlapError (R011).
 */
export function createTimelineOverlapError(
  message: string,
  location: ErrorLocation,
): TimeweaveError {
  return createTimeweaveError({
    kind: 'TimelineOverlapError',
    code: RuntimeErrorCode.TIMELINE_OVERLAP,
    message,
    location,
  });
}

/**
 * Creates an UnfeasibleTimingError (R020).
 */
export function createUnfeasibleTimingError(
  message: string,
  location: ErrorLocation,
  suggestion?: string,
): TimeweaveError {
  return createTimeweaveError({
    kind: 'UnfeasibleTimingError',
    code: RuntimeErrorCode.UNFEASIBLE_TIMING,
    message,
    location,
    suggestion,
  });
}

/**
 * Creates an InternalConsistencyError (R030). Always indicates a bug in an
 * upstream compiler stage.
 */
export function createInternalConsistencyError(
  message: string,
  context: string,
): TimeweaveError {
  return createTimeweaveError({
    kind: 'InternalConsistencyError',
    code: RuntimeErrorCode.INTERNAL_CONSISTENCY,
    message,
    location: { context },
  });
}

/**
 * Creates an EncoderError (E-code).
 */
export function createEncoderError(
  code: string,
  message: string,
  options: { cause?: unknown; suggestion?: string } = {},
): TimeweaveError {
  return createTimeweaveError({
    kind: 'EncoderError',
    code,
    message,
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

// =============================================================================
// Validation Issues
// =============================================================================

/**
 * Creates a validation issue.
 */
export function createValidationIssue(
  code: string,
  message: string,
  location: { entity?: string; context: string },
  suggestion?: string,
): ValidationIssue {
  const severity: ErrorSeverity = getErrorSeverity(code);
  return {
    code,
    message,
    severity,
    location,
    suggestion,
  };
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Formats a ValidationIssue for display.
 */
export function formatValidationIssue(issue: ValidationIssue): string {
  const prefix = issue.severity === 'error' ? 'ERROR' : 'WARNING';
  const parts: string[] = [];

  parts.push(`${prefix} [${issue.code}]: ${issue.message}`);

  if (issue.location.entity) {
    parts.push(`  Entity: ${issue.location.entity}`);
  }
  if (issue.location.context) {
    parts.push(`  Context: ${issue.location.context}`);
  }
  if (issue.suggestion) {
    parts.push(`  Suggestion: ${issue.suggestion}`);
  }

  return parts.join('\n');
}

/**
 * Formats a TimeweaveError for display.
 */
export function formatError(error: TimeweaveError): string {
  const parts: string[] = [];

  parts.push(`[${error.code}] ${error.name}: ${error.message}`);

  if (error.location) {
    const loc = error.location;
    if (loc.filePath) {
      parts.push(`  File: ${loc.filePath}`);
    }
    if (loc.entity) {
      parts.push(`  Entity: ${loc.entity}`);
    }
    if (loc.context) {
      parts.push(`  Context: ${loc.context}`);
    }
  }

  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }

  if (error.issues && error.issues.length > 0) {
    for (const issue of error.issues) {
      parts.push(formatValidationIssue(issue));
    }
  }

  return parts.join('\n');
}

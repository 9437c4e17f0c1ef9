/**
 * Shared error types for Timeweave.
 *
 * Every failure the compiler raises is a `TimeweaveError`: a plain `Error`
 * whose `name` is its kind, carrying a code, a category and enough location
 * information to point at the offending entity.
 */

/**
 * The error kinds a compile run can fail with.
 */
export type ErrorKind =
  | 'ValidationError'
  | 'AssetUnavailableError'
  | 'TimelineGapError'
  | 'TimelineOverlapError'
  | 'UnfeasibleTimingError'
  | 'InternalConsistencyError'
  | 'EncoderError';

export type ErrorCategory = 'validation' | 'runtime' | 'encoder';

export type ErrorSeverity = 'error' | 'warning';

/**
 * Location information for an error.
 */
export interface ErrorLocation {
  /** Entity the error refers to (e.g. "clip 'intro'", "overlay 'host'") */
  entity?: string;
  /** Rule or field context (e.g. "windows[1].end") */
  context?: string;
  /** Spec file the document was loaded from */
  filePath?: string;
}

/**
 * A single validation finding. Validation collects every issue before
 * failing so a spec author can fix them all in one pass.
 */
export interface ValidationIssue {
  /** Error code (e.g. "V004", "W001") */
  code: string;
  /** Human-readable message */
  message: string;
  severity: ErrorSeverity;
  location: {
    entity?: string;
    context: string;
  };
  suggestion?: string;
}

/**
 * Base interface for all Timeweave errors.
 */
export interface TimeweaveError extends Error {
  kind: ErrorKind;
  /** Unique error code (e.g. 'V004', 'R020', 'E002') */
  code: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  location?: ErrorLocation;
  suggestion?: string;
  /** Every issue found, for ValidationError */
  issues?: ValidationIssue[];
}

const ERROR_KINDS: ReadonlySet<string> = new Set<ErrorKind>([
  'ValidationError',
  'AssetUnavailableError',
  'TimelineGapError',
  'TimelineOverlapError',
  'UnfeasibleTimingError',
  'InternalConsistencyError',
  'EncoderError',
]);

/**
 * Type guard to check if an error is a TimeweaveError.
 */
export function isTimeweaveError(error: unknown): error is TimeweaveError {
  return (
    error instanceof Error &&
    'kind' in error &&
    'code' in error &&
    'category' in error &&
    typeof error.kind === 'string' &&
    ERROR_KINDS.has(error.kind) &&
    typeof error.code === 'string' &&
    typeof error.category === 'string'
  );
}

/**
 * Type guard narrowing to one specific error kind.
 */
export function isErrorKind<K extends ErrorKind>(
  error: unknown,
  kind: K,
): error is TimeweaveError & { kind: K } {
  return isTimeweaveError(error) && error.kind === kind;
}

/**
 * The extra fields execFile attaches to its errors: `code` is the exit
 * code, or a string such as 'ENOENT' when the process never started.
 */
export function readProcessFields(error: unknown): { code?: number | string; signal?: string; stderr: string } {
  if (typeof error !== 'object' || error === null) {
    return { stderr: '' };
  }
  const code = 'code' in error && (typeof error.code === 'number' || typeof error.code === 'string') ? error.code : undefined;
  const signal = 'signal' in error && typeof error.signal === 'string' ? error.signal : undefined;
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
  return { code, signal, stderr };
}

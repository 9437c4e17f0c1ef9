import { validateSpec, type SpecValidationResult } from '@timeweave/core';
import type { CliConfig } from '../lib/cli-config.js';
import { loadSpecFile } from '../lib/spec-loader.js';

export interface ValidateOptions {
  specPath: string;
  config: CliConfig;
}

export interface ValidateResult {
  specPath: string;
  validation: SpecValidationResult;
}

/**
 * Check a spec file without probing any media.
 */
export async function runValidate(options: ValidateOptions): Promise<ValidateResult> {
  const { path, document } = await loadSpecFile(options.specPath);
  const validation = validateSpec(document, {
    gapTolerance: options.config.compile.gapTolerance,
    filePath: path,
  });
  return { specPath: path, validation };
}

import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  ValidationErrorCode,
  createValidationError,
  createValidationIssue,
} from '@timeweave/core';

export interface LoadedSpecFile {
  /** Absolute path of the spec file */
  path: string;
  /** Parsed but unvalidated document */
  document: unknown;
}

/**
 * Read a video spec from disk. `.yaml` / `.yml` files are parsed as YAML,
 * everything else as JSON.
 */
export async function loadSpecFile(filePath: string): Promise<LoadedSpecFile> {
  const path = resolve(filePath);
  let contents: string;
  try {
    contents = await readFile(path, 'utf8');
  } catch (error) {
    throw documentError(path, `Cannot read spec file: ${error instanceof Error ? error.message : String(error)}`);
  }

  const extension = extname(path).toLowerCase();
  try {
    const document: unknown = extension === '.yaml' || extension === '.yml' ? parseYaml(contents) : JSON.parse(contents);
    return { path, document };
  } catch (error) {
    throw documentError(
      path,
      `Spec file is not valid ${extension === '.yaml' || extension === '.yml' ? 'YAML' : 'JSON'}: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
  }
}

function documentError(path: string, message: string) {
  return createValidationError(
    [createValidationIssue(ValidationErrorCode.INVALID_DOCUMENT, message, { context: 'document' })],
    { filePath: path },
  );
}

import { mkdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import {
  compile,
  serializeCompositionPlan,
  type CompileResult,
  type Logger,
  type MediaProbe,
} from '@timeweave/core';
import { createAssetFetcher, createFfprobeProbe } from '@timeweave/media';
import type { CliConfig } from '../lib/cli-config.js';
import { loadSpecFile } from '../lib/spec-loader.js';

export interface CompileCommandOptions {
  specPath: string;
  /** Where to write the plan JSON; not written when absent */
  planPath?: string;
  config: CliConfig;
  logger?: Partial<Logger>;
  /** Replaces the ffprobe-backed probe */
  probe?: MediaProbe;
}

export interface CompileCommandResult {
  specPath: string;
  planPath?: string;
  result: CompileResult;
}

export function resolveWorkDir(config: CliConfig): string {
  return resolve(config.workDir ?? join(tmpdir(), 'timeweave'));
}

/**
 * Load, validate and compile a spec file. Local asset paths resolve
 * against the spec file's directory; remote ones are downloaded into the
 * work directory.
 */
export async function runCompile(options: CompileCommandOptions): Promise<CompileCommandResult> {
  const { config, logger = {} } = options;
  const { path, document } = await loadSpecFile(options.specPath);

  const result = await compile(
    document,
    {
      probe: options.probe ?? createFfprobeProbe({ ffprobePath: config.encoder.ffprobePath }),
      fetcher: createAssetFetcher({
        workDir: join(resolveWorkDir(config), 'assets'),
        baseDir: dirname(path),
        logger,
      }),
      logger,
      filePath: path,
    },
    config.compile,
  );

  if (!options.planPath) {
    return { specPath: path, result };
  }

  const planPath = resolve(options.planPath);
  await mkdir(dirname(planPath), { recursive: true });
  await writeFile(planPath, serializeCompositionPlan(result.plan), 'utf8');
  logger.info?.('plan.written', { path: planPath });
  return { specPath: path, planPath, result };
}

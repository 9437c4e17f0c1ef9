import { resolve } from 'node:path';
import type { CompileResult, Logger, MediaProbe } from '@timeweave/core';
import { renderPlan, type FfmpegCommand } from '@timeweave/media';
import type { CliConfig } from '../lib/cli-config.js';
import { resolveWorkDir, runCompile } from './compile.js';

export interface RenderCommandOptions {
  specPath: string;
  outputPath: string;
  /** Also write the plan JSON here */
  planPath?: string;
  config: CliConfig;
  logger?: Partial<Logger>;
  probe?: MediaProbe;
  /** Replaces the ffmpeg-backed renderer */
  render?: typeof renderPlan;
}

export interface RenderCommandResult {
  outputPath: string;
  result: CompileResult;
  command: FfmpegCommand;
}

/**
 * Compile a spec file and render the plan with one ffmpeg run.
 */
export async function runRender(options: RenderCommandOptions): Promise<RenderCommandResult> {
  const { config, logger = {} } = options;
  const render = options.render ?? renderPlan;
  const { result } = await runCompile({
    specPath: options.specPath,
    planPath: options.planPath,
    config,
    logger,
    probe: options.probe,
  });

  const outputPath = resolve(options.outputPath);
  const command = await render(result.plan, outputPath, {
    ...config.encoder,
    workDir: resolveWorkDir(config),
    logger,
  });
  return { outputPath, result, command };
}

#!/usr/bin/env node
import { resolve } from 'node:path';
import process from 'node:process';
import chalk from 'chalk';
import { config as dotenvConfig } from 'dotenv';
import meow from 'meow';
import {
  formatError,
  formatValidationIssue,
  isTimeweaveError,
  serializeCompositionPlan,
  type Logger,
} from '@timeweave/core';
import { runCompile } from './commands/compile.js';
import { runRender } from './commands/render.js';
import { runValidate } from './commands/validate.js';
import { resolveCliConfig, type CliConfig } from './lib/cli-config.js';
import { createCliLogger } from './lib/logger.js';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

const cli = meow(
  `\nUsage\n  $ timeweave <command> <spec> [options]\n\nCommands\n  validate <spec>            Check a spec file without probing media\n  compile <spec>             Compile a spec into a composition plan (printed unless --plan is given)\n  render <spec> <output>     Compile a spec and render it to an MP4 file\n\nOptions\n  --plan <file>              Write the composition plan JSON to a file\n  --log-level <level>        debug, info, warn, error or silent (default: info)\n  --ffmpeg-path <path>       FFmpeg binary (default: ffmpeg)\n  --ffprobe-path <path>      ffprobe binary (default: ffprobe)\n  --preset <name>            x264 preset (default: medium)\n  --crf <n>                  x264 constant rate factor (default: 23)\n  --audio-bitrate <rate>     AAC bitrate (default: 192k)\n  --probe-concurrency <n>    Assets probed at the same time (default: 4)\n  --probe-timeout-ms <n>     Per-asset probe timeout (default: 30000)\n  --ducking-db <n>           Gain applied under narration (default: -12)\n  --work-dir <dir>           Directory for downloads and side files\n\nEvery option can also be set with a TIMEWEAVE_* environment variable or a .env file.\n\nExamples\n  $ timeweave validate promo.yaml\n  $ timeweave compile promo.yaml --plan=promo.plan.json\n  $ timeweave render promo.yaml promo.mp4 --preset=veryfast\n`,
  {
    importMeta: import.meta,
    flags: {
      plan: { type: 'string' },
      logLevel: { type: 'string' },
      ffmpegPath: { type: 'string' },
      ffprobePath: { type: 'string' },
      preset: { type: 'string' },
      crf: { type: 'number' },
      audioBitrate: { type: 'string' },
      probeConcurrency: { type: 'number' },
      probeTimeoutMs: { type: 'number' },
      duckingDb: { type: 'number' },
      workDir: { type: 'string' },
    },
  },
);

async function main(): Promise<void> {
  const [command, specPath, outputPath] = cli.input;
  const { flags } = cli;

  if (command !== 'validate' && command !== 'compile' && command !== 'render') {
    cli.showHelp(command === undefined ? 0 : 2);
    return;
  }
  if (!specPath) {
    console.error(chalk.red(`Error: ${command} needs a spec file.`));
    process.exitCode = 1;
    return;
  }

  const config = resolveCliConfig(flags);
  const logger = createCliLogger(config.logLevel);

  switch (command) {
    case 'validate':
      await validate(specPath, config, logger);
      return;
    case 'compile': {
      const { planPath, result } = await runCompile({ specPath, planPath: flags.plan, config, logger });
      if (!planPath) {
        process.stdout.write(serializeCompositionPlan(result.plan));
        return;
      }
      logger.info(
        chalk.green(
          `✓ Compiled ${result.timeline.segments.length} segments into ${result.plan.operations.length} operations (${result.plan.output.duration}s).`,
        ),
      );
      return;
    }
    case 'render': {
      if (!outputPath) {
        console.error(chalk.red('Error: render needs an output file.'));
        process.exitCode = 1;
        return;
      }
      const rendered = await runRender({ specPath, outputPath, planPath: flags.plan, config, logger });
      logger.info(chalk.green(`✓ Rendered ${rendered.outputPath} (${rendered.result.plan.output.duration}s).`));
      return;
    }
  }
}

async function validate(specPath: string, config: CliConfig, logger: Logger): Promise<void> {
  const { specPath: path, validation } = await runValidate({ specPath, config });
  for (const warning of validation.warnings) {
    logger.warn(formatValidationIssue(warning));
  }
  if (!validation.valid) {
    for (const issue of validation.errors) {
      logger.error(formatValidationIssue(issue));
    }
    logger.error(`✗ ${path} is invalid: ${validation.errors.length} problem(s) found.`);
    process.exitCode = 1;
    return;
  }
  logger.info(chalk.green(`✓ ${path} is valid.`));
}

try {
  await main();
} catch (error) {
  const message = isTimeweaveError(error)
    ? formatError(error)
    : `Error: ${error instanceof Error ? error.message : String(error)}`;
  console.error(chalk.red(message));
  process.exitCode = 1;
}

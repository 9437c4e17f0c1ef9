import {
  EncoderErrorCode,
  createEncoderError,
  createInternalConsistencyError,
  type CompositionPlan,
  type PlanOperation,
} from '@timeweave/core';
import { buildAudioMixFilter } from './audio-mixer.js';
import { formatNumber } from './format.js';
import type { EncoderOptions, FfmpegCommand, SideFiles } from './types.js';
import { resolveEncoderOptions } from './types.js';
import {
  buildConcatFilter,
  buildGenerateFilter,
  buildOverlayFilter,
  buildScaleFilter,
  buildSpeedFilter,
  buildTrimFilter,
} from './video-track.js';

/**
 * Maps plan stream labels to filter graph pads.
 *
 * Plan inputs become `[N:v]`; every other stream gets a generated
 * `[vN]` pad, so user-chosen ids never reach the graph.
 */
interface PadRegistry {
  read(label: string, context: string): string;
  produce(label: string): string;
  alias(label: string, pad: string): void;
  temporary(): string;
}

function createPadRegistry(inputIndex: ReadonlyMap<string, number>): PadRegistry {
  const pads = new Map<string, string>();
  let next = 0;

  const temporary = (): string => `[v${next++}]`;

  return {
    read(label, context) {
      const index = inputIndex.get(label);
      if (index !== undefined) {
        return `[${index}:v]`;
      }
      const pad = pads.get(label);
      if (!pad) {
        throw createInternalConsistencyError(
          `Operation '${context}' reads stream '${label}', which no earlier operation produces.`,
          'encoder',
        );
      }
      return pad;
    },
    produce(label) {
      const pad = temporary();
      pads.set(label, pad);
      return pad;
    },
    alias(label, pad) {
      pads.set(label, pad);
    },
    temporary,
  };
}

/**
 * Build the complete FFmpeg command for a composition plan.
 *
 * Every plan input is opened once with `-i`, in plan order. Soft subtitles
 * add the SRT file as one more input.
 *
 * @param plan - Composition plan to render
 * @param outputPath - Where ffmpeg writes the MP4
 * @param options - Encoder settings merged over FFMPEG_DEFAULTS
 * @param sideFiles - Files the plan refers to besides its inputs
 */
export function buildFfmpegCommand(
  plan: CompositionPlan,
  outputPath: string,
  options: EncoderOptions = {},
  sideFiles: SideFiles = {},
): FfmpegCommand {
  const settings = resolveEncoderOptions(options);
  const inputIndex = new Map(plan.inputs.map((input, index) => [input.id, index]));
  const inputFiles = plan.inputs.map((input) => input.localPath);

  const subtitleOp = plan.operations.find((entry) => entry.op === 'subtitles');
  if (subtitleOp && !sideFiles.subtitlePath) {
    throw createEncoderError(
      EncoderErrorCode.SUBTITLE_WRITE_FAILED,
      `Plan has ${plan.subtitles.length} subtitle cues but no subtitle file was supplied.`,
    );
  }
  let softSubtitleIndex: number | undefined;
  if (subtitleOp && plan.output.subtitleMode === 'soft' && sideFiles.subtitlePath) {
    softSubtitleIndex = inputFiles.length;
    inputFiles.push(sideFiles.subtitlePath);
  }

  const registry = createPadRegistry(inputIndex);
  const filters: string[] = [];
  let mapped: { video: string; audio: string } | undefined;

  for (const op of plan.operations) {
    const pads = buildOperationFilter(op, plan, registry, inputIndex, sideFiles);
    filters.push(...pads.filters);
    if (pads.mapped) {
      mapped = pads.mapped;
    }
  }

  if (!mapped) {
    throw createInternalConsistencyError('Plan has no finalize operation.', 'encoder');
  }

  const filterGraph = filters.join(';');
  const args: string[] = ['-y'];
  for (const file of inputFiles) {
    args.push('-i', file);
  }
  args.push('-filter_complex', filterGraph);
  args.push('-map', mapped.video, '-map', mapped.audio);

  if (softSubtitleIndex !== undefined) {
    args.push('-map', `${softSubtitleIndex}:s`, '-c:s', 'mov_text');
  }

  args.push(
    '-c:v',
    'libx264',
    '-preset',
    settings.preset,
    '-crf',
    String(settings.crf),
    '-pix_fmt',
    'yuv420p',
    '-r',
    String(plan.output.fps),
    '-s',
    `${plan.output.width}x${plan.output.height}`,
    '-c:a',
    'aac',
    '-b:a',
    settings.audioBitrate,
    '-t',
    formatNumber(plan.output.duration),
    '-movflags',
    '+faststart',
    outputPath,
  );

  return {
    ffmpegPath: settings.ffmpegPath,
    args,
    inputFiles,
    filterGraph,
    outputPath,
  };
}

function buildOperationFilter(
  op: PlanOperation,
  plan: CompositionPlan,
  registry: PadRegistry,
  inputIndex: ReadonlyMap<string, number>,
  sideFiles: SideFiles,
): { filters: string[]; mapped?: { video: string; audio: string } } {
  const read = (label: string): string => registry.read(label, op.id);

  switch (op.op) {
    case 'trim':
      return { filters: [buildTrimFilter(op, read(op.inputs[0]), registry.produce(op.output))] };
    case 'generate':
      return { filters: [buildGenerateFilter(op, plan.output, registry.produce(op.output))] };
    case 'speed':
      return { filters: [buildSpeedFilter(op, read(op.inputs[0]), registry.produce(op.output))] };
    case 'scale':
      return { filters: [buildScaleFilter(op, read(op.inputs[0]), registry.produce(op.output))] };
    case 'concat':
      return { filters: [buildConcatFilter(op, op.inputs.map(read), registry.produce(op.output))] };
    case 'overlay': {
      const base = read(op.inputs[0]);
      const overlay = read(op.inputs[1]);
      const shifted = registry.temporary();
      return { filters: [buildOverlayFilter(op, base, overlay, shifted, registry.produce(op.output))] };
    }
    case 'subtitles': {
      const input = read(op.inputs[0]);
      if (op.mode === 'soft' || !sideFiles.subtitlePath) {
        registry.alias(op.output, input);
        return { filters: [] };
      }
      const output = registry.produce(op.output);
      return { filters: [`${input}subtitles='${escapeFilterPath(sideFiles.subtitlePath)}'${output}`] };
    }
    case 'mix': {
      const { filterExpr, outputLabel } = buildAudioMixFilter(op, (inputId) => {
        const index = inputIndex.get(inputId);
        if (index === undefined) {
          throw createInternalConsistencyError(`Mix layer reads unknown input '${inputId}'.`, 'encoder');
        }
        return index;
      });
      registry.alias(op.output, `[${outputLabel}]`);
      return { filters: [filterExpr] };
    }
    case 'finalize':
      return { filters: [], mapped: { video: read(op.inputs[0]), audio: read(op.inputs[1]) } };
  }
}

/**
 * Escape a file path for use in FFmpeg filter_complex.
 * Handles special characters that need escaping in filter strings.
 */
export function escapeFilterPath(filePath: string): string {
  return (
    filePath
      // Escape backslashes first
      .replace(/\\/g, '\\\\\\\\')
      // Escape single quotes
      .replace(/'/g, "'\\''")
      // Escape colons (common in Windows paths)
      .replace(/:/g, '\\:')
  );
}

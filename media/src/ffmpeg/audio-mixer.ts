import type { GainSegment, MixOperation, PlanAudioLayer } from '@timeweave/core';
import { dbToLinear, formatNumber } from './format.js';

/**
 * Build an FFmpeg filter expression for the mix operation.
 *
 * Each layer is cut from its source offset (looping when asked), faded,
 * delayed to its timeline position and shaped by its gain envelope. The
 * layers are then mixed without normalization and padded or trimmed to
 * the plan duration.
 *
 * @param resolveInput - Maps a plan input id to its ffmpeg input index
 * @returns Object with filter expression and output label
 */
export function buildAudioMixFilter(
  op: MixOperation,
  resolveInput: (inputId: string) => number,
): { filterExpr: string; outputLabel: string } {
  if (op.layers.length === 0) {
    return buildSilenceFilter(op.duration);
  }

  const filterParts: string[] = [];
  const layerLabels: string[] = [];

  op.layers.forEach((layer, index) => {
    const label = `aud${index}`;
    filterParts.push(buildLayerFilter(layer, resolveInput(layer.input), label));
    layerLabels.push(`[${label}]`);
  });

  const duration = formatNumber(op.duration);
  filterParts.push(
    `${layerLabels.join('')}amix=inputs=${op.layers.length}:duration=longest:normalize=0,apad=whole_dur=${duration},atrim=0:${duration}[aout]`,
  );

  return {
    filterExpr: filterParts.join(';'),
    outputLabel: 'aout',
  };
}

function buildLayerFilter(layer: PlanAudioLayer, inputIndex: number, outputLabel: string): string {
  const filters: string[] = [];
  const duration = layer.end - layer.start;

  if (layer.loop) {
    if (layer.sourceIn > 0) {
      filters.push(`atrim=start=${formatNumber(layer.sourceIn)}`, 'asetpts=PTS-STARTPTS');
    }
    filters.push('aloop=loop=-1:size=2e+09');
    filters.push(`atrim=0:${formatNumber(duration)}`);
  } else {
    filters.push(`atrim=start=${formatNumber(layer.sourceIn)}:duration=${formatNumber(duration)}`);
  }
  filters.push('asetpts=PTS-STARTPTS');

  if (layer.fadeIn > 0) {
    filters.push(`afade=t=in:st=0:d=${formatNumber(layer.fadeIn)}`);
  }
  if (layer.fadeOut > 0) {
    const fadeStart = Math.max(0, duration - layer.fadeOut);
    filters.push(`afade=t=out:st=${formatNumber(fadeStart)}:d=${formatNumber(layer.fadeOut)}`);
  }

  // After the delay, t is timeline time, which is what the envelope uses.
  if (layer.start > 0) {
    const delayMs = Math.round(layer.start * 1000);
    filters.push(`adelay=${delayMs}:all=1`);
  }
  filters.push(buildVolumeFilter(layer.envelope));

  return `[${inputIndex}:a]${filters.join(',')}[${outputLabel}]`;
}

/**
 * Piecewise-constant gain as a `volume` filter. A single piece becomes a
 * plain factor; several become a nested `if(lt(t,end),gain,...)`
 * expression evaluated per frame.
 */
export function buildVolumeFilter(envelope: readonly GainSegment[]): string {
  if (envelope.length <= 1) {
    return `volume=${formatNumber(dbToLinear(envelope[0]?.gainDb ?? 0))}`;
  }

  const last = envelope[envelope.length - 1];
  let expression = formatNumber(dbToLinear(last.gainDb));
  for (let i = envelope.length - 2; i >= 0; i--) {
    const piece = envelope[i];
    expression = `if(lt(t,${formatNumber(piece.end)}),${formatNumber(dbToLinear(piece.gainDb))},${expression})`;
  }
  return `volume='${expression}':eval=frame`;
}

function buildSilenceFilter(duration: number): { filterExpr: string; outputLabel: string } {
  return {
    filterExpr: `anullsrc=channel_layout=stereo:sample_rate=44100,atrim=0:${formatNumber(duration)}[aout]`,
    outputLabel: 'aout',
  };
}

import type { MixOperation, PlanAudioLayer } from '@timeweave/core';
import { describe, expect, it } from 'vitest';
import { buildAudioMixFilter, buildVolumeFilter } from './audio-mixer.js';
import { formatNumber } from './format.js';

function layer(overrides: Partial<PlanAudioLayer> = {}): PlanAudioLayer {
  return {
    id: 'music',
    kind: 'bgm',
    assetRef: 'music.mp3',
    input: 'input:1',
    start: 0,
    end: 10,
    sourceIn: 0,
    loop: false,
    gainDb: 0,
    fadeIn: 0,
    fadeOut: 0,
    priority: 2,
    envelope: [{ start: 0, end: 10, gainDb: 0 }],
    ...overrides,
  };
}

function mix(layers: PlanAudioLayer[], duration = 10): MixOperation {
  return {
    id: 'mix',
    phase: 'mix',
    op: 'mix',
    inputs: layers.map((entry) => entry.input),
    output: 'audio',
    duration,
    duckingDb: -12,
    layers,
    silenced: [],
  };
}

const inputIndex = (inputId: string): number => Number(inputId.split(':')[1]);

describe('buildAudioMixFilter', () => {
  it('loops a source from its offset, fades it and delays it into place', () => {
    const music = layer({
      sourceIn: 2,
      start: 3,
      end: 9,
      loop: true,
      fadeIn: 1,
      fadeOut: 2,
      envelope: [{ start: 3, end: 9, gainDb: -6 }],
    });

    const { filterExpr, outputLabel } = buildAudioMixFilter(mix([music]), inputIndex);

    expect(outputLabel).toBe('aout');
    expect(filterExpr.split(';')).toEqual([
      '[1:a]atrim=start=2,asetpts=PTS-STARTPTS,aloop=loop=-1:size=2e+09,atrim=0:6,asetpts=PTS-STARTPTS,afade=t=in:st=0:d=1,afade=t=out:st=4:d=2,adelay=3000:all=1,volume=0.501187[aud0]',
      '[aud0]amix=inputs=1:duration=longest:normalize=0,apad=whole_dur=10,atrim=0:10[aout]',
    ]);
  });

  it('cuts a non-looping layer in a single atrim', () => {
    const voice = layer({ id: 'voice', kind: 'narration', input: 'input:4', sourceIn: 1.5, start: 0, end: 2 });

    const { filterExpr } = buildAudioMixFilter(mix([voice]), inputIndex);

    expect(filterExpr.split(';')[0]).toBe('[4:a]atrim=start=1.5:duration=2,asetpts=PTS-STARTPTS,volume=1[aud0]');
  });

  it('generates silence when nothing is audible', () => {
    const { filterExpr } = buildAudioMixFilter(mix([], 7.5), inputIndex);

    expect(filterExpr).toBe('anullsrc=channel_layout=stereo:sample_rate=44100,atrim=0:7.5[aout]');
  });
});

describe('buildVolumeFilter', () => {
  it('uses a plain factor for a constant gain', () => {
    expect(buildVolumeFilter([{ start: 0, end: 4, gainDb: 0 }])).toBe('volume=1');
  });

  it('switches gain at every envelope boundary', () => {
    expect(
      buildVolumeFilter([
        { start: 0, end: 2, gainDb: 0 },
        { start: 2, end: 4, gainDb: -12 },
        { start: 4, end: 10, gainDb: 0 },
      ]),
    ).toBe("volume='if(lt(t,2),1,if(lt(t,4),0.251189,1))':eval=frame");
  });
});

describe('formatNumber', () => {
  it('drops trailing zeros and float noise', () => {
    expect(formatNumber(0.1 + 0.2)).toBe('0.3');
    expect(formatNumber(10)).toBe('10');
    expect(formatNumber(2.5)).toBe('2.5');
    expect(formatNumber(-0.0000001)).toBe('0');
  });
});

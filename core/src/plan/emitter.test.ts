import { describe, expect, it } from 'vitest';
import type { AssetTable } from '../assets/types.js';
import { planAudioMix } from '../audio/mix-planner.js';
import { resolveOverlays } from '../overlays/resolver.js';
import type { VideoSpec } from '../spec/types.js';
import { audioAsset, assetTable, specFrom, TEST_OPTIONS, videoAsset } from '../testing/fixtures.js';
import { compileTimeline } from '../timeline/compiler.js';
import { assertPlanConsistent, emitCompositionPlan, serializeCompositionPlan } from './emitter.js';
import type { CompositionPlan, PlanOperation } from './types.js';

function emit(spec: VideoSpec, assets: AssetTable): CompositionPlan {
  const timeline = compileTimeline(spec, assets, TEST_OPTIONS);
  const overlays = resolveOverlays(spec, assets, TEST_OPTIONS);
  const audio = planAudioMix(spec, timeline, assets, TEST_OPTIONS);
  return emitCompositionPlan({ spec, assets, timeline, overlays, audio }, TEST_OPTIONS);
}

function operation<K extends PlanOperation['op']>(
  plan: CompositionPlan,
  id: string,
  op: K,
): Extract<PlanOperation, { op: K }> | undefined {
  const found = plan.operations.find((candidate) => candidate.id === id);
  return found && isOp(found, op) ? found : undefined;
}

function isOp<K extends PlanOperation['op']>(
  candidate: PlanOperation,
  op: K,
): candidate is Extract<PlanOperation, { op: K }> {
  return candidate.op === op;
}

const spec = specFrom({
  output: { width: 1280, height: 720, fps: 25 },
  clips: [
    { id: 'intro', asset: 'intro.mp4', start: 0, end: 4 },
    { id: 'slow', asset: 'slow.mp4', start: 4, end: 10 },
    { id: 'gap', blank: true, color: 'navy', start: 10, end: 12 },
  ],
  overlays: [{ id: 'logo', asset: 'logo.mov', position: [0.75, 0.05], size: [0.2, 0.2], windows: [{ start: 1, end: 3 }] }],
  subtitles: [
    { id: 'second', text: 'And then', start: 5, end: 7 },
    { id: 'first', text: 'Hello', start: 0, end: 2 },
  ],
  audio: [
    { id: 'voice', kind: 'narration', asset: 'voice.mp3', start: 1, end: 3 },
    { id: 'music', kind: 'bgm', asset: 'music.mp3', gainDb: -6 },
  ],
});

const assets = assetTable(
  videoAsset('intro.mp4', 4),
  videoAsset('slow.mp4', 3),
  videoAsset('logo.mov', 30, { hasAudio: false }),
  audioAsset('voice.mp3', 2),
  audioAsset('music.mp3', 60),
);

describe('emitCompositionPlan', () => {
  const plan = emit(spec, assets);

  it('carries the resolved overlay stacks', () => {
    expect(plan.overlayStacks).toEqual([{ start: 1, end: 3, overlayIds: ['logo'] }]);
  });

  it('orders operations by phase', () => {
    expect(plan.operations.map((entry) => entry.id)).toEqual([
      'trim:0',
      'trim:1',
      'generate:2',
      'speed:1',
      'scale:seg0',
      'scale:seg1',
      'scale:seg2',
      'scale:ov:logo',
      'concat',
      'overlay:logo',
      'subtitles',
      'mix',
      'finalize',
    ]);
  });

  it('lists each asset once, in first-use order', () => {
    expect(plan.inputs.map((input) => [input.id, input.assetRef])).toEqual([
      ['input:0', 'intro.mp4'],
      ['input:1', 'slow.mp4'],
      ['input:2', 'logo.mov'],
      ['input:3', 'voice.mp3'],
      ['input:4', 'music.mp3'],
    ]);
    expect(plan.inputs[0]).toEqual({
      id: 'input:0',
      assetRef: 'intro.mp4',
      localPath: '/media/intro.mp4',
      duration: 4,
      width: 1920,
      height: 1080,
      hasVideo: true,
      hasAudio: true,
    });
  });

  it('retimes stretched segments between trim and scale', () => {
    expect(operation(plan, 'trim:1', 'trim')).toMatchObject({ inputs: ['input:1'], output: 'seg1:trim', from: 0, to: 3 });
    expect(operation(plan, 'speed:1', 'speed')).toMatchObject({
      inputs: ['seg1:trim'],
      output: 'seg1:speed',
      speedFactor: 0.5,
      ptsFactor: 2,
      duration: 6,
    });
    expect(operation(plan, 'scale:seg1', 'scale')).toMatchObject({
      inputs: ['seg1:speed'],
      output: 'seg1',
      width: 1280,
      height: 720,
      fit: 'contain',
      fps: 25,
    });
  });

  it('generates blank segments from their colour', () => {
    expect(operation(plan, 'generate:2', 'generate')).toMatchObject({
      inputs: [],
      output: 'seg2:trim',
      color: 'navy',
      duration: 2,
    });
  });

  it('layers overlays on the concatenated base', () => {
    expect(operation(plan, 'concat', 'concat')).toMatchObject({
      inputs: ['seg0', 'seg1', 'seg2'],
      output: 'base',
      segmentCount: 3,
      duration: 12,
    });
    expect(operation(plan, 'scale:ov:logo', 'scale')).toMatchObject({
      inputs: ['input:2'],
      output: 'ov:logo:scaled',
      width: 256,
      height: 144,
      fit: 'stretch',
    });
    expect(operation(plan, 'overlay:logo', 'overlay')).toMatchObject({
      inputs: ['base', 'ov:logo:scaled'],
      output: 'video:0',
      x: 960,
      y: 36,
      intervals: [{ start: 1, end: 3 }],
    });
  });

  it('numbers subtitle cues in timeline order', () => {
    expect(plan.subtitles).toEqual([
      { index: 1, id: 'first', start: 0, end: 2, text: 'Hello' },
      { index: 2, id: 'second', start: 5, end: 7, text: 'And then' },
    ]);
    expect(operation(plan, 'subtitles', 'subtitles')).toMatchObject({
      inputs: ['video:0'],
      output: 'video:subtitles',
      mode: 'burn',
      cueCount: 2,
    });
  });

  it('mixes every layer and records silenced segments', () => {
    const mix = operation(plan, 'mix', 'mix');

    expect(mix?.inputs).toEqual(['input:3', 'input:0', 'input:4']);
    expect(mix?.layers.map((layer) => [layer.id, layer.input])).toEqual([
      ['voice', 'input:3'],
      ['base:intro', 'input:0'],
      ['music', 'input:4'],
    ]);
    expect(mix?.silenced).toEqual([{ segmentIndex: 1, clipId: 'slow', start: 4, end: 10, reason: 'slow-motion' }]);
  });

  it('finalizes the last video stream with the mixed audio', () => {
    expect(plan.operations[plan.operations.length - 1]).toEqual({
      id: 'finalize',
      phase: 'finalize',
      op: 'finalize',
      inputs: ['video:subtitles', 'audio'],
      output: 'output',
      width: 1280,
      height: 720,
      fps: 25,
      duration: 12,
    });
  });

  it('rounds times to microseconds', () => {
    const tiny = specFrom({ clips: [{ id: 'a', asset: 'a.mp4', start: 0, end: 0.1 + 0.2 }] });

    const result = emit(tiny, assetTable(videoAsset('a.mp4', 0.3)));

    expect(result.output.duration).toBe(0.3);
    expect(operation(result, 'trim:0', 'trim')?.to).toBe(0.3);
  });

  it('skips the subtitle step when there are no cues', () => {
    const bare = specFrom({ clips: [{ id: 'a', asset: 'a.mp4', start: 0, end: 5 }] });

    const result = emit(bare, assetTable(videoAsset('a.mp4', 5)));

    expect(result.operations.map((entry) => entry.op)).toEqual(['trim', 'scale', 'concat', 'mix', 'finalize']);
    expect(operation(result, 'finalize', 'finalize')?.inputs).toEqual(['base', 'audio']);
  });
});

describe('serializeCompositionPlan', () => {
  it('renders stable JSON with a trailing newline', () => {
    const plan = emit(spec, assets);

    const text = serializeCompositionPlan(plan);

    expect(text.endsWith('}\n')).toBe(true);
    expect(JSON.parse(text)).toEqual(plan);
    expect(serializeCompositionPlan(emit(spec, assets))).toBe(text);
  });
});

describe('assertPlanConsistent', () => {
  const plan = emit(spec, assets);

  it('accepts an emitted plan', () => {
    expect(() => assertPlanConsistent(plan, 0.001)).not.toThrow();
  });

  it('rejects a stream read before it is produced', () => {
    const broken = structuredClone(plan);
    broken.operations = broken.operations.map((entry) =>
      entry.id === 'concat' ? { ...entry, inputs: ['seg0', 'seg1', 'seg9'] } : entry,
    );

    expect(() => assertPlanConsistent(broken, 0.001)).toThrow(
      expect.objectContaining({
        kind: 'InternalConsistencyError',
        message: "Operation 'concat' reads 'seg9' before it is produced.",
      }),
    );
  });

  it('rejects operations out of phase order', () => {
    const broken = structuredClone(plan);
    const mix = broken.operations.findIndex((entry) => entry.id === 'mix');
    const [moved] = broken.operations.splice(mix, 1);
    broken.operations.unshift(moved);

    expect(() => assertPlanConsistent(broken, 0.001)).toThrow(
      expect.objectContaining({ code: 'R030', location: { context: 'operations' } }),
    );
  });

  it('rejects an overlay stack naming an overlay that is never layered', () => {
    const broken = structuredClone(plan);
    broken.overlayStacks = [{ start: 1, end: 3, overlayIds: ['logo', 'watermark'] }];

    expect(() => assertPlanConsistent(broken, 0.001)).toThrow(
      "Overlay stack [1, 3] names 'watermark', which is never layered.",
    );
  });

  it('rejects segments that do not add up to the output duration', () => {
    const broken = structuredClone(plan);
    broken.operations = broken.operations.map((entry) =>
      entry.op === 'generate' ? { ...entry, duration: 3 } : entry,
    );

    expect(() => assertPlanConsistent(broken, 0.001)).toThrow('Segment durations sum to 13s but the output lasts 12s.');
  });
});

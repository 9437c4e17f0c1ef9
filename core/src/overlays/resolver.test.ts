import { describe, expect, it } from 'vitest';
import { audioAsset, assetTable, specFrom, TEST_OPTIONS, videoAsset } from '../testing/fixtures.js';
import { resolveOverlays } from './resolver.js';

const overlay = (id: string, windows: Array<{ start: number; end?: number }>, extra: Record<string, unknown> = {}) => ({
  id,
  asset: `${id}.mov`,
  position: [0, 0],
  size: [0.25, 0.25],
  windows,
  ...extra,
});

const assets = assetTable(
  videoAsset('base.mp4', 10),
  videoAsset('host.mov', 3, { width: 640, height: 480 }),
  videoAsset('logo.mov', 30),
  videoAsset('badge.mov', 30),
);

function specWith(overlays: unknown[]) {
  return specFrom({ clips: [{ id: 'base', asset: 'base.mp4', start: 0, end: 10 }], overlays });
}

describe('resolveOverlays', () => {
  describe('draw order', () => {
    it('follows declaration order when no z-index is given', () => {
      const spec = specWith([overlay('logo', [{ start: 0, end: 10 }]), overlay('badge', [{ start: 0, end: 10 }])]);

      const result = resolveOverlays(spec, assets, TEST_OPTIONS);

      expect(result.overlays.map((entry) => [entry.id, entry.drawOrder])).toEqual([
        ['logo', 0],
        ['badge', 1],
      ]);
      expect(result.stacks).toEqual([{ start: 0, end: 10, overlayIds: ['logo', 'badge'] }]);
    });

    it('draws higher z-indices on top', () => {
      const spec = specWith([
        overlay('logo', [{ start: 0, end: 10 }], { zIndex: 2 }),
        overlay('badge', [{ start: 0, end: 10 }]),
      ]);

      const result = resolveOverlays(spec, assets, TEST_OPTIONS);

      expect(result.overlays.map((entry) => entry.id)).toEqual(['badge', 'logo']);
    });

    it('rejects equal explicit z-indices under the reject policy', () => {
      const spec = specWith([
        overlay('logo', [{ start: 0, end: 6 }], { zIndex: 1 }),
        overlay('badge', [{ start: 4, end: 10 }], { zIndex: 1 }),
      ]);

      expect(() => resolveOverlays(spec, assets, { ...TEST_OPTIONS, zIndexTiePolicy: 'reject' })).toThrow(
        expect.objectContaining({
          kind: 'ValidationError',
          issues: [expect.objectContaining({ code: 'V015', location: { entity: "overlay 'badge'", context: 'zIndex' } })],
        }),
      );
    });

    it('allows equal z-indices that are never visible together', () => {
      const spec = specWith([
        overlay('logo', [{ start: 0, end: 4 }], { zIndex: 1 }),
        overlay('badge', [{ start: 4, end: 10 }], { zIndex: 1 }),
      ]);

      const result = resolveOverlays(spec, assets, { ...TEST_OPTIONS, zIndexTiePolicy: 'reject' });

      expect(result.overlays).toHaveLength(2);
    });
  });

  describe('visibility intervals', () => {
    it('ends an open window after the asset duration', () => {
      const spec = specWith([overlay('host', [{ start: 2 }], { units: 'source', size: [0.5, 0.5] })]);

      const [host] = resolveOverlays(spec, assets, TEST_OPTIONS).overlays;

      expect(host.intervals).toEqual([{ start: 2, end: 5 }]);
    });

    it('clips windows to the timeline', () => {
      const spec = specWith([overlay('logo', [{ start: 8, end: 12 }])]);

      const [logo] = resolveOverlays(spec, assets, TEST_OPTIONS).overlays;

      expect(logo.intervals).toEqual([{ start: 8, end: 10 }]);
    });

    it('merges overlapping and touching windows', () => {
      const spec = specWith([
        overlay('logo', [
          { start: 2, end: 5 },
          { start: 0, end: 3 },
          { start: 5.0005, end: 6 },
          { start: 8, end: 9 },
        ]),
      ]);

      const [logo] = resolveOverlays(spec, assets, TEST_OPTIONS).overlays;

      expect(logo.intervals).toEqual([
        { start: 0, end: 6 },
        { start: 8, end: 9 },
      ]);
    });

    it('splits the timeline into stacks at every edge', () => {
      const spec = specWith([overlay('logo', [{ start: 0, end: 4 }]), overlay('badge', [{ start: 2, end: 6 }])]);

      const { stacks } = resolveOverlays(spec, assets, TEST_OPTIONS);

      expect(stacks).toEqual([
        { start: 0, end: 2, overlayIds: ['logo'] },
        { start: 2, end: 4, overlayIds: ['logo', 'badge'] },
        { start: 4, end: 6, overlayIds: ['badge'] },
      ]);
    });
  });

  describe('transforms', () => {
    it('scales normalized units by the output frame', () => {
      const spec = specWith([overlay('logo', [{ start: 0 }], { position: [0.5, 0.25] })]);

      const [logo] = resolveOverlays(spec, assets, TEST_OPTIONS).overlays;

      expect(logo.transform).toEqual({ x: 960, y: 270, width: 480, height: 270 });
    });

    it('rounds absolute units to whole pixels', () => {
      const spec = specWith([
        overlay('logo', [{ start: 0 }], { units: 'absolute', position: [10.4, 20.6], size: { w: 200, h: 100 } }),
      ]);

      const [logo] = resolveOverlays(spec, assets, TEST_OPTIONS).overlays;

      expect(logo.transform).toEqual({ x: 10, y: 21, width: 200, height: 100 });
    });

    it('sizes source units from the asset resolution', () => {
      const spec = specWith([overlay('host', [{ start: 0 }], { units: 'source', position: [0.7, 0.7], size: [0.5, 0.5] })]);

      const [host] = resolveOverlays(spec, assets, TEST_OPTIONS).overlays;

      expect(host.transform).toEqual({ x: 1344, y: 756, width: 320, height: 240 });
    });

    it('fails when a source-sized overlay has no resolution', () => {
      const spec = specFrom({
        clips: [{ id: 'base', asset: 'base.mp4', start: 0, end: 10 }],
        overlays: [{ id: 'voice', asset: 'voice.wav', position: [0, 0], size: [1, 1], units: 'source', windows: [{ start: 0, end: 2 }] }],
      });

      expect(() => resolveOverlays(spec, assetTable(audioAsset('voice.wav', 5)), TEST_OPTIONS)).toThrow(
        expect.objectContaining({ kind: 'AssetUnavailableError', code: 'R001' }),
      );
    });
  });
});

import { ValidationErrorCode, createValidationIssue, type ValidationIssue } from '../errors/index.js';
import type { VideoSpec } from '../spec/types.js';
import type { AssetTable } from './types.js';

/**
 * Checks every probed asset carries the stream its use reads: video for
 * clips and overlays, audio for audio tracks. Unresolved references are
 * left to the later stages.
 */
export function checkAssetStreams(spec: VideoSpec, assets: AssetTable): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  const expectStream = (
    assetRef: string,
    stream: 'video' | 'audio',
    entity: string,
    label: string,
  ): void => {
    const asset = assets.get(assetRef);
    if (!asset || (stream === 'video' ? asset.hasVideo : asset.hasAudio)) {
      return;
    }
    issues.push(
      createValidationIssue(
        ValidationErrorCode.ASSET_STREAM_MISSING,
        `${label} uses '${assetRef}', which has no ${stream} stream.`,
        { entity, context: 'asset' },
      ),
    );
  };

  for (const clip of spec.clips) {
    if (!clip.blank && clip.asset !== undefined) {
      expectStream(clip.asset, 'video', `clip '${clip.id}'`, `Clip '${clip.id}'`);
    }
  }
  for (const overlay of spec.overlays) {
    expectStream(overlay.asset, 'video', `overlay '${overlay.id}'`, `Overlay '${overlay.id}'`);
  }
  for (const track of spec.audio) {
    expectStream(track.asset, 'audio', `audio track '${track.id}'`, `Audio track '${track.id}'`);
  }
  return issues;
}

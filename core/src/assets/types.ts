/**
 * What a media probe reports about one asset.
 */
export interface MediaInfo {
  /** Native duration in seconds */
  duration: number;
  /** Native resolution; absent for audio-only assets */
  width?: number;
  height?: number;
  hasVideo: boolean;
  hasAudio: boolean;
}

export interface ProbeRequest {
  /** Reference as written in the spec */
  assetRef: string;
  /** Locally readable handle (the reference itself when nothing was fetched) */
  localPath: string;
}

/**
 * Reads duration and stream information from a local media file.
 */
export type MediaProbe = (request: ProbeRequest) => Promise<MediaInfo>;

export interface FetchRequest {
  assetRef: string;
}

/**
 * Turns an asset reference (local path or remote URL) into a locally
 * readable path.
 */
export type AssetFetcher = (request: FetchRequest) => Promise<string>;

/**
 * A fully resolved asset. Immutable once resolved.
 */
export interface ResolvedAsset extends MediaInfo {
  ref: string;
  localPath: string;
}

/**
 * Resolved assets keyed by reference.
 */
export type AssetTable = ReadonlyMap<string, ResolvedAsset>;

import { createHash } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { extname, isAbsolute, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  RuntimeErrorCode,
  createAssetUnavailableError,
  type AssetFetcher,
  type Logger,
} from '@timeweave/core';

export interface AssetFetcherOptions {
  /** Directory remote assets are downloaded into */
  workDir: string;
  /** Directory relative local references resolve against (default: cwd) */
  baseDir?: string;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  logger?: Partial<Logger>;
}

/**
 * Creates a fetcher that turns asset references into local paths.
 *
 * - `http(s)://` references are downloaded once per fetcher into `workDir`
 * - `file://` URLs become their path
 * - anything else is a local path, resolved against `baseDir`
 */
export function createAssetFetcher(options: AssetFetcherOptions): AssetFetcher {
  const { workDir, logger = {} } = options;
  const baseDir = options.baseDir ?? process.cwd();
  const fetchImpl = options.fetch ?? fetch;
  const downloads = new Map<string, Promise<string>>();

  return ({ assetRef }) => {
    if (isRemoteReference(assetRef)) {
      const pending = downloads.get(assetRef);
      if (pending) {
        return pending;
      }
      const download = downloadAsset(assetRef, workDir, fetchImpl, logger);
      downloads.set(assetRef, download);
      return download;
    }

    if (assetRef.startsWith('file://')) {
      return Promise.resolve(fileURLToPath(assetRef));
    }
    return Promise.resolve(isAbsolute(assetRef) ? assetRef : resolve(baseDir, assetRef));
  };
}

export function isRemoteReference(assetRef: string): boolean {
  return /^https?:\/\//i.test(assetRef);
}

/**
 * Local file name for a downloaded asset: a hash of the URL plus the
 * original extension, so repeated runs reuse the same name.
 */
export function downloadFileName(url: string): string {
  const digest = createHash('sha256').update(url).digest('hex').slice(0, 16);
  return `${digest}${extname(new URL(url).pathname)}`;
}

async function downloadAsset(
  url: string,
  workDir: string,
  fetchImpl: typeof fetch,
  logger: Partial<Logger>,
): Promise<string> {
  const target = join(workDir, downloadFileName(url));
  logger.debug?.('fetch.start', { url, target });

  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (error) {
    throw createAssetUnavailableError(
      RuntimeErrorCode.ASSET_FETCH_FAILED,
      url,
      `Failed to download asset '${url}': ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  if (!response.ok) {
    throw createAssetUnavailableError(
      RuntimeErrorCode.ASSET_FETCH_FAILED,
      url,
      `Failed to download asset '${url}' (${response.status}).`,
    );
  }

  const data = Buffer.from(await response.arrayBuffer());
  await mkdir(workDir, { recursive: true });
  await writeFile(target, data);

  logger.debug?.('fetch.done', { url, target, bytes: data.length });
  return target;
}

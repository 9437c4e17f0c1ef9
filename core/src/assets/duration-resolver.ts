import pLimit from 'p-limit';
import {
  RuntimeErrorCode,
  createAssetUnavailableError,
  isErrorKind,
} from '../errors/index.js';
import type { Logger } from '../logger.js';
import { COMPILER_DEFAULTS } from '../config.js';
import type {
  AssetFetcher,
  AssetTable,
  MediaInfo,
  MediaProbe,
  ResolvedAsset,
} from './types.js';

export interface DurationResolverOptions {
  probe: MediaProbe;
  /** Resolves remote references to local files before probing */
  fetcher?: AssetFetcher;
  /** Max number of probes in flight (default: 4) */
  concurrency?: number;
  /** Per-probe timeout in milliseconds (default: 30s) */
  timeoutMs?: number;
  logger?: Partial<Logger>;
}

export interface DurationResolver {
  /** Resolves one asset. Concurrent calls for the same reference share one probe. */
  resolve(assetRef: string): Promise<ResolvedAsset>;
  /**
   * Resolves every reference. Settles once all probes succeed, or rejects
   * with the first failure.
   */
  resolveAll(assetRefs: Iterable<string>): Promise<AssetTable>;
}

/**
 * Creates a resolver whose cache lives exactly as long as the returned
 * object. Each compile run creates its own, so assets are always probed cold.
 */
export function createDurationResolver(options: DurationResolverOptions): DurationResolver {
  const { probe, fetcher } = options;
  const timeoutMs = options.timeoutMs ?? COMPILER_DEFAULTS.probeTimeoutMs;
  const logger = options.logger ?? {};
  const limit = pLimit(options.concurrency ?? COMPILER_DEFAULTS.probeConcurrency);
  const cache = new Map<string, Promise<ResolvedAsset>>();

  const resolve = (assetRef: string): Promise<ResolvedAsset> => {
    const cached = cache.get(assetRef);
    if (cached) {
      logger.debug?.('probe.cache.hit', { assetRef });
      return cached;
    }
    const pending = limit(() => resolveAsset(assetRef, { probe, fetcher, timeoutMs, logger }));
    cache.set(assetRef, pending);
    return pending;
  };

  return {
    resolve,
    async resolveAll(assetRefs) {
      const unique = [...new Set(assetRefs)];
      const resolved = await Promise.all(unique.map((assetRef) => resolve(assetRef)));
      return new Map(resolved.map((asset) => [asset.ref, asset]));
    },
  };
}

interface ResolveContext {
  probe: MediaProbe;
  fetcher?: AssetFetcher;
  timeoutMs: number;
  logger: Partial<Logger>;
}

async function resolveAsset(assetRef: string, context: ResolveContext): Promise<ResolvedAsset> {
  const { probe, fetcher, timeoutMs, logger } = context;
  const localPath = fetcher ? await fetchAsset(assetRef, fetcher) : assetRef;

  logger.debug?.('probe.start', { assetRef, localPath });
  let info: MediaInfo;
  try {
    info = await withTimeout(probe({ assetRef, localPath }), timeoutMs, () =>
      createAssetUnavailableError(
        RuntimeErrorCode.ASSET_PROBE_TIMEOUT,
        assetRef,
        `Probing asset '${assetRef}' did not finish within ${timeoutMs} ms.`,
        { suggestion: 'Check that the file is readable, or raise the probe timeout.' },
      ),
    );
  } catch (error) {
    if (isErrorKind(error, 'AssetUnavailableError')) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw createAssetUnavailableError(
      RuntimeErrorCode.ASSET_PROBE_FAILED,
      assetRef,
      `Failed to probe asset '${assetRef}': ${message}`,
      { cause: error },
    );
  }

  if (!Number.isFinite(info.duration) || info.duration <= 0) {
    throw createAssetUnavailableError(
      RuntimeErrorCode.ASSET_PROBE_FAILED,
      assetRef,
      `Asset '${assetRef}' reported an unusable duration (${info.duration}).`,
    );
  }

  logger.debug?.('probe.done', { assetRef, duration: info.duration });
  return { ...info, ref: assetRef, localPath };
}

async function fetchAsset(assetRef: string, fetcher: AssetFetcher): Promise<string> {
  try {
    return await fetcher({ assetRef });
  } catch (error) {
    if (isErrorKind(error, 'AssetUnavailableError')) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw createAssetUnavailableError(
      RuntimeErrorCode.ASSET_FETCH_FAILED,
      assetRef,
      `Failed to fetch asset '${assetRef}': ${message}`,
      { cause: error },
    );
  }
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

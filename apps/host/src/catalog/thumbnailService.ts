import type { AssetStore } from "../assets/assetStore.js";
import type { ThumbnailCache } from "./thumbnailCache.js";
import type { Metrics } from "../observability/metrics.js";

/**
 * Serves thumbnails from the cache, generating through the asset store on a
 * miss. Concurrent requests for one id share a single generation.
 */
export class ThumbnailService {
  private inflight: Map<string, Promise<Buffer | null>> = new Map();

  constructor(
    private readonly store: AssetStore,
    private readonly cache: ThumbnailCache,
    private readonly metrics: Metrics
  ) {}

  /**
   * Thumbnail bytes, or null when the store has none for this id
   */
  get(assetId: string): Promise<Buffer | null> {
    const cached = this.cache.get(assetId);
    if (cached) {
      this.metrics.cacheHit();
      return Promise.resolve(cached);
    }

    this.metrics.cacheMiss();
    let pending = this.inflight.get(assetId);
    if (!pending) {
      pending = this.generate(assetId);
      this.inflight.set(assetId, pending);
    }
    return pending;
  }

  invalidate(assetId: string): void {
    this.cache.invalidate(assetId);
  }

  clear(): void {
    this.cache.clear();
  }

  private async generate(assetId: string): Promise<Buffer | null> {
    try {
      const data = await this.store.thumbnail(assetId);
      if (data) {
        this.cache.put(assetId, data);
      }
      return data;
    } finally {
      this.inflight.delete(assetId);
    }
  }
}

export type ThumbnailCacheOptions = {
  maxEntries?: number;
  maxBytes?: number;
};

/**
 * Bounded LRU cache of encoded thumbnails keyed by asset id.
 *
 * Two ceilings apply at once: entry count and total byte size. Recency is
 * the Map's insertion order; a hit moves the entry to the back.
 */
export class ThumbnailCache {
  private entries: Map<string, Buffer> = new Map();
  private bytes: number = 0;
  private readonly maxEntries: number;
  private readonly maxBytes: number;

  constructor(options: ThumbnailCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? 500;
    this.maxBytes = options.maxBytes ?? 50 * 1024 * 1024;
  }

  /**
   * Cached bytes for an id, or undefined on a miss
   */
  get(id: string): Buffer | undefined {
    const data = this.entries.get(id);
    if (data === undefined) return undefined;

    this.entries.delete(id);
    this.entries.set(id, data);
    return data;
  }

  /**
   * Insert or replace an entry, evicting least recently used ones until
   * both limits hold
   *
   * @returns false when the entry alone exceeds a limit and was not stored
   */
  put(id: string, data: Buffer): boolean {
    this.invalidate(id);

    if (data.length > this.maxBytes || this.maxEntries === 0) {
      return false;
    }

    this.entries.set(id, data);
    this.bytes += data.length;
    this.evict();
    return true;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  invalidate(id: string): void {
    const data = this.entries.get(id);
    if (data === undefined) return;

    this.entries.delete(id);
    this.bytes -= data.length;
  }

  clear(): void {
    this.entries.clear();
    this.bytes = 0;
  }

  size(): number {
    return this.entries.size;
  }

  totalBytes(): number {
    return this.bytes;
  }

  private evict(): void {
    for (const [id, data] of this.entries) {
      if (this.entries.size <= this.maxEntries && this.bytes <= this.maxBytes) {
        return;
      }
      this.entries.delete(id);
      this.bytes -= data.length;
    }
  }
}

import type { AssetRecord, AssetStore } from "../../apps/host/src/assets/assetStore.js";
import type { PayloadStream } from "../../packages/protocol/src/types.js";
import { ResourceError } from "../../apps/host/src/errors.js";

export type MemoryAsset = AssetRecord & {
  data: Buffer;
  thumbnail?: Buffer;
};

export type MemoryAssetStoreOptions = {
  chunkSize?: number;
  chunkDelayMs?: number; // pause before each file chunk
};

/**
 * AssetStore over fixed in-memory assets
 */
export class MemoryAssetStore implements AssetStore {
  thumbnailCalls: number = 0;
  failListing: boolean = false;
  chunksYielded: number = 0;
  streamsFinished: number = 0;

  private assets: Map<string, MemoryAsset>;
  private readonly chunkSize: number;
  private readonly chunkDelayMs: number;

  constructor(assets: MemoryAsset[], options: MemoryAssetStoreOptions = {}) {
    this.assets = new Map(assets.map((asset) => [asset.id, asset]));
    this.chunkSize = options.chunkSize ?? 50_000;
    this.chunkDelayMs = options.chunkDelayMs ?? 0;
  }

  async listAssets(): Promise<AssetRecord[]> {
    if (this.failListing) {
      throw new ResourceError("library offline");
    }
    return Array.from(this.assets.values(), ({ data: _data, thumbnail: _thumbnail, ...record }) => record);
  }

  async sizeOf(id: string): Promise<number> {
    const asset = this.assets.get(id);
    if (!asset) {
      throw new ResourceError(`Unknown asset: ${id}`, id);
    }
    return asset.data.length;
  }

  async thumbnail(id: string): Promise<Buffer | null> {
    this.thumbnailCalls++;
    return this.assets.get(id)?.thumbnail ?? null;
  }

  async openFile(id: string): Promise<PayloadStream | null> {
    const asset = this.assets.get(id);
    if (!asset) return null;
    return { size: asset.data.length, chunks: this.chunksOf(asset.data) };
  }

  private async *chunksOf(data: Buffer): AsyncGenerator<Buffer> {
    try {
      for (let offset = 0; offset < data.length; offset += this.chunkSize) {
        if (this.chunkDelayMs > 0) {
          await new Promise<void>((resolve) => setTimeout(resolve, this.chunkDelayMs));
        }
        this.chunksYielded++;
        yield data.subarray(offset, offset + this.chunkSize);
      }
    } finally {
      this.streamsFinished++;
    }
  }
}

export function photo(id: string, sizeBytes: number, extra: Partial<MemoryAsset> = {}): MemoryAsset {
  return {
    id,
    filename: `${id}.jpg`,
    type: "photo",
    width: 4032,
    height: 3024,
    durationSeconds: null,
    creationDate: "2024-05-01T10:00:00.000Z",
    isLivePhoto: false,
    data: Buffer.alloc(sizeBytes, 1),
    ...extra,
  };
}

export function video(id: string, sizeBytes: number, durationSeconds: number): MemoryAsset {
  return {
    id,
    filename: `${id}.mov`,
    type: "video",
    width: 1920,
    height: 1080,
    durationSeconds,
    creationDate: "2024-05-02T10:00:00.000Z",
    isLivePhoto: false,
    data: Buffer.alloc(sizeBytes, 2),
  };
}

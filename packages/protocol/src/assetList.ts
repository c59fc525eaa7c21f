/**
 * Asset List Payload
 *
 * ASSETS_LIST carries a JSON document. Field names on the wire are snake_case
 * and fixed by the peer implementation; in code the model is camelCase.
 */

import { z } from "zod";
import { InvalidPayloadError } from "./errors.js";

export type AssetType = "photo" | "video" | "live_photo";

export type AssetMetadata = {
  id: string;
  filename: string;
  type: AssetType;
  sizeBytes: number;
  width: number;
  height: number;
  durationSeconds: number | null; // null for plain photos
  creationDate: string; // ISO-8601
  isLivePhoto: boolean;
};

export type AssetCounts = {
  totalCount: number;
  photosCount: number; // photo + live_photo
  videosCount: number;
  totalSizeBytes: number;
};

export type AssetListResponse = AssetCounts & {
  assets: AssetMetadata[];
};

const assetMetadataWireSchema = z.object({
  id: z.string().min(1),
  filename: z.string(),
  type: z.enum(["photo", "video", "live_photo"]),
  size_bytes: z.number().int().nonnegative(),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
  duration_seconds: z.number().nonnegative().nullable().optional(),
  creation_date: z.string(),
  is_live_photo: z.boolean(),
});

const assetListWireSchema = z.object({
  assets: z.array(assetMetadataWireSchema),
  total_count: z.number().int().nonnegative(),
  photos_count: z.number().int().nonnegative(),
  videos_count: z.number().int().nonnegative(),
  total_size_bytes: z.number().int().nonnegative(),
});

type AssetMetadataWire = z.infer<typeof assetMetadataWireSchema>;
type AssetListWire = z.infer<typeof assetListWireSchema>;

/**
 * Derive the aggregate counts from a sequence of assets
 */
export function countAssets(
  assets: ReadonlyArray<Pick<AssetMetadata, "type" | "sizeBytes">>
): AssetCounts {
  let photosCount = 0;
  let videosCount = 0;
  let totalSizeBytes = 0;

  for (const asset of assets) {
    if (asset.type === "video") {
      videosCount++;
    } else {
      photosCount++;
    }
    totalSizeBytes += asset.sizeBytes;
  }

  return {
    totalCount: assets.length,
    photosCount,
    videosCount,
    totalSizeBytes,
  };
}

/**
 * Build a response whose aggregates always match its assets
 *
 * @throws InvalidPayloadError if two assets share an id
 */
export function buildAssetListResponse(
  assets: ReadonlyArray<AssetMetadata>
): AssetListResponse {
  const seen = new Set<string>();
  for (const asset of assets) {
    if (seen.has(asset.id)) {
      throw new InvalidPayloadError(`Duplicate asset id: ${asset.id}`);
    }
    seen.add(asset.id);
  }

  const normalized = assets.map((asset) => ({
    ...asset,
    durationSeconds: asset.type === "photo" ? null : asset.durationSeconds,
  }));

  return { assets: normalized, ...countAssets(normalized) };
}

function toWire(asset: AssetMetadata): AssetMetadataWire {
  const wire: AssetMetadataWire = {
    id: asset.id,
    filename: asset.filename,
    type: asset.type,
    size_bytes: asset.sizeBytes,
    width: asset.width,
    height: asset.height,
    creation_date: asset.creationDate,
    is_live_photo: asset.isLivePhoto,
  };
  // Absent rather than null when there is no duration
  if (asset.durationSeconds !== null) {
    wire.duration_seconds = asset.durationSeconds;
  }
  return wire;
}

function fromWire(wire: AssetMetadataWire): AssetMetadata {
  return {
    id: wire.id,
    filename: wire.filename,
    type: wire.type,
    sizeBytes: wire.size_bytes,
    width: wire.width,
    height: wire.height,
    durationSeconds: wire.duration_seconds ?? null,
    creationDate: wire.creation_date,
    isLivePhoto: wire.is_live_photo,
  };
}

/**
 * Serialize a response into an ASSETS_LIST payload
 */
export function encodeAssetList(response: AssetListResponse): Buffer {
  const wire: AssetListWire = {
    assets: response.assets.map(toWire),
    total_count: response.totalCount,
    photos_count: response.photosCount,
    videos_count: response.videosCount,
    total_size_bytes: response.totalSizeBytes,
  };
  return Buffer.from(JSON.stringify(wire), "utf8");
}

/**
 * Parse and validate an ASSETS_LIST payload
 *
 * @throws InvalidPayloadError on malformed JSON, schema mismatch, or
 *   aggregates that disagree with the asset sequence
 */
export function decodeAssetList(payload: Buffer): AssetListResponse {
  let json: unknown;
  try {
    json = JSON.parse(payload.toString("utf8"));
  } catch (err) {
    throw new InvalidPayloadError(`Invalid JSON payload: ${err}`);
  }

  const parsed = assetListWireSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidPayloadError(
      `Invalid asset list: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
  }

  const assets = parsed.data.assets.map(fromWire);
  const counts = countAssets(assets);
  if (
    counts.totalCount !== parsed.data.total_count ||
    counts.photosCount !== parsed.data.photos_count ||
    counts.videosCount !== parsed.data.videos_count ||
    counts.totalSizeBytes !== parsed.data.total_size_bytes
  ) {
    throw new InvalidPayloadError("Asset list aggregates do not match assets");
  }

  return { assets, ...counts };
}

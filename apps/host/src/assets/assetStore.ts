import type { AssetMetadata } from "../../../../packages/protocol/src/assetList.js";
import type { PayloadStream } from "../../../../packages/protocol/src/types.js";

/**
 * Metadata that is cheap to produce. Size is asked for separately through
 * AssetStore.sizeOf, since computing it can mean touching every file.
 */
export type AssetRecord = Omit<AssetMetadata, "sizeBytes">;

/**
 * The media library the host serves from.
 *
 * Lookups of unknown ids resolve to null; failures to read the library
 * reject with ResourceError.
 */
export interface AssetStore {
  listAssets(): Promise<AssetRecord[]>;
  sizeOf(id: string): Promise<number>;
  thumbnail(id: string): Promise<Buffer | null>;
  /** For live photos this is the still image component. */
  openFile(id: string): Promise<PayloadStream | null>;
}

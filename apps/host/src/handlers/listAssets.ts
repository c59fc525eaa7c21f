import { Command } from "../../../../packages/protocol/src/constants.js";
import {
  buildAssetListResponse,
  encodeAssetList,
} from "../../../../packages/protocol/src/assetList.js";
import type { AssetListResponse } from "../../../../packages/protocol/src/assetList.js";
import type { HandlerContext } from "./context.js";

export const LIST_UNAVAILABLE = "Asset list unavailable";

/**
 * Handle LIST_ASSETS
 *
 * Takes a fresh metadata snapshot, sizes every asset, and sends the whole
 * list as one ASSETS_LIST frame. If the library cannot be read the peer is
 * told so with a NOTIFICATION instead of being left waiting.
 */
export async function handleListAssets(ctx: HandlerContext): Promise<void> {
  const { connection, signal, assetStore, logger } = ctx;

  let response: AssetListResponse;
  try {
    const records = await assetStore.listAssets();
    const sizes = await Promise.all(
      records.map((record) => assetStore.sizeOf(record.id))
    );
    response = buildAssetListResponse(
      records.map((record, index) => ({ ...record, sizeBytes: sizes[index] }))
    );
  } catch (err) {
    logger.error(`[${connection.connectionId}] Asset list failed`, err);
    if (!signal.aborted) {
      await connection.send(Command.NOTIFICATION, LIST_UNAVAILABLE);
    }
    return;
  }

  if (signal.aborted) return;

  const payload = encodeAssetList(response);
  await connection.send(Command.ASSETS_LIST, "", payload, { signal });
  logger.frame(connection.connectionId, "→", {
    command: Command.ASSETS_LIST,
    info: "",
    payloadSize: payload.length,
  });
  ctx.metrics.frameSent();
}

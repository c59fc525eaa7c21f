import { Command } from "../../../../packages/protocol/src/constants.js";
import type { HandlerContext } from "./context.js";

/**
 * Handle GET_THUMBNAIL
 *
 * Unknown assets and generation failures get no reply at all; the peer
 * applies its own timeout.
 */
export async function handleGetThumbnail(
  ctx: HandlerContext,
  assetId: string
): Promise<void> {
  const { connection, signal, logger } = ctx;

  let data: Buffer | null;
  try {
    data = await ctx.thumbnails.get(assetId);
  } catch (err) {
    logger.warn(`[${connection.connectionId}] Thumbnail generation failed: ${assetId}`, err);
    return;
  }

  if (!data) {
    logger.debug(`[${connection.connectionId}] No thumbnail for asset: ${assetId}`);
    return;
  }
  if (signal.aborted) return;

  await connection.send(Command.THUMBNAIL_DATA, assetId, data, { signal });
  logger.frame(connection.connectionId, "→", {
    command: Command.THUMBNAIL_DATA,
    info: assetId,
    payloadSize: data.length,
  });
  ctx.metrics.frameSent();
  ctx.metrics.thumbnailServed();
}

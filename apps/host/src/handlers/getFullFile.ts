import { Command } from "../../../../packages/protocol/src/constants.js";
import type { PayloadStream } from "../../../../packages/protocol/src/types.js";
import { releasePayload } from "../../../../packages/transport/src/payload.js";
import type { HandlerContext } from "./context.js";

/**
 * Handle GET_FULL_FILE
 *
 * Streams the asset's original bytes as FILE_DATA. For a live photo that is
 * the still image. Unknown assets get no reply.
 */
export async function handleGetFullFile(
  ctx: HandlerContext,
  assetId: string
): Promise<void> {
  const { connection, signal, logger } = ctx;

  let content: PayloadStream | null;
  try {
    content = await ctx.assetStore.openFile(assetId);
  } catch (err) {
    logger.warn(`[${connection.connectionId}] Cannot open asset: ${assetId}`, err);
    return;
  }

  if (!content) {
    logger.warn(`[${connection.connectionId}] Asset not found: ${assetId}`);
    return;
  }
  if (signal.aborted) {
    await releasePayload(content);
    return;
  }

  await connection.send(Command.FILE_DATA, assetId, content, { signal });
  logger.frame(connection.connectionId, "→", {
    command: Command.FILE_DATA,
    info: assetId,
    payloadSize: content.size,
  });
  ctx.metrics.frameSent();
  ctx.metrics.fileServed();
}

import type { FramePayload } from "../../protocol/src/types.js";

/**
 * Let go of a payload stream that will never be written
 *
 * Ending the iterator is what closes an underlying file handle.
 */
export async function releasePayload(payload: FramePayload | undefined): Promise<void> {
  if (payload === undefined || Buffer.isBuffer(payload)) return;

  const iterator = payload.chunks[Symbol.asyncIterator]();
  if (iterator.return) {
    await iterator.return();
  }
}

import { HEADER_SIZE, CHUNK_SIZE } from "../../../protocol/src/constants.js";
import { decodeHeader } from "../../../protocol/src/frame.js";
import type { Frame, FrameHeader } from "../../../protocol/src/types.js";
import type { InvalidHeaderError } from "../../../protocol/src/errors.js";

export interface FrameReaderHandlers {
  frame: (frame: Frame) => void;
  invalidHeader: (error: InvalidHeaderError) => void;
}

/**
 * Incremental frame parser.
 *
 * Accepts bytes split at arbitrary boundaries. A header is always exactly
 * HEADER_SIZE bytes; an invalid one is reported and dropped, and the next
 * HEADER_SIZE bytes are treated as a fresh header. Payload bytes are held as
 * slices of at most CHUNK_SIZE and joined once, when the frame is complete.
 */
export class FrameReader {
  private headerBytes: Buffer = Buffer.alloc(HEADER_SIZE);
  private headerFilled: number = 0;

  private current: FrameHeader | null = null;
  private payloadChunks: Buffer[] = [];
  private payloadReceived: number = 0;

  constructor(private readonly handlers: FrameReaderHandlers) {}

  /**
   * Feed a chunk of bytes from the stream
   */
  push(chunk: Buffer): void {
    let offset = 0;

    while (offset < chunk.length) {
      if (!this.current) {
        offset = this.fillHeader(chunk, offset);
        continue;
      }

      const remaining = this.current.payloadSize - this.payloadReceived;
      const take = Math.min(remaining, chunk.length - offset, CHUNK_SIZE);
      this.payloadChunks.push(chunk.subarray(offset, offset + take));
      this.payloadReceived += take;
      offset += take;

      if (this.payloadReceived === this.current.payloadSize) {
        this.completeFrame(this.current);
      }
    }
  }

  /**
   * True when some bytes of a frame have arrived but not all of them
   */
  hasPartialFrame(): boolean {
    return this.headerFilled > 0 || this.current !== null;
  }

  /**
   * Bytes held for the frame in progress
   */
  bufferedBytes(): number {
    return this.headerFilled + this.payloadReceived;
  }

  private fillHeader(chunk: Buffer, offset: number): number {
    const take = Math.min(HEADER_SIZE - this.headerFilled, chunk.length - offset);
    chunk.copy(this.headerBytes, this.headerFilled, offset, offset + take);
    this.headerFilled += take;

    if (this.headerFilled < HEADER_SIZE) {
      return offset + take;
    }

    this.headerFilled = 0;
    const result = decodeHeader(this.headerBytes);

    if (!result.valid) {
      this.handlers.invalidHeader(result.error);
    } else if (result.header.payloadSize === 0) {
      this.completeFrame(result.header);
    } else {
      this.current = result.header;
    }

    return offset + take;
  }

  private completeFrame(header: FrameHeader): void {
    const payload =
      this.payloadChunks.length === 1
        ? Buffer.from(this.payloadChunks[0])
        : Buffer.concat(this.payloadChunks, this.payloadReceived);

    this.current = null;
    this.payloadChunks = [];
    this.payloadReceived = 0;

    this.handlers.frame({
      command: header.command,
      info: header.info,
      payload,
    });
  }
}

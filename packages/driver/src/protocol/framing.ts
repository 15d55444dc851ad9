import { Uint8ArrayList } from 'uint8arraylist';
import { FrameTooLargeError } from '../errors.js';

const HEADER_LENGTH = 4;

export const MAX_FRAME_LENGTH = 64 * 1024 * 1024;

/** Prefixes the payload with its length as a 32-bit big-endian integer. */
export function encodeFrame(payload: Uint8Array): Uint8Array {
  const frame = new Uint8Array(HEADER_LENGTH + payload.byteLength);
  new DataView(frame.buffer).setUint32(0, payload.byteLength);
  frame.set(payload, HEADER_LENGTH);
  return frame;
}

/**
 * Reassembles length-prefixed frames from the chunks of a byte stream. Chunks
 * may split or coalesce frames arbitrarily.
 */
export class FrameDecoder {
  private readonly buffer = new Uint8ArrayList();
  private readonly maxFrameLength: number;

  constructor(maxFrameLength = MAX_FRAME_LENGTH) {
    this.maxFrameLength = maxFrameLength;
  }

  /** Appends a chunk and returns every frame it completes, in order. */
  push(chunk: Uint8Array | Uint8ArrayList): Uint8Array[] {
    this.buffer.append(chunk);
    const frames: Uint8Array[] = [];

    while (this.buffer.byteLength >= HEADER_LENGTH) {
      const length = this.buffer.getUint32(0);
      if (length > this.maxFrameLength) {
        throw new FrameTooLargeError(length, this.maxFrameLength);
      }
      const end = HEADER_LENGTH + length;
      if (this.buffer.byteLength < end) {
        break;
      }
      frames.push(this.buffer.slice(HEADER_LENGTH, end));
      this.buffer.consume(end);
    }

    return frames;
  }

  /** Bytes held back waiting for the rest of a frame. */
  get pending(): number {
    return this.buffer.byteLength;
  }
}

/**
 * Length-prefixed text frames.
 *
 * byte 0     : message type (0x01 = TEXT)
 * bytes 1-4  : payload length, uint32 big-endian
 * bytes 5..  : UTF-8 payload
 */
import { concat } from "uint8arrays/concat";
import { fromString } from "uint8arrays/from-string";
import {
  BadFrameLengthError,
  BadFrameTypeError,
  InvalidPayloadError,
  PayloadTooLargeError,
} from "./errors";

export const MSG_TEXT = 0x01;
export const HEADER_BYTES = 5;
export const MAX_PAYLOAD = 1_048_576;

export interface Frame {
  readonly type: typeof MSG_TEXT;
  readonly payload: Uint8Array;
  /** Header and payload exactly as they arrived on the wire. */
  readonly raw: Uint8Array;
}

export type DecodeResult =
  | { frame: Frame; consumed: number }
  | { frame: null; consumed: 0 };

const NEED_MORE: DecodeResult = { frame: null, consumed: 0 };

const strictUtf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export function encodeFrame(text: string): Uint8Array {
  const payload = fromString(text, "utf8");
  if (payload.length > MAX_PAYLOAD) {
    throw new PayloadTooLargeError(payload.length, MAX_PAYLOAD);
  }
  const out = new Uint8Array(HEADER_BYTES + payload.length);
  const view = new DataView(out.buffer, out.byteOffset, out.byteLength);
  view.setUint8(0, MSG_TEXT);
  view.setUint32(1, payload.length, false);
  out.set(payload, HEADER_BYTES);
  return out;
}

/**
 * Decode the first frame in `buffer`, if it is complete.
 * Header faults are reported as soon as the 5 header bytes are present.
 */
export function tryDecodeFrame(buffer: Uint8Array): DecodeResult {
  if (buffer.length < HEADER_BYTES) return NEED_MORE;
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const type = view.getUint8(0);
  if (type !== MSG_TEXT) throw new BadFrameTypeError(type);
  const length = view.getUint32(1, false);
  if (length > MAX_PAYLOAD) throw new BadFrameLengthError(length, MAX_PAYLOAD);
  const total = HEADER_BYTES + length;
  if (buffer.length < total) return NEED_MORE;
  const raw = buffer.slice(0, total);
  return {
    frame: { type: MSG_TEXT, payload: raw.subarray(HEADER_BYTES), raw },
    consumed: total,
  };
}

export function decodeText(frame: Frame): string {
  try {
    return strictUtf8.decode(frame.payload);
  } catch (err) {
    throw new InvalidPayloadError(err);
  }
}

/**
 * Receive buffer for one byte stream. Bytes go in with `append`; `next`
 * takes the oldest complete frame off the front, or returns null.
 */
export class FrameReader {
  private buffer: Uint8Array = new Uint8Array(0);

  get pending(): number {
    return this.buffer.length;
  }

  append(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.buffer = this.buffer.length === 0 ? Uint8Array.from(chunk) : concat([this.buffer, chunk]);
  }

  next(): Frame | null {
    const result = tryDecodeFrame(this.buffer);
    if (!result.frame) return null;
    this.buffer = this.buffer.slice(result.consumed);
    return result.frame;
  }

  /** Every complete frame currently buffered, oldest first. */
  drain(): Frame[] {
    const frames: Frame[] = [];
    for (let frame = this.next(); frame; frame = this.next()) {
      frames.push(frame);
    }
    return frames;
  }

  reset(): void {
    this.buffer = new Uint8Array(0);
  }
}

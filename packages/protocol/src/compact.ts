/**
 * Compact Frame Encoding and Decoding
 *
 * | id (4B) | length (1B) | payload (length bytes) |
 *
 * No outer length prefix; frames are streamed back to back.
 * Numeric fields are Big Endian.
 */

import {
  COMPACT_HEADER_SIZE,
  MAX_PAYLOAD_SIZE,
  ProtocolVariant,
} from "./constants.js";
import { buildFrame } from "./dlc.js";
import { PayloadTooLongError } from "./errors.js";
import type { CanFrame, DecodeResult, WireCodec } from "./types.js";

/**
 * Encode a frame in the compact layout
 *
 * The length byte is the raw payload size; `flags` and `dlc` are not carried.
 */
export function encodeCompactFrame(frame: CanFrame): Buffer {
  const { payload } = frame;

  if (payload.length > MAX_PAYLOAD_SIZE) {
    throw new PayloadTooLongError(payload.length, MAX_PAYLOAD_SIZE);
  }

  const buffer = Buffer.alloc(COMPACT_HEADER_SIZE + payload.length);
  buffer.writeUInt32BE(frame.id >>> 0, 0);
  buffer.writeUInt8(payload.length, 4);
  payload.copy(buffer, COMPACT_HEADER_SIZE);

  return buffer;
}

/**
 * Try to decode one compact frame from the front of the buffer
 */
export function tryDecodeCompactFrame(buffer: Buffer): DecodeResult {
  if (buffer.length < COMPACT_HEADER_SIZE) {
    return { status: "incomplete" };
  }

  const id = buffer.readUInt32BE(0);
  const length = buffer.readUInt8(4);

  // Reject before waiting for a payload that can never be valid
  if (length > MAX_PAYLOAD_SIZE) {
    return {
      status: "invalid",
      reason: `Declared payload length ${length} exceeds ${MAX_PAYLOAD_SIZE}`,
    };
  }

  const totalSize = COMPACT_HEADER_SIZE + length;
  if (buffer.length < totalSize) {
    return { status: "incomplete" };
  }

  const { frame } = buildFrame(
    id,
    buffer.subarray(COMPACT_HEADER_SIZE, totalSize)
  );

  return { status: "frame", frame, consumed: totalSize, truncatedFrom: null };
}

export const compactCodec: WireCodec = {
  variant: ProtocolVariant.COMPACT,
  tryDecode: tryDecodeCompactFrame,
  encode: encodeCompactFrame,
};

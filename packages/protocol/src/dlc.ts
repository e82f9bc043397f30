/**
 * Length Codes
 *
 * Maps payload sizes to bus length codes and back. Codes 0..8 are literal
 * byte counts; 9..15 select the extended buckets 12, 16, 20, 24, 32, 48, 64.
 */

import {
  EXTENDED_DLC_SIZES,
  MAX_CLASSIC_PAYLOAD,
  MAX_DLC,
  MAX_PAYLOAD_SIZE,
} from "./constants.js";
import type { BuiltFrame } from "./types.js";

/**
 * Payload size selected by a length code
 */
export function decodeLength(code: number): number {
  if (!Number.isInteger(code) || code < 0 || code > MAX_DLC) {
    throw new RangeError(`Invalid length code: ${code}`);
  }

  if (code <= MAX_CLASSIC_PAYLOAD) {
    return code;
  }

  return EXTENDED_DLC_SIZES[code - MAX_CLASSIC_PAYLOAD - 1];
}

/**
 * Smallest length code whose size holds `length` bytes
 */
export function encodeLength(length: number): number {
  if (!Number.isInteger(length) || length < 0 || length > MAX_PAYLOAD_SIZE) {
    throw new RangeError(`Payload length out of range: ${length}`);
  }

  if (length <= MAX_CLASSIC_PAYLOAD) {
    return length;
  }

  const bucket = EXTENDED_DLC_SIZES.findIndex((size) => size >= length);
  return MAX_CLASSIC_PAYLOAD + 1 + bucket;
}

/**
 * Build a frame from raw payload bytes
 *
 * Payloads above 64 bytes are cut to 64 and the original length is returned
 * in `truncatedFrom`. The payload keeps its own length; `dlc` is the smallest
 * code whose size holds it.
 */
export function buildFrame(
  id: number,
  data: Uint8Array,
  flags: number = 0
): BuiltFrame {
  const truncatedFrom = data.length > MAX_PAYLOAD_SIZE ? data.length : null;
  const kept = data.subarray(0, MAX_PAYLOAD_SIZE);

  const payload = Buffer.from(kept);

  return {
    frame: { id, flags, dlc: encodeLength(payload.length), payload },
    truncatedFrom,
  };
}

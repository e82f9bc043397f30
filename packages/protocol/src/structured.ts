/**
 * Structured Frame Encoding and Decoding
 *
 * | length (4B) | UTF-8 JSON record (length bytes) |
 *
 * Frame records look like `{ "type": "can", "id": 291, "data": [10, 20] }`.
 * Records with any other `type` are consumed and skipped.
 */

import {
  LENGTH_FIELD_SIZE,
  MAX_STRUCTURED_MESSAGE_SIZE,
  ProtocolVariant,
  STRUCTURED_FRAME_TYPE,
} from "./constants.js";
import { buildFrame } from "./dlc.js";
import type { CanFrame, DecodeResult, WireCodec } from "./types.js";

const MAX_U32 = 0xffffffff;

type StructuredRecord = {
  type: string;
  id: number;
  flags?: number;
  data: number[];
};

function isUint32(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_U32
  );
}

function isByte(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= 0xff
  );
}

/**
 * Encode a frame as a length-prefixed structured record
 */
export function encodeStructuredFrame(frame: CanFrame): Buffer {
  const record: StructuredRecord = {
    type: STRUCTURED_FRAME_TYPE,
    id: frame.id,
    data: Array.from(frame.payload),
  };

  if (frame.flags !== 0) {
    record.flags = frame.flags;
  }

  const body = Buffer.from(JSON.stringify(record), "utf8");
  const buffer = Buffer.alloc(LENGTH_FIELD_SIZE + body.length);

  buffer.writeUInt32BE(body.length, 0);
  body.copy(buffer, LENGTH_FIELD_SIZE);

  return buffer;
}

/**
 * Try to decode one structured record from the front of the buffer
 */
export function tryDecodeStructuredFrame(buffer: Buffer): DecodeResult {
  if (buffer.length < LENGTH_FIELD_SIZE) {
    return { status: "incomplete" };
  }

  const messageLength = buffer.readUInt32BE(0);

  if (messageLength > MAX_STRUCTURED_MESSAGE_SIZE) {
    return {
      status: "invalid",
      reason: `Structured message too large: ${messageLength} bytes`,
    };
  }

  const totalSize = LENGTH_FIELD_SIZE + messageLength;
  if (buffer.length < totalSize) {
    return { status: "incomplete" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(
      buffer.subarray(LENGTH_FIELD_SIZE, totalSize).toString("utf8")
    );
  } catch (err) {
    return {
      status: "invalid",
      reason: `Malformed structured payload: ${
        err instanceof Error ? err.message : String(err)
      }`,
    };
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return { status: "invalid", reason: "Structured payload is not an object" };
  }

  const record: Record<string, unknown> = { ...parsed };

  const { type, id } = record;

  if (typeof type !== "string") {
    return { status: "invalid", reason: "Structured payload has no type tag" };
  }

  if (type !== STRUCTURED_FRAME_TYPE) {
    return { status: "skipped", consumed: totalSize, messageType: type };
  }

  if (!isUint32(id)) {
    return {
      status: "invalid",
      reason: `Frame id out of range: ${JSON.stringify(id)}`,
    };
  }

  const flags = record.flags ?? 0;
  if (!isUint32(flags)) {
    return {
      status: "invalid",
      reason: `Frame flags out of range: ${JSON.stringify(flags)}`,
    };
  }

  const data = record.data ?? [];
  if (!Array.isArray(data)) {
    return { status: "invalid", reason: "Frame data is not a list" };
  }

  const bytes = Buffer.alloc(data.length);
  for (let i = 0; i < data.length; i++) {
    const value: unknown = data[i];
    if (!isByte(value)) {
      return {
        status: "invalid",
        reason: `Frame data[${i}] out of range: ${JSON.stringify(value)}`,
      };
    }
    bytes[i] = value;
  }

  const { frame, truncatedFrom } = buildFrame(id, bytes, flags);

  return { status: "frame", frame, consumed: totalSize, truncatedFrom };
}

export const structuredCodec: WireCodec = {
  variant: ProtocolVariant.STRUCTURED,
  tryDecode: tryDecodeStructuredFrame,
  encode: encodeStructuredFrame,
};

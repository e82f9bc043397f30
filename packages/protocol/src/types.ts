/**
 * Protocol Type Definitions
 */

import type { ProtocolVariant } from "./constants.js";

/**
 * A bus frame as the gateway sees it
 */
export type CanFrame = {
  id: number; // 11-bit or 29-bit identifier, not range checked here
  flags: number; // Opaque bitmask, passed through
  dlc: number; // Length code 0..15
  payload: Buffer; // 0..64 bytes
};

/**
 * Result of building a frame from raw bytes
 */
export type BuiltFrame = {
  frame: CanFrame;
  truncatedFrom: number | null; // Original length when cut down to 64 bytes
};

export type DecodeResult =
  | {
      status: "frame";
      frame: CanFrame;
      consumed: number;
      truncatedFrom: number | null;
    }
  | { status: "skipped"; consumed: number; messageType: string }
  | { status: "incomplete" }
  | { status: "invalid"; reason: string };

/**
 * Stateless (de)serializer for one wire encoding
 */
export interface WireCodec {
  readonly variant: ProtocolVariant;
  tryDecode(buffer: Buffer): DecodeResult;
  encode(frame: CanFrame): Buffer;
}

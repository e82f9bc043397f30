/**
 * Protocol Constants
 *
 * Wire layout sizes, payload limits and the length code table.
 */

// Compact frame structure
export const COMPACT_HEADER_SIZE = 5; // id(4) + length(1)

// Structured frame structure
export const LENGTH_FIELD_SIZE = 4;
export const MAX_STRUCTURED_MESSAGE_SIZE = 64 * 1024; // safety limit

// Payload limits
export const MAX_CLASSIC_PAYLOAD = 8;
export const MAX_PAYLOAD_SIZE = 64;
export const MAX_DLC = 15;

// Structured record tag for frame messages
export const STRUCTURED_FRAME_TYPE = "can";

// Extended length codes 9..15 -> payload size
export const EXTENDED_DLC_SIZES: readonly number[] = [12, 16, 20, 24, 32, 48, 64];

export enum ProtocolVariant {
  COMPACT = "compact",
  STRUCTURED = "structured",
}

import { ProtocolVariant } from "./constants.js";
import { compactCodec } from "./compact.js";
import { structuredCodec } from "./structured.js";
import type { WireCodec } from "./types.js";

/**
 * Codec used for a connection's protocol variant
 */
export function getCodec(variant: ProtocolVariant): WireCodec {
  switch (variant) {
    case ProtocolVariant.COMPACT:
      return compactCodec;
    case ProtocolVariant.STRUCTURED:
      return structuredCodec;
  }
}

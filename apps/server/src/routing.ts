import type { ProtocolVariant } from "../../../packages/protocol/src/constants.js";
import type { ListenerConfig, PeerRule } from "./config.js";

const IPV4_MAPPED_PREFIX = "::ffff:";

/**
 * Pick the protocol variant for a newly accepted peer
 *
 * Evaluated once at accept time. The first matching peer rule wins,
 * otherwise the accepting listener's variant applies.
 */
export function resolveVariant(
  listener: ListenerConfig,
  remoteAddress: string | undefined,
  peerRules: readonly PeerRule[]
): ProtocolVariant {
  if (remoteAddress) {
    const address = remoteAddress.startsWith(IPV4_MAPPED_PREFIX)
      ? remoteAddress.slice(IPV4_MAPPED_PREFIX.length)
      : remoteAddress;

    const rule = peerRules.find((candidate) =>
      address.startsWith(candidate.prefix)
    );
    if (rule) return rule.variant;
  }

  return listener.variant;
}

/**
 * Server configuration
 */

import { ProtocolVariant } from "../../../packages/protocol/src/constants.js";

export type ListenerConfig = {
  name: string;
  host: string;
  port: number;
  variant: ProtocolVariant;
};

/**
 * Peers whose address starts with `prefix` use `variant`, whichever
 * listener accepted them
 */
export type PeerRule = {
  prefix: string;
  variant: ProtocolVariant;
};

/**
 * "compact": every client receives bus frames in the compact layout.
 * "native": each client receives them in its own protocol variant.
 */
export type FanoutEncoding = "compact" | "native";

export type GatewayConfig = {
  listeners: ListenerConfig[];
  peerRules: PeerRule[];
  fanoutEncoding: FanoutEncoding;
  debug: boolean;
  queueCapacity: number;
  maxPendingWriteBytes: number;
  closeTimeoutMs: number;
  probeFrame: boolean;
  participantName: string;
  channelName: string;
};

function parseInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer in ${min}..${max}, got "${raw}"`);
  }
  return value;
}

function parseFanoutEncoding(raw: string | undefined): FanoutEncoding {
  if (raw === undefined || raw === "" || raw === "compact") return "compact";
  if (raw === "native") return "native";
  throw new Error(
    `GATEWAY_FANOUT_ENCODING must be "compact" or "native", got "${raw}"`
  );
}

/**
 * Build the configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const compactPeerPrefix = env.GATEWAY_COMPACT_PEER_PREFIX;

  return {
    listeners: [
      {
        name: "structured",
        host: env.GATEWAY_STRUCTURED_HOST || "127.0.0.1",
        port: parseInteger(env, "GATEWAY_STRUCTURED_PORT", 5000, 0, 65535),
        variant: ProtocolVariant.STRUCTURED,
      },
      {
        name: "compact",
        host: env.GATEWAY_COMPACT_HOST || "127.0.0.1",
        port: parseInteger(env, "GATEWAY_COMPACT_PORT", 5001, 0, 65535),
        variant: ProtocolVariant.COMPACT,
      },
    ],
    peerRules: compactPeerPrefix
      ? [{ prefix: compactPeerPrefix, variant: ProtocolVariant.COMPACT }]
      : [],
    fanoutEncoding: parseFanoutEncoding(env.GATEWAY_FANOUT_ENCODING),
    debug: env.GATEWAY_DEBUG === "1",
    queueCapacity: parseInteger(env, "GATEWAY_QUEUE_CAPACITY", 1024, 1, 1_000_000),
    maxPendingWriteBytes: parseInteger(
      env,
      "GATEWAY_MAX_PENDING_WRITE",
      1024 * 1024,
      1,
      Number.MAX_SAFE_INTEGER
    ),
    closeTimeoutMs: parseInteger(env, "GATEWAY_CLOSE_TIMEOUT", 1000, 0, 60_000),
    probeFrame: env.GATEWAY_PROBE_FRAME === "1",
    participantName: env.GATEWAY_PARTICIPANT || "CAN_Bridge",
    channelName: env.GATEWAY_CHANNEL || "CAN1",
  };
}

export const config = loadConfig();

#!/usr/bin/env node
/**
 * Gateway Entry Point
 *
 * Runs the gateway against the in-process virtual bus.
 */

import { GatewayServer } from "./server.js";
import { config } from "./config.js";
import { logger } from "./observability/logger.js";
import { BusAdapter } from "../../../packages/bus/src/busAdapter.js";
import { VirtualCanBus } from "../../../packages/bus/src/virtualBus.js";

const bus = new VirtualCanBus(config.channelName);
const participant = bus.createParticipant(config.participantName);
const adapter = new BusAdapter(participant, {
  queueCapacity: config.queueCapacity,
});
const server = new GatewayServer(adapter);

logger.info(
  `Participant '${participant.name}' attached to channel '${bus.channelName}'`
);

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  await server.stop();
  participant.disconnect();
  process.exit(0);
}

// Graceful shutdown
process.on("SIGINT", () => {
  shutdown("SIGINT").catch((err) => {
    logger.error("Shutdown failed", { error: String(err) });
    process.exit(1);
  });
});

process.on("SIGTERM", () => {
  shutdown("SIGTERM").catch((err) => {
    logger.error("Shutdown failed", { error: String(err) });
    process.exit(1);
  });
});

// Start server
server.start().catch((err) => {
  logger.error("Failed to start gateway", { error: String(err) });
  process.exit(1);
});

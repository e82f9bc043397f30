import { ConnectionManager } from "../../../../packages/transport/src/connection/connectionManager.js";
import type { CanFrame } from "../../../../packages/protocol/src/types.js";
import { encodeCompactFrame } from "../../../../packages/protocol/src/compact.js";
import type { FanoutEncoding } from "../config.js";

/**
 * Handle a frame seen on the bus
 *
 * Writes it to every registered client. With the default "compact" encoding
 * every client gets the same compact bytes, whatever protocol it speaks.
 * A client whose write fails closes itself; the others still receive.
 *
 * @returns number of clients the frame was written to
 */
export function handleBusFrame(
  frame: CanFrame,
  connectionManager: ConnectionManager,
  encoding: FanoutEncoding
): number {
  const compact = encoding === "compact" ? encodeCompactFrame(frame) : null;
  let deliveries = 0;

  for (const connection of connectionManager.getAllConnections()) {
    if (!connection.isReading()) continue;

    const accepted = compact
      ? connection.write(compact)
      : connection.send(frame);

    if (accepted) deliveries++;
  }

  return deliveries;
}

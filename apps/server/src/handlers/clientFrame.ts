import { Connection } from "../../../../packages/transport/src/connection/connection.js";
import type { CanFrame } from "../../../../packages/protocol/src/types.js";
import type { BusAdapter } from "../../../../packages/bus/src/busAdapter.js";
import type { GatewayReport } from "../observability/reports.js";

/**
 * Handle a frame decoded from a client
 *
 * Forwarded to the bus exactly once. A rejected send is reported and the
 * connection stays open.
 *
 * @returns whether the bus accepted the frame
 */
export function handleClientFrame(
  connection: Connection,
  frame: CanFrame,
  bus: BusAdapter,
  report: (report: GatewayReport) => void
): boolean {
  const result = bus.forward(frame);

  if (!result.ok) {
    report({
      kind: "bus-send-failure",
      connectionId: connection.connectionId,
      frameId: frame.id,
      code: result.code,
      reason: result.reason,
    });
    return false;
  }

  return true;
}

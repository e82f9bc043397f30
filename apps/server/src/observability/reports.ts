/**
 * Structured reports raised by the gateway
 *
 * Every report is local to one connection or one bus operation.
 */

export type GatewayReport =
  | { kind: "decode-invalid"; connectionId: string; reason: string }
  | {
      kind: "payload-truncated";
      connectionId: string;
      frameId: number;
      originalLength: number;
      keptLength: number;
    }
  | {
      kind: "bus-send-failure";
      connectionId: string;
      frameId: number;
      code: number;
      reason: string;
    }
  | { kind: "client-write-failure"; connectionId: string; reason: string }
  | { kind: "bus-overflow"; droppedTotal: number }
  | { kind: "bus-dispatch-error"; reason: string };

export type ReportLevel = "warn" | "error";

export function reportLevel(report: GatewayReport): ReportLevel {
  switch (report.kind) {
    case "decode-invalid":
    case "bus-dispatch-error":
      return "error";
    default:
      return "warn";
  }
}

/**
 * One-line human summary of a report
 */
export function describeReport(report: GatewayReport): string {
  switch (report.kind) {
    case "decode-invalid":
      return `[${report.connectionId}] Invalid frame, closing: ${report.reason}`;
    case "payload-truncated":
      return `[${report.connectionId}] Frame 0x${report.frameId.toString(16)} payload truncated from ${report.originalLength} to ${report.keptLength} bytes`;
    case "bus-send-failure":
      return `[${report.connectionId}] Bus rejected frame 0x${report.frameId.toString(16)}: ${report.reason} (code ${report.code})`;
    case "client-write-failure":
      return `[${report.connectionId}] Write failed, closing: ${report.reason}`;
    case "bus-overflow":
      return `Bus receive queue full, ${report.droppedTotal} frame(s) dropped so far`;
    case "bus-dispatch-error":
      return `Fan-out failed: ${report.reason}`;
  }
}

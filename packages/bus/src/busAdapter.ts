import { EventEmitter } from "events";
import type { CanFrame } from "../../protocol/src/types.js";
import { MAX_DLC, MAX_PAYLOAD_SIZE } from "../../protocol/src/constants.js";
import { decodeLength, encodeLength } from "../../protocol/src/dlc.js";
import { FrameQueue } from "./frameQueue.js";
import {
  TransportStatus,
  type BusDirection,
  type BusTransport,
  type TransportFrame,
  type TransportFrameEvent,
} from "./types.js";

export type BusFrameEvent = {
  frame: CanFrame;
  direction: BusDirection;
  timestamp: bigint;
};

export type ForwardResult =
  | { ok: true }
  | { ok: false; code: number; reason: string };

export interface BusAdapterOptions {
  /** Received frames held for fan-out before the oldest are dropped */
  queueCapacity: number;
}

export interface BusAdapterEvents {
  frame: (event: BusFrameEvent) => void;
  overflow: (droppedTotal: number) => void;
  dispatchError: (err: unknown) => void;
}

/**
 * Map a gateway frame onto the transport's frame structure
 */
export function toTransportFrame(frame: CanFrame): TransportFrame {
  return {
    id: frame.id,
    flags: frame.flags,
    dlc: frame.dlc,
    sdt: 0,
    vcid: 0,
    af: 0,
    data: frame.payload,
  };
}

/**
 * Map a transport frame back to a gateway frame
 *
 * The payload is the smaller of what the length code selects and what the
 * transport actually delivered, copied out of the transport's buffer.
 */
export function fromTransportFrame(frame: TransportFrame): CanFrame {
  const declared =
    Number.isInteger(frame.dlc) && frame.dlc >= 0 && frame.dlc <= MAX_DLC
      ? decodeLength(frame.dlc)
      : MAX_PAYLOAD_SIZE;
  const size = Math.min(declared, frame.data.length);
  const payload = Buffer.from(frame.data.subarray(0, size));

  return {
    id: frame.id >>> 0,
    flags: frame.flags >>> 0,
    dlc: encodeLength(payload.length),
    payload,
  };
}

/**
 * BusAdapter is the gateway's boundary to the bus transport.
 *
 * Responsibilities:
 * - Forward decoded client frames to the transport (once, no retry)
 * - Own the receive handler registered with the transport
 * - Hand received frames to fan-out through a bounded queue
 *
 * Does NOT:
 * - Filter by direction
 * - Touch client sockets
 */
export class BusAdapter extends EventEmitter {
  private transport: BusTransport;
  private options: BusAdapterOptions;
  private queue: FrameQueue<BusFrameEvent> | null = null;
  private handlerId: number | null = null;

  // Registered with the transport for as long as the adapter is started
  private readonly handleTransportFrame = (event: TransportFrameEvent): void => {
    this.onReceive(event);
  };

  constructor(transport: BusTransport, options: BusAdapterOptions) {
    super();
    this.transport = transport;
    this.options = options;
  }

  /**
   * Register with the transport and begin accepting received frames
   */
  start(): void {
    if (this.handlerId !== null) return;

    this.queue = new FrameQueue<BusFrameEvent>(
      this.options.queueCapacity,
      (event) => this.emit("frame", event),
      (err) => this.emit("dispatchError", err),
      (droppedTotal) => this.emit("overflow", droppedTotal)
    );
    this.handlerId = this.transport.addFrameHandler(this.handleTransportFrame);
  }

  /**
   * Detach from the transport and discard undelivered frames
   */
  stop(): void {
    if (this.handlerId !== null) {
      this.transport.removeFrameHandler(this.handlerId);
      this.handlerId = null;
    }

    this.queue?.close();
    this.queue = null;
  }

  /**
   * Send one frame to the bus
   */
  forward(frame: CanFrame): ForwardResult {
    let status: number;

    try {
      status = this.transport.sendFrame(toTransportFrame(frame));
    } catch (err) {
      return {
        ok: false,
        code: TransportStatus.UNSPECIFIED_ERROR,
        reason: err instanceof Error ? err.message : String(err),
      };
    }

    if (status !== TransportStatus.SUCCESS) {
      return {
        ok: false,
        code: status,
        reason: TransportStatus[status] ?? `status ${status}`,
      };
    }

    return { ok: true };
  }

  /**
   * Transport receive callback; never performs client I/O inline
   */
  onReceive(event: TransportFrameEvent): void {
    if (!this.queue) return;

    this.queue.push({
      frame: fromTransportFrame(event.frame),
      direction: event.direction,
      timestamp: event.timestamp,
    });
  }

  isStarted(): boolean {
    return this.handlerId !== null;
  }

  /**
   * Frames waiting for fan-out
   */
  getPendingCount(): number {
    return this.queue?.length ?? 0;
  }
}

import { Socket } from "net";
import { EventEmitter } from "events";
import type {
  CanFrame,
  WireCodec,
} from "../../../protocol/src/types.js";
import type { ProtocolVariant } from "../../../protocol/src/constants.js";

export enum ConnectionState {
  INIT = "INIT",
  OPEN = "OPEN",
  DRAINING = "DRAINING",
  CLOSING = "CLOSING",
  CLOSED = "CLOSED",
}

export interface ConnectionOptions {
  /** Outbound bytes a peer may leave unread before it is dropped */
  maxPendingWriteBytes: number;
  /** How long a graceful close waits for the peer before destroying */
  closeTimeoutMs: number;
}

export const DEFAULT_CONNECTION_OPTIONS: ConnectionOptions = {
  maxPendingWriteBytes: 1024 * 1024,
  closeTimeoutMs: 1000,
};

export type ConnectionError = {
  type: "transport" | "protocol" | "write";
  reason: string;
  fatal: boolean;
};

export type ConnectionWarning = {
  type: "truncation";
  frameId: number;
  originalLength: number;
  keptLength: number;
};

export type ConnectionCloseStats = {
  reason?: string;
  bytesSent: number;
  bytesReceived: number;
};

export interface ConnectionEvents {
  frame: (frame: CanFrame) => void;
  skipped: (messageType: string) => void;
  warning: (warning: ConnectionWarning) => void;
  drain: (queuedBytes: number) => void;
  error: (error: ConnectionError) => void;
  closing: (reason?: string) => void;
  close: (stats: ConnectionCloseStats) => void;
  state: (state: ConnectionState) => void;
}

/**
 * Connection represents one client's TCP connection lifecycle.
 *
 * Responsibilities:
 * - Receive buffering and incremental decoding with the connection's codec
 * - Outbound writes with a bound on unread bytes
 * - State machine enforcement (INIT → OPEN ⟷ DRAINING → CLOSING → CLOSED)
 * - Event emission for decoded frames
 *
 * Does NOT:
 * - Talk to the bus
 * - Choose its own protocol variant
 * - Manage other connections
 */
export class Connection extends EventEmitter {
  private socket: Socket;
  private state: ConnectionState = ConnectionState.INIT;
  private codec: WireCodec;
  private options: ConnectionOptions;
  public readonly connectionId: string;

  // Buffering / parsing state
  private recvBuffer: Buffer = Buffer.alloc(0);

  private closeReason?: string;
  private lingerTimer: NodeJS.Timeout | null = null;

  // Statistics
  private bytesSent: number = 0;
  private bytesReceived: number = 0;
  private framesDecoded: number = 0;

  constructor(
    socket: Socket,
    connectionId: string,
    codec: WireCodec,
    options: ConnectionOptions = DEFAULT_CONNECTION_OPTIONS
  ) {
    super();
    this.socket = socket;
    this.connectionId = connectionId;
    this.codec = codec;
    this.options = options;
    this.wireSocket();
    this.transition(ConnectionState.OPEN);
  }

  get variant(): ProtocolVariant {
    return this.codec.variant;
  }

  /**
   * Bind socket events to Connection behavior
   */
  private wireSocket(): void {
    this.socket.on("data", (chunk: Buffer) => {
      if (!this.isReading()) return;
      this.bytesReceived += chunk.length;
      this.onData(chunk);
    });

    this.socket.on("drain", () => {
      if (this.state === ConnectionState.DRAINING) {
        this.transition(ConnectionState.OPEN);
        this.emit("drain", this.socket.writableLength);
      }
    });

    // Peer half-close: nothing more will be read
    this.socket.on("end", () => {
      this.close("peer closed");
    });

    this.socket.on("close", () => {
      this.handleClose();
    });

    this.socket.on("error", (err) => {
      this.emit("error", {
        type: "transport",
        reason: err.message,
        fatal: true,
      });
      this.destroy(err.message);
    });
  }

  /**
   * Handle incoming data chunk
   */
  private onData(chunk: Buffer): void {
    this.recvBuffer =
      this.recvBuffer.length === 0
        ? chunk
        : Buffer.concat([this.recvBuffer, chunk]);
    this.parse();
  }

  /**
   * Incremental frame parser
   *
   * Runs the codec until it needs more bytes. A chunk may carry zero, one or
   * many frames; they are emitted in arrival order.
   */
  private parse(): void {
    while (this.isReading()) {
      const result = this.codec.tryDecode(this.recvBuffer);

      switch (result.status) {
        case "incomplete":
          return;

        case "invalid":
          this.recvBuffer = Buffer.alloc(0);
          this.emit("error", {
            type: "protocol",
            reason: result.reason,
            fatal: true,
          });
          this.destroy(result.reason);
          return;

        case "skipped":
          this.recvBuffer = this.recvBuffer.subarray(result.consumed);
          this.emit("skipped", result.messageType);
          break;

        case "frame":
          this.recvBuffer = this.recvBuffer.subarray(result.consumed);
          this.framesDecoded++;

          if (result.truncatedFrom !== null) {
            this.emit("warning", {
              type: "truncation",
              frameId: result.frame.id,
              originalLength: result.truncatedFrom,
              keptLength: result.frame.payload.length,
            });
          }

          this.emit("frame", result.frame);
          break;
      }
    }
  }

  /**
   * Write already-encoded bytes to the client
   *
   * @returns false when the bytes were not accepted
   */
  write(buffer: Buffer): boolean {
    if (!this.isReading()) {
      return false;
    }

    try {
      this.bytesSent += buffer.length;
      const canWrite = this.socket.write(buffer);

      if (this.socket.writableLength > this.options.maxPendingWriteBytes) {
        this.failWrite(
          `Outbound buffer exceeded limit: ${this.socket.writableLength} bytes`
        );
        return false;
      }

      if (!canWrite && this.state === ConnectionState.OPEN) {
        this.transition(ConnectionState.DRAINING);
      }

      return true;
    } catch (err) {
      this.failWrite(err instanceof Error ? err.message : String(err));
      return false;
    }
  }

  /**
   * Send a frame encoded with this connection's own codec
   */
  send(frame: CanFrame): boolean {
    return this.write(this.codec.encode(frame));
  }

  private failWrite(reason: string): void {
    this.emit("error", { type: "write", reason, fatal: true });
    this.destroy(reason);
  }

  /**
   * Close the connection gracefully
   *
   * Pending output is flushed; the socket is destroyed if the peer has not
   * finished within `closeTimeoutMs`.
   */
  close(reason?: string): void {
    if (!this.beginClosing(reason)) return;

    this.socket.end();
    this.lingerTimer = setTimeout(() => {
      this.socket.destroy();
    }, this.options.closeTimeoutMs);
    this.lingerTimer.unref();
  }

  /**
   * Release the socket immediately
   */
  destroy(reason?: string): void {
    if (this.state === ConnectionState.CLOSED) return;

    this.beginClosing(reason);
    this.socket.destroy();
  }

  /**
   * Enter CLOSING; returns false if already closing or closed
   */
  private beginClosing(reason?: string): boolean {
    if (
      this.state === ConnectionState.CLOSING ||
      this.state === ConnectionState.CLOSED
    ) {
      return false;
    }

    this.closeReason = reason;
    this.transition(ConnectionState.CLOSING);
    this.emit("closing", reason);
    return true;
  }

  /**
   * Handle socket close event
   */
  private handleClose(): void {
    if (this.state === ConnectionState.CLOSED) return;

    this.beginClosing("socket closed");

    if (this.lingerTimer) {
      clearTimeout(this.lingerTimer);
      this.lingerTimer = null;
    }

    this.recvBuffer = Buffer.alloc(0);
    this.transition(ConnectionState.CLOSED);
    this.emit("close", {
      reason: this.closeReason,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
    });
  }

  /**
   * Transition to a new state
   */
  private transition(next: ConnectionState): void {
    if (this.state === next) return;

    // Enforce state machine rules
    const allowed = this.isTransitionAllowed(this.state, next);
    if (!allowed) {
      throw new Error(`Invalid state transition: ${this.state} → ${next}`);
    }

    this.state = next;
    this.emit("state", next);
  }

  /**
   * Check if a state transition is valid
   */
  private isTransitionAllowed(
    from: ConnectionState,
    to: ConnectionState
  ): boolean {
    const transitions: Record<ConnectionState, ConnectionState[]> = {
      [ConnectionState.INIT]: [ConnectionState.OPEN],
      [ConnectionState.OPEN]: [
        ConnectionState.DRAINING,
        ConnectionState.CLOSING,
      ],
      [ConnectionState.DRAINING]: [
        ConnectionState.OPEN,
        ConnectionState.CLOSING,
      ],
      [ConnectionState.CLOSING]: [ConnectionState.CLOSED],
      [ConnectionState.CLOSED]: [],
    };

    return transitions[from].includes(to);
  }

  /**
   * OPEN and DRAINING both accept input and output
   */
  isReading(): boolean {
    return (
      this.state === ConnectionState.OPEN ||
      this.state === ConnectionState.DRAINING
    );
  }

  /**
   * Get current connection state
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Get connection statistics
   */
  getStats() {
    return {
      connectionId: this.connectionId,
      variant: this.codec.variant,
      state: this.state,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      framesDecoded: this.framesDecoded,
      bufferSize: this.recvBuffer.length,
    };
  }
}

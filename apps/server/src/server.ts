import { createServer, Server as NetServer, Socket } from "net";
import { EventEmitter } from "events";
import { ConnectionManager } from "../../../packages/transport/src/connection/connectionManager.js";
import {
  Connection,
  ConnectionState,
  type ConnectionCloseStats,
  type ConnectionError,
  type ConnectionWarning,
} from "../../../packages/transport/src/connection/connection.js";
import type { CanFrame } from "../../../packages/protocol/src/types.js";
import { buildFrame } from "../../../packages/protocol/src/dlc.js";
import {
  BusAdapter,
  type BusFrameEvent,
} from "../../../packages/bus/src/busAdapter.js";
import { BusDirection } from "../../../packages/bus/src/types.js";
import { handleClientFrame } from "./handlers/clientFrame.js";
import { handleBusFrame } from "./handlers/busFrame.js";
import { resolveVariant } from "./routing.js";
import { config as defaultConfig } from "./config.js";
import type { GatewayConfig, ListenerConfig } from "./config.js";
import { logger } from "./observability/logger.js";
import { metrics as defaultMetrics, Metrics } from "./observability/metrics.js";
import {
  describeReport,
  reportLevel,
  type GatewayReport,
} from "./observability/reports.js";

// Sent once at startup when probing is enabled
const PROBE_FRAME_ID = 0x123;
const PROBE_FRAME_DATA = [1, 2, 3, 4, 5, 6, 7, 8];

export interface GatewayServerOptions {
  config?: GatewayConfig;
  metrics?: Metrics;
}

export type BoundListener = ListenerConfig;

type Listener = {
  config: ListenerConfig;
  server: NetServer;
};

/**
 * Gateway TCP Server
 *
 * Core responsibilities:
 * - Accept TCP connections on every configured listener
 * - Fix each connection's protocol variant at accept time
 * - Forward decoded client frames to the bus
 * - Fan bus frames out to every connected client
 *
 * Emits "report" with a GatewayReport for every reportable fault.
 */
export class GatewayServer extends EventEmitter {
  private listenerEntries: Listener[];
  private connectionManager: ConnectionManager;
  private bus: BusAdapter;
  private config: GatewayConfig;
  private metrics: Metrics;

  constructor(bus: BusAdapter, options: GatewayServerOptions = {}) {
    super();
    this.bus = bus;
    this.config = options.config ?? defaultConfig;
    this.metrics = options.metrics ?? defaultMetrics;
    this.connectionManager = new ConnectionManager({
      maxPendingWriteBytes: this.config.maxPendingWriteBytes,
      closeTimeoutMs: this.config.closeTimeoutMs,
    });
    this.listenerEntries = this.config.listeners.map((listener) => ({
      config: listener,
      server: createServer((socket) => this.handleSocket(listener, socket)),
    }));
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    this.bus.on("frame", this.onBusFrame);
    this.bus.on("overflow", this.onBusOverflow);
    this.bus.on("dispatchError", this.onBusDispatchError);
    this.bus.start();

    await Promise.all(this.listenerEntries.map((listener) => this.listen(listener)));

    if (this.config.debug) {
      logger.info("Debug mode enabled (GATEWAY_DEBUG=1)");
    }

    if (this.config.probeFrame) {
      this.sendProbeFrame();
    }
  }

  private listen({ config, server }: Listener): Promise<void> {
    return new Promise((resolve, reject) => {
      const onStartupError = (err: Error) => reject(err);
      server.once("error", onStartupError);

      server.listen(config.port, config.host, () => {
        server.off("error", onStartupError);
        server.on("error", (err) => {
          logger.error(`Listener '${config.name}' error: ${err.message}`);
        });

        const address = server.address();
        const port =
          typeof address === "object" && address ? address.port : config.port;
        logger.info(
          `Gateway listening on ${config.host}:${port} (${config.name}, ${config.variant})`
        );
        resolve();
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    logger.info("Shutting down gateway...");

    this.bus.off("frame", this.onBusFrame);
    this.bus.off("overflow", this.onBusOverflow);
    this.bus.off("dispatchError", this.onBusDispatchError);
    this.bus.stop();

    // Close all connections
    this.connectionManager.closeAll();

    await Promise.all(
      this.listenerEntries.map(
        ({ server }) =>
          new Promise<void>((resolve, reject) => {
            if (!server.listening) {
              resolve();
              return;
            }
            server.close((err) => (err ? reject(err) : resolve()));
          })
      )
    );

    this.metrics.print();
    logger.info("Gateway stopped");
  }

  /**
   * Handle new socket connection
   */
  private handleSocket(listener: ListenerConfig, socket: Socket): void {
    const variant = resolveVariant(
      listener,
      socket.remoteAddress,
      this.config.peerRules
    );
    const connection = this.connectionManager.createConnection(socket, variant);
    const { connectionId } = connection;

    this.metrics.connectionOpened();

    logger.connection(connectionId, "Connected", {
      listener: listener.name,
      variant,
      remoteAddress: socket.remoteAddress,
    });

    // Decoded frames go straight to the bus, in arrival order
    connection.on("frame", (frame: CanFrame) => {
      logger.frame(connectionId, "←", frame);
      const forwarded = handleClientFrame(
        connection,
        frame,
        this.bus,
        this.report
      );
      this.metrics.clientFrame(forwarded);
    });

    connection.on("warning", (warning: ConnectionWarning) => {
      this.report({
        kind: "payload-truncated",
        connectionId,
        frameId: warning.frameId,
        originalLength: warning.originalLength,
        keptLength: warning.keptLength,
      });
    });

    connection.on("skipped", (messageType: string) => {
      logger.debug(`[${connectionId}] Skipped '${messageType}' message`);
    });

    connection.on("error", (error: ConnectionError) =>
      this.handleConnectionError(connection, error)
    );

    connection.on("state", (state: ConnectionState) => {
      logger.stateTransition(connectionId, state);
      if (state === ConnectionState.DRAINING) {
        logger.backpressure(connectionId, "detected");
      }
    });

    connection.on("drain", () => {
      logger.backpressure(connectionId, "relieved");
    });

    connection.on("close", (stats: ConnectionCloseStats) => {
      this.metrics.connectionClosed();
      this.metrics.bytesSent(stats.bytesSent);
      this.metrics.bytesReceived(stats.bytesReceived);

      logger.connection(connectionId, "Closed", {
        reason: stats.reason,
        sent: `${stats.bytesSent}B`,
        received: `${stats.bytesReceived}B`,
      });
    });
  }

  private handleConnectionError(
    connection: Connection,
    error: ConnectionError
  ): void {
    switch (error.type) {
      case "protocol":
        this.report({
          kind: "decode-invalid",
          connectionId: connection.connectionId,
          reason: error.reason,
        });
        break;

      case "write":
        this.report({
          kind: "client-write-failure",
          connectionId: connection.connectionId,
          reason: error.reason,
        });
        break;

      case "transport":
        logger.error(`[${connection.connectionId}] Error: ${error.reason}`, {
          type: error.type,
          fatal: error.fatal,
        });
        break;
    }
  }

  /**
   * Fan a bus frame out to every client
   */
  private readonly onBusFrame = (event: BusFrameEvent): void => {
    const source =
      event.direction === BusDirection.TRANSMIT ? "bus:tx" : "bus:rx";
    logger.frame(source, "→", event.frame);

    const deliveries = handleBusFrame(
      event.frame,
      this.connectionManager,
      this.config.fanoutEncoding
    );
    this.metrics.busFrame(deliveries);
  };

  private readonly onBusOverflow = (droppedTotal: number): void => {
    this.metrics.setDroppedBusFrames(droppedTotal);
    this.report({ kind: "bus-overflow", droppedTotal });
  };

  private readonly onBusDispatchError = (err: unknown): void => {
    this.report({
      kind: "bus-dispatch-error",
      reason: err instanceof Error ? err.message : String(err),
    });
  };

  /**
   * Log, count and publish a report
   */
  private readonly report = (report: GatewayReport): void => {
    const message = describeReport(report);
    if (reportLevel(report) === "error") {
      logger.error(message);
    } else {
      logger.warn(message);
    }

    switch (report.kind) {
      case "decode-invalid":
        this.metrics.decodeError();
        break;
      case "payload-truncated":
        this.metrics.frameTruncated();
        break;
      case "client-write-failure":
        this.metrics.clientWriteFailed();
        break;
      default:
        break;
    }

    this.emit("report", report);
  };

  /**
   * Put a fixed test frame on the bus to check connectivity
   *
   * @returns whether the bus accepted it
   */
  sendProbeFrame(): boolean {
    const { frame } = buildFrame(PROBE_FRAME_ID, Buffer.from(PROBE_FRAME_DATA));
    const result = this.bus.forward(frame);

    if (result.ok) {
      logger.info(`Probe frame 0x${PROBE_FRAME_ID.toString(16)} sent`);
    } else {
      logger.warn(`Probe frame rejected by bus: ${result.reason}`, {
        code: result.code,
      });
    }

    return result.ok;
  }

  /**
   * Bound addresses; ports reflect the OS-assigned port when 0 was configured
   */
  getAddresses(): BoundListener[] {
    return this.listenerEntries.map(({ config, server }) => {
      const address = server.address();
      return {
        ...config,
        port:
          typeof address === "object" && address ? address.port : config.port,
      };
    });
  }

  /**
   * Get server stats
   */
  getStats() {
    return {
      ...this.metrics.getSnapshot(),
      // Registry size, not the open/close counter: it drops on "closing"
      connections: this.connectionManager.getConnectionCount(),
      pendingBusFrames: this.bus.getPendingCount(),
    };
  }
}

/**
 * Test Helpers
 *
 * In-process stand-ins for the bus transport and TCP peers.
 */

import { createServer, connect, Socket } from "net";
import { BusAdapter } from "../../packages/bus/src/busAdapter.js";
import {
  BusDirection,
  TransportStatus,
  type BusTransport,
  type TransportFrame,
  type TransportFrameHandler,
} from "../../packages/bus/src/types.js";
import { GatewayServer } from "../../apps/server/src/server.js";
import { loadConfig, type GatewayConfig } from "../../apps/server/src/config.js";
import { Metrics } from "../../apps/server/src/observability/metrics.js";
import type { GatewayReport } from "../../apps/server/src/observability/reports.js";
import { ProtocolVariant } from "../../packages/protocol/src/constants.js";

/**
 * Poll until `predicate` holds
 */
export async function waitFor(
  predicate: () => boolean,
  timeoutMs: number = 2000,
  label: string = "condition"
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Timed out waiting for ${label}`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/**
 * Transport fake that records sends and lets tests inject received frames
 */
export class RecordingTransport implements BusTransport {
  public sent: TransportFrame[] = [];
  public status: number = TransportStatus.SUCCESS;
  private handlers: Map<number, TransportFrameHandler> = new Map();
  private nextHandlerId: number = 1;

  sendFrame(frame: TransportFrame): number {
    this.sent.push({ ...frame, data: Buffer.from(frame.data) });
    return this.status;
  }

  addFrameHandler(handler: TransportFrameHandler): number {
    const handlerId = this.nextHandlerId++;
    this.handlers.set(handlerId, handler);
    return handlerId;
  }

  removeFrameHandler(handlerId: number): void {
    this.handlers.delete(handlerId);
  }

  get handlerCount(): number {
    return this.handlers.size;
  }

  /**
   * Simulate a frame crossing the bus
   */
  receive(
    id: number,
    data: number[],
    direction: BusDirection = BusDirection.RECEIVE
  ): void {
    const frame: TransportFrame = {
      id,
      flags: 0,
      dlc: data.length,
      sdt: 0,
      vcid: 0,
      af: 0,
      data: Buffer.from(data),
    };
    for (const handler of this.handlers.values()) {
      handler({ frame, direction, timestamp: 0n });
    }
  }
}

/**
 * Raw TCP peer that collects everything it receives
 */
export class TestClient {
  public readonly socket: Socket;
  public closed: boolean = false;
  public receivedLength: number = 0;
  private chunks: Buffer[] = [];

  constructor(socket: Socket) {
    this.socket = socket;
    socket.on("data", (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.receivedLength += chunk.length;
    });
    socket.on("close", () => {
      this.closed = true;
    });
    // Resets from the gateway show up as errors; the close flag covers them
    socket.on("error", () => undefined);
  }

  static connect(port: number, host: string = "127.0.0.1"): Promise<TestClient> {
    return new Promise((resolve, reject) => {
      const socket = connect(port, host);
      socket.once("connect", () => {
        socket.off("error", reject);
        resolve(new TestClient(socket));
      });
      socket.once("error", reject);
    });
  }

  /**
   * Everything received so far, joined on access
   */
  get received(): Buffer {
    if (this.chunks.length > 1) {
      this.chunks = [Buffer.concat(this.chunks)];
    }
    return this.chunks[0] ?? Buffer.alloc(0);
  }

  write(bytes: number[] | Buffer): void {
    this.socket.write(Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes));
  }

  waitForBytes(count: number, timeoutMs?: number): Promise<void> {
    return waitFor(
      () => this.receivedLength >= count,
      timeoutMs,
      `${count} bytes`
    );
  }

  waitForClose(timeoutMs?: number): Promise<void> {
    return waitFor(() => this.closed, timeoutMs, "client close");
  }

  destroy(): void {
    this.socket.destroy();
  }
}

/**
 * Server-side and client-side ends of one loopback TCP connection
 */
export async function socketPair(): Promise<{
  serverSocket: Socket;
  clientSocket: Socket;
  dispose: () => Promise<void>;
}> {
  let accepted: ((socket: Socket) => void) | null = null;
  const acceptedSocket = new Promise<Socket>((resolve) => {
    accepted = resolve;
  });

  const server = createServer((socket) => accepted?.(socket));
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (typeof address !== "object" || address === null) {
    throw new Error("Loopback server has no TCP address");
  }
  const { port } = address;

  const clientSocket = connect(port, "127.0.0.1");
  clientSocket.on("error", () => undefined);
  const serverSocket = await acceptedSocket;

  return {
    serverSocket,
    clientSocket,
    dispose: async () => {
      clientSocket.destroy();
      serverSocket.destroy();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}

/**
 * Configuration bound to ephemeral loopback ports
 */
export function testConfig(overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  const base = loadConfig({});
  return {
    ...base,
    listeners: [
      {
        name: "structured",
        host: "127.0.0.1",
        port: 0,
        variant: ProtocolVariant.STRUCTURED,
      },
      {
        name: "compact",
        host: "127.0.0.1",
        port: 0,
        variant: ProtocolVariant.COMPACT,
      },
    ],
    closeTimeoutMs: 100,
    ...overrides,
  };
}

export type TestGateway = {
  server: GatewayServer;
  adapter: BusAdapter;
  reports: GatewayReport[];
  metrics: Metrics;
  port: (name: string) => number;
  stop: () => Promise<void>;
};

/**
 * Start a gateway against the given transport on ephemeral ports
 */
export async function startGateway(
  transport: BusTransport,
  overrides: Partial<GatewayConfig> = {}
): Promise<TestGateway> {
  const config = testConfig(overrides);
  const metrics = new Metrics();
  const adapter = new BusAdapter(transport, {
    queueCapacity: config.queueCapacity,
  });
  const server = new GatewayServer(adapter, { config, metrics });
  const reports: GatewayReport[] = [];
  server.on("report", (report: GatewayReport) => reports.push(report));

  await server.start();

  return {
    server,
    adapter,
    reports,
    metrics,
    port: (name: string) => {
      const listener = server.getAddresses().find((l) => l.name === name);
      if (!listener) throw new Error(`No listener named ${name}`);
      return listener.port;
    },
    stop: () => server.stop(),
  };
}

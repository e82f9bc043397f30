import type { Socket } from "net";
import { afterEach, describe, expect, it } from "vitest";
import {
  Connection,
  ConnectionState,
  type ConnectionCloseStats,
  type ConnectionError,
  type ConnectionWarning,
} from "../../packages/transport/src/connection/connection.js";
import { compactCodec } from "../../packages/protocol/src/compact.js";
import { structuredCodec } from "../../packages/protocol/src/structured.js";
import type { CanFrame, WireCodec } from "../../packages/protocol/src/types.js";
import { socketPair, waitFor } from "../helpers/test-helpers.js";

type Harness = {
  connection: Connection;
  client: Socket;
  frames: CanFrame[];
  errors: ConnectionError[];
  closing: Array<string | undefined>;
  closes: ConnectionCloseStats[];
  received: () => Buffer;
};

const disposers: Array<() => Promise<void>> = [];

afterEach(async () => {
  while (disposers.length > 0) {
    const dispose = disposers.pop();
    if (dispose) await dispose();
  }
});

async function open(
  codec: WireCodec,
  maxPendingWriteBytes: number = 1024 * 1024
): Promise<Harness> {
  const pair = await socketPair();
  disposers.push(pair.dispose);

  const connection = new Connection(pair.serverSocket, "conn-test", codec, {
    maxPendingWriteBytes,
    closeTimeoutMs: 100,
  });

  let received = Buffer.alloc(0);
  pair.clientSocket.on("data", (chunk: Buffer) => {
    received = Buffer.concat([received, chunk]);
  });

  const harness: Harness = {
    connection,
    client: pair.clientSocket,
    frames: [],
    errors: [],
    closing: [],
    closes: [],
    received: () => received,
  };

  connection.on("frame", (frame: CanFrame) => harness.frames.push(frame));
  connection.on("error", (error: ConnectionError) => harness.errors.push(error));
  connection.on("closing", (reason?: string) => harness.closing.push(reason));
  connection.on("close", (stats: ConnectionCloseStats) => harness.closes.push(stats));

  return harness;
}

describe("Connection", () => {
  it("starts open", async () => {
    const { connection } = await open(compactCodec);

    expect(connection.getState()).toBe(ConnectionState.OPEN);
    expect(connection.isReading()).toBe(true);
    expect(connection.variant).toBe("compact");
  });

  it("decodes frames in order however the bytes are split", async () => {
    const h = await open(compactCodec);
    const bytes = [
      0, 0, 0, 1, 1, 0x11,
      0, 0, 0, 2, 2, 0x21, 0x22,
      0, 0, 0, 3, 0,
    ];

    for (const byte of bytes) {
      h.client.write(Buffer.from([byte]));
    }

    await waitFor(() => h.frames.length === 3);
    expect(h.frames.map((frame) => frame.id)).toEqual([1, 2, 3]);
    expect(h.frames.map((frame) => [...frame.payload])).toEqual([
      [0x11],
      [0x21, 0x22],
      [],
    ]);
    expect(h.connection.getStats().bufferSize).toBe(0);
    expect(h.connection.getStats().framesDecoded).toBe(3);
  });

  it("closes on an invalid frame and reports it once", async () => {
    const h = await open(compactCodec);
    let clientClosed = false;
    h.client.on("close", () => {
      clientClosed = true;
    });

    h.client.write(Buffer.from([0, 0, 0, 1, 200]));

    await waitFor(() => h.closes.length === 1 && clientClosed);
    expect(h.errors).toEqual([
      {
        type: "protocol",
        reason: "Declared payload length 200 exceeds 64",
        fatal: true,
      },
    ]);
    expect(h.closing).toEqual(["Declared payload length 200 exceeds 64"]);
    expect(h.closes[0].reason).toBe("Declared payload length 200 exceeds 64");
    expect(h.connection.getState()).toBe(ConnectionState.CLOSED);
    expect(h.frames).toEqual([]);
  });

  it("forwards frames that precede an invalid one in the same chunk", async () => {
    const h = await open(compactCodec);

    h.client.write(Buffer.from([0, 0, 0, 9, 1, 0x01, 0, 0, 0, 1, 99]));

    await waitFor(() => h.closes.length === 1);
    expect(h.frames.map((frame) => frame.id)).toEqual([9]);
  });

  it("warns when a structured payload is truncated", async () => {
    const h = await open(structuredCodec);
    const warnings: ConnectionWarning[] = [];
    h.connection.on("warning", (warning: ConnectionWarning) => warnings.push(warning));

    const body = Buffer.from(
      JSON.stringify({ type: "can", id: 0x42, data: new Array(100).fill(7) })
    );
    const prefix = Buffer.alloc(4);
    prefix.writeUInt32BE(body.length, 0);
    h.client.write(Buffer.concat([prefix, body]));

    await waitFor(() => h.frames.length === 1);
    expect(warnings).toEqual([
      { type: "truncation", frameId: 0x42, originalLength: 100, keptLength: 64 },
    ]);
    expect(h.frames[0].dlc).toBe(15);
    expect(h.connection.isReading()).toBe(true);
  });

  it("skips structured messages of other types", async () => {
    const h = await open(structuredCodec);
    const skipped: string[] = [];
    h.connection.on("skipped", (messageType: string) => skipped.push(messageType));

    const records = [
      { type: "heartbeat" },
      { type: "can", id: 5, data: [1] },
    ].map((record) => {
      const body = Buffer.from(JSON.stringify(record));
      const prefix = Buffer.alloc(4);
      prefix.writeUInt32BE(body.length, 0);
      return Buffer.concat([prefix, body]);
    });
    h.client.write(Buffer.concat(records));

    await waitFor(() => h.frames.length === 1);
    expect(skipped).toEqual(["heartbeat"]);
    expect(h.frames[0].id).toBe(5);
  });

  it("closes when the peer closes its side", async () => {
    const h = await open(compactCodec);

    h.client.end();

    await waitFor(() => h.closes.length === 1);
    expect(h.closing).toEqual(["peer closed"]);
    expect(h.connection.getState()).toBe(ConnectionState.CLOSED);
  });

  it("writes raw bytes and frames in its own encoding", async () => {
    const h = await open(compactCodec);

    expect(h.connection.write(Buffer.from([0xde, 0xad]))).toBe(true);
    expect(
      h.connection.send({ id: 0x10, flags: 0, dlc: 1, payload: Buffer.from([0x7f]) })
    ).toBe(true);

    await waitFor(() => h.received().length === 8);
    expect([...h.received()]).toEqual([0xde, 0xad, 0, 0, 0, 0x10, 1, 0x7f]);
    expect(h.connection.getStats().bytesSent).toBe(8);
  });

  it("refuses writes once closing", async () => {
    const h = await open(compactCodec);

    h.connection.destroy("test");

    expect(h.connection.isReading()).toBe(false);
    expect(h.connection.write(Buffer.from([1]))).toBe(false);
    await waitFor(() => h.closes.length === 1);
    expect(h.closing).toEqual(["test"]);
  });

  it("drops a peer that leaves too much output unread", async () => {
    const h = await open(compactCodec, 1024);
    h.client.pause();

    const accepted = h.connection.write(Buffer.alloc(64 * 1024 * 1024));

    expect(accepted).toBe(false);
    expect(h.errors).toHaveLength(1);
    expect(h.errors[0].type).toBe("write");
    expect(h.errors[0].reason.startsWith("Outbound buffer exceeded limit")).toBe(true);
    expect(h.connection.isReading()).toBe(false);
    await waitFor(() => h.closes.length === 1);
  });

  it("closes gracefully and only once", async () => {
    const h = await open(compactCodec);

    h.connection.close("shutdown");
    h.connection.close("again");

    await waitFor(() => h.closes.length === 1);
    expect(h.closing).toEqual(["shutdown"]);
  });
});

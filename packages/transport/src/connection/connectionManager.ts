import { Socket } from "net";
import { EventEmitter } from "events";
import {
  Connection,
  DEFAULT_CONNECTION_OPTIONS,
  type ConnectionOptions,
} from "./connection.js";
import type { ProtocolVariant } from "../../../protocol/src/constants.js";
import { getCodec } from "../../../protocol/src/codec.js";

/**
 * ConnectionManager tracks all live client connections.
 *
 * Responsibilities:
 * - Assign unique connection IDs
 * - Bind each connection to its codec
 * - Drop a connection from the registry as soon as it starts closing
 * - Provide snapshots for fan-out
 */
export class ConnectionManager extends EventEmitter {
  private connections: Map<string, Connection> = new Map();
  private nextId: number = 1;
  private options: ConnectionOptions;

  constructor(options: ConnectionOptions = DEFAULT_CONNECTION_OPTIONS) {
    super();
    this.options = options;
  }

  /**
   * Create a new connection from a socket
   */
  createConnection(socket: Socket, variant: ProtocolVariant): Connection {
    const connectionId = this.generateId();
    const connection = new Connection(
      socket,
      connectionId,
      getCodec(variant),
      this.options
    );

    this.connections.set(connectionId, connection);

    // Deregister before teardown so fan-out never sees a closing client
    connection.once("closing", () => {
      if (this.connections.delete(connectionId)) {
        this.emit("connectionClosed", connectionId);
      }
    });

    this.emit("connectionCreated", connection);

    return connection;
  }

  /**
   * Get a connection by ID
   */
  getConnection(connectionId: string): Connection | undefined {
    return this.connections.get(connectionId);
  }

  /**
   * Snapshot of all registered connections
   */
  getAllConnections(): Connection[] {
    return Array.from(this.connections.values());
  }

  /**
   * Get connection count
   */
  getConnectionCount(): number {
    return this.connections.size;
  }

  /**
   * Close all connections
   */
  closeAll(): void {
    for (const connection of this.getAllConnections()) {
      connection.close("server shutting down");
    }
  }

  /**
   * Generate a unique connection ID
   */
  private generateId(): string {
    return `conn-${this.nextId++}`;
  }
}

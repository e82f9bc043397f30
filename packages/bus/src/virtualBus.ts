/**
 * Virtual CAN Bus
 *
 * In-process stand-in for the simulation middleware. Every participant sees
 * every frame: the sender with direction TRANSMIT, everyone else with
 * RECEIVE. Delivery happens on a later macrotask, as it would from the
 * middleware's own thread.
 */

import { MAX_DLC, MAX_PAYLOAD_SIZE } from "../../protocol/src/constants.js";
import {
  BusDirection,
  TransportStatus,
  type BusTransport,
  type TransportFrame,
  type TransportFrameEvent,
  type TransportFrameHandler,
} from "./types.js";

export class VirtualCanBus {
  public readonly channelName: string;
  private participants: Set<VirtualBusParticipant> = new Set();
  private readonly startedAt: bigint = process.hrtime.bigint();

  constructor(channelName: string = "CAN1") {
    this.channelName = channelName;
  }

  /**
   * Attach a new participant to the bus
   */
  createParticipant(name: string): VirtualBusParticipant {
    const participant = new VirtualBusParticipant(this, name);
    this.participants.add(participant);
    return participant;
  }

  /**
   * Detach a participant; it stops sending and receiving
   */
  detach(participant: VirtualBusParticipant): void {
    this.participants.delete(participant);
  }

  /**
   * Broadcast a frame from `sender` to every attached participant
   */
  transmit(sender: VirtualBusParticipant, frame: TransportFrame): void {
    // Receivers get their own copy of the payload
    const snapshot: TransportFrame = { ...frame, data: Buffer.from(frame.data) };
    const timestamp = process.hrtime.bigint() - this.startedAt;
    const recipients = Array.from(this.participants);

    setImmediate(() => {
      for (const participant of recipients) {
        participant.deliver({
          frame: snapshot,
          direction:
            participant === sender
              ? BusDirection.TRANSMIT
              : BusDirection.RECEIVE,
          timestamp,
        });
      }
    });
  }

  getParticipantNames(): string[] {
    return Array.from(this.participants, (participant) => participant.name);
  }
}

export class VirtualBusParticipant implements BusTransport {
  public readonly name: string;
  private bus: VirtualCanBus;
  private handlers: Map<number, TransportFrameHandler> = new Map();
  private nextHandlerId: number = 1;
  private connected: boolean = true;

  constructor(bus: VirtualCanBus, name: string) {
    this.bus = bus;
    this.name = name;
  }

  sendFrame(frame: TransportFrame): number {
    if (!this.connected) {
      return TransportStatus.WRONG_STATE;
    }

    if (
      !Number.isInteger(frame.dlc) ||
      frame.dlc < 0 ||
      frame.dlc > MAX_DLC ||
      frame.data.length > MAX_PAYLOAD_SIZE
    ) {
      return TransportStatus.BAD_PARAMETER;
    }

    this.bus.transmit(this, frame);
    return TransportStatus.SUCCESS;
  }

  addFrameHandler(handler: TransportFrameHandler): number {
    const handlerId = this.nextHandlerId++;
    this.handlers.set(handlerId, handler);
    return handlerId;
  }

  removeFrameHandler(handlerId: number): void {
    this.handlers.delete(handlerId);
  }

  /**
   * Called by the bus for every frame on the channel
   */
  deliver(event: TransportFrameEvent): void {
    if (!this.connected) return;

    for (const handler of this.handlers.values()) {
      handler(event);
    }
  }

  disconnect(): void {
    this.connected = false;
    this.handlers.clear();
    this.bus.detach(this);
  }

  isConnected(): boolean {
    return this.connected;
  }
}

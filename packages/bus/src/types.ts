/**
 * Bus Transport Boundary
 *
 * The narrow surface the gateway needs from the vehicle-network simulation
 * middleware. Field layout follows the transport's own frame structure.
 */

export enum BusDirection {
  TRANSMIT = 1,
  RECEIVE = 2,
}

/**
 * Status codes returned by `sendFrame`
 */
export enum TransportStatus {
  SUCCESS = 0,
  UNSPECIFIED_ERROR = 1,
  BAD_PARAMETER = 4,
  WRONG_STATE = 8,
}

/**
 * Frame structure handed to and received from the transport
 */
export type TransportFrame = {
  id: number;
  flags: number;
  dlc: number;
  sdt: number; // SDU type
  vcid: number; // Virtual CAN network id
  af: number; // Acceptance field
  data: Buffer;
};

export type TransportFrameEvent = {
  frame: TransportFrame;
  direction: BusDirection;
  timestamp: bigint; // Nanoseconds of simulation time
};

export type TransportFrameHandler = (event: TransportFrameEvent) => void;

export interface BusTransport {
  /**
   * Put a frame on the bus
   *
   * @returns 0 on success, a transport status code otherwise
   */
  sendFrame(frame: TransportFrame): number;

  /**
   * Register a receive handler; invoked from the transport's own context
   *
   * @returns handler id for `removeFrameHandler`
   */
  addFrameHandler(handler: TransportFrameHandler): number;

  removeFrameHandler(handlerId: number): void;
}

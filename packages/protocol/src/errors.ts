/**
 * Protocol Error Classes
 */

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

export class PayloadTooLongError extends ProtocolError {
  constructor(length: number, limit: number) {
    super(`Payload too long: ${length} bytes (limit ${limit})`);
    this.name = "PayloadTooLongError";
  }
}

/**
 * A payload or mutation that refers to something the model does not have
 * (unknown layer, unknown object) or that cannot be decoded. Callers on the
 * network path catch it and drop the event.
 */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/**
 * Raised for order or configuration input that must not reach the wire.
 * `field` names the offending input (order field or environment variable).
 */
export class ValidationError extends Error {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Emitted to `error` listeners when an order could not be delivered because
 * the connection was refused or failed. The outcome is also returned to the
 * caller of `submitOrder`; this is never thrown.
 */
export class TransportFailure extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'TransportFailure';
    this.code = code;
  }
}

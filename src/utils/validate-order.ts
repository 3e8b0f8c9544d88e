import { Side, PRICE_PRECISION } from '../fix/constants';
import { ValidationError } from '../errors';
import { NormalizedOrder, OrderClientOptions, OrderRequest, SessionOptions } from '../types';

// Printable ASCII only; this also keeps SOH out of field values
const PRINTABLE_ASCII = /^[\x20-\x7e]+$/;

function requireText(field: string, value: string): string {
  const trimmed = typeof value === 'string' ? value.trim() : '';
  if (trimmed === '') {
    throw new ValidationError(field, `Missing or invalid value: ${field} must not be empty`);
  }
  if (!PRINTABLE_ASCII.test(trimmed)) {
    throw new ValidationError(field, `Invalid value: ${field} must contain printable ASCII characters only`);
  }
  return trimmed;
}

function requirePositive(field: string, value: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(field, `Invalid value: ${field} must be a finite number`);
  }
  if (value <= 0) {
    throw new ValidationError(field, `Invalid value: ${field} must be greater than zero, got ${value}`);
  }
  return value;
}

// Above this, numbers lose integer precision and toFixed switches to exponent form
function requireWireMagnitude(field: string, value: number): number {
  if (value > Number.MAX_SAFE_INTEGER) {
    throw new ValidationError(field, `Invalid value: ${field} must not exceed ${Number.MAX_SAFE_INTEGER}, got ${value}`);
  }
  return value;
}

export function validateSessionOptions(options: SessionOptions): void {
  requireText('senderCompId', options.senderCompId);
  requireText('targetCompId', options.targetCompId);
  if (options.initialSeqNum !== undefined
    && (!Number.isInteger(options.initialSeqNum) || options.initialSeqNum < 1)) {
    throw new ValidationError('initialSeqNum', 'Invalid initial sequence number: must be a positive integer');
  }
}

export function validateClientOptions(options: OrderClientOptions): void {
  validateSessionOptions(options);
  requireText('host', options.host);
  if (!Number.isInteger(options.port) || options.port <= 0 || options.port > 65535) {
    throw new ValidationError('port', 'Invalid port number');
  }
  if (options.connectTimeoutMs !== undefined) {
    requirePositive('connectTimeoutMs', options.connectTimeoutMs);
  }
  if (options.readTimeoutMs !== undefined) {
    requirePositive('readTimeoutMs', options.readTimeoutMs);
  }
  if (options.maxResponseBytes !== undefined
    && (!Number.isInteger(options.maxResponseBytes) || options.maxResponseBytes <= 0)) {
    throw new ValidationError('maxResponseBytes', 'Invalid response buffer size: must be a positive integer');
  }
}

/**
 * Validate an order and bring it into wire form: symbol trimmed and
 * upper-cased, quantity truncated to whole units.
 */
export function normalizeOrderRequest(order: OrderRequest): NormalizedOrder {
  const symbol = requireText('symbol', order.symbol).toUpperCase();

  if (order.side !== Side.BUY && order.side !== Side.SELL) {
    throw new ValidationError('side', `Invalid side: ${String(order.side)}`);
  }

  const quantity = Math.trunc(requireWireMagnitude('quantity', requirePositive('quantity', order.quantity)));
  if (quantity < 1) {
    throw new ValidationError('quantity', `Invalid quantity: ${order.quantity} is less than one whole unit`);
  }

  const price = requireWireMagnitude('price', requirePositive('price', order.price));
  if (Number(price.toFixed(PRICE_PRECISION)) === 0) {
    throw new ValidationError('price', `Invalid price: ${price} rounds to zero at ${PRICE_PRECISION} decimals`);
  }

  return { symbol, side: order.side, quantity, price };
}

/**
 * Check a ClOrdID supplied by an id source before it is put on the wire
 */
export function validateClOrdId(clOrdId: string): string {
  return requireText('clOrdId', clOrdId);
}

import type { Side } from '../fix/constants';

/**
 * Order parameters as supplied by the caller, before normalization
 */
export interface OrderRequest {
  symbol: string;
  side: Side;
  quantity: number;
  price: number;
}

/**
 * Order parameters after validation: symbol trimmed and upper-cased,
 * quantity truncated to whole units
 */
export type NormalizedOrder = Readonly<OrderRequest>;

export interface SessionOptions {
  senderCompId: string;
  targetCompId: string;
  initialSeqNum?: number;
}

export interface TransportTarget {
  host: string;
  port: number;
}

export interface TransportOptions {
  connectTimeoutMs: number;
  readTimeoutMs: number;
  maxResponseBytes?: number;
}

export interface OrderClientOptions extends SessionOptions, TransportTarget {
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  maxResponseBytes?: number;
}

/**
 * Result of one request/response exchange. Only `refused` and
 * `transportError` are failures; `timedOut` means the message was written
 * and no reply arrived in time.
 */
export type TransportOutcome =
  | { kind: 'received'; data: Buffer }
  | { kind: 'timedOut' }
  | { kind: 'closedByPeer' }
  | { kind: 'refused' }
  | { kind: 'transportError'; code: string; detail: string };

export type TransportOutcomeKind = TransportOutcome['kind'];

export type Clock = () => Date;
export type IdSource = () => string;

export interface BuildDependencies {
  clock?: Clock;
  idSource?: IdSource;
}

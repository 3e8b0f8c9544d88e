import { EventEmitter } from 'events';
import logger from '../utils/logger';
import { DEFAULT_CONNECTION, FieldTag } from './constants';
import { buildNewOrderSingle } from './message-builder';
import { extractOrderFields, getMessageTypeName, parseFixMessage, toReadable } from './message-parser';
import { createSession } from './session';
import { describeOutcome, sendMessage } from './transport';
import { TransportFailure } from '../errors';
import { validateClientOptions } from '../utils/validate-order';
import {
  BuildDependencies,
  OrderClientOptions,
  OrderRequest,
  TransportOptions,
  TransportOutcome,
  TransportOutcomeKind,
  TransportTarget
} from '../types';

export type Transport = (
  target: TransportTarget,
  message: Buffer,
  options: TransportOptions
) => Promise<TransportOutcome>;

export interface OrderClientDependencies extends BuildDependencies {
  transport?: Transport;
}

export interface SentOrder {
  message: Buffer;
  readable: string;
  msgSeqNum: number;
  clOrdId: string;
}

export interface OrderSubmission extends SentOrder {
  outcome: TransportOutcome;
}

export interface OrderClientStatus {
  senderCompId: string;
  targetCompId: string;
  nextSeqNum: number;
  inFlight: number;
  lastOutcome: TransportOutcomeKind | null;
}

export interface OrderClientEvents {
  sent: [order: SentOrder];
  received: [data: Buffer, readable: string];
  info: [text: string];
  error: [error: Error];
}

export interface OrderClient {
  on<E extends keyof OrderClientEvents>(event: E, listener: (...args: OrderClientEvents[E]) => void): OrderClient;
  submitOrder(order: OrderRequest): Promise<OrderSubmission>;
  resetSequence(): OrderClient;
  getStatus(): OrderClientStatus;
}

/**
 * Create an order-entry client bound to one counterparty and one session.
 *
 * Each `submitOrder` call builds a NewOrderSingle, opens its own connection,
 * and settles with the transport outcome. Progress is also published as
 * `sent`, `received`, `info` and `error` events. The sequence number is taken
 * synchronously before any I/O, so overlapping submissions get distinct,
 * increasing numbers.
 */
export function createOrderClient(
  options: OrderClientOptions,
  deps: OrderClientDependencies = {}
): OrderClient {
  validateClientOptions(options);

  const emitter = new EventEmitter();
  const session = createSession(options);
  const transport = deps.transport ?? sendMessage;
  const target: TransportTarget = { host: options.host.trim(), port: options.port };
  const transportOptions: TransportOptions = {
    connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECTION.CONNECT_TIMEOUT_MS,
    readTimeoutMs: options.readTimeoutMs ?? DEFAULT_CONNECTION.READ_TIMEOUT_MS,
    maxResponseBytes: options.maxResponseBytes ?? DEFAULT_CONNECTION.MAX_RESPONSE_BYTES
  };

  let inFlight = 0;
  let lastOutcome: TransportOutcomeKind | null = null;

  // 'error' with no listener would throw from EventEmitter; the failure is
  // still logged and returned to the caller.
  const emitError = (error: Error): void => {
    if (emitter.listenerCount('error') > 0) {
      emitter.emit('error', error);
    }
  };

  const reportOutcome = (outcome: TransportOutcome): void => {
    switch (outcome.kind) {
      case 'received': {
        const readable = toReadable(outcome.data);
        const msgType = parseFixMessage(outcome.data).get(FieldTag.MSG_TYPE);
        logger.info(`[ORDER] Response ${msgType ? getMessageTypeName(msgType) : 'UNKNOWN'}: ${readable}`);
        emitter.emit('received', outcome.data, readable);
        break;
      }
      case 'timedOut':
      case 'closedByPeer':
        emitter.emit('info', describeOutcome(outcome));
        break;
      case 'refused':
        emitError(new TransportFailure('ECONNREFUSED', `Connection refused at ${target.host}:${target.port}`));
        break;
      case 'transportError':
        emitError(new TransportFailure(outcome.code, outcome.detail));
        break;
    }
  };

  const submitOrder = async (order: OrderRequest): Promise<OrderSubmission> => {
    let message: Buffer;
    try {
      message = buildNewOrderSingle(session, order, deps);
    } catch (error) {
      logger.error(`[ORDER] Order rejected: ${error instanceof Error ? error.message : String(error)}`);
      emitError(error instanceof Error ? error : new Error(String(error)));
      throw error;
    }

    const extracted = extractOrderFields(message);
    if (!extracted) {
      throw new Error('Built message is not a valid NewOrderSingle');
    }
    const sent: SentOrder = {
      message,
      readable: toReadable(message),
      msgSeqNum: extracted.msgSeqNum,
      clOrdId: extracted.clOrdId
    };
    logger.info(`[ORDER] Sending ${sent.clOrdId} (seq ${sent.msgSeqNum}) to ${target.host}:${target.port}: ${sent.readable}`);
    emitter.emit('sent', sent);

    inFlight++;
    let outcome: TransportOutcome;
    try {
      outcome = await transport(target, message, transportOptions);
    } finally {
      inFlight--;
    }

    lastOutcome = outcome.kind;
    reportOutcome(outcome);

    return { ...sent, outcome };
  };

  const client: OrderClient = {
    on(event, listener) {
      emitter.on(event, listener);
      return client;
    },
    submitOrder,
    resetSequence() {
      session.sequence.reset();
      emitter.emit('info', `Sequence number reset to ${session.sequence.getInitialSeqNum()}`);
      return client;
    },
    getStatus() {
      return {
        senderCompId: session.senderCompId,
        targetCompId: session.targetCompId,
        nextSeqNum: session.sequence.peek(),
        inFlight,
        lastOutcome
      };
    }
  };

  return client;
}

import net from 'net';
import logger from '../utils/logger';
import { ConnectionState, TransportPhase } from '../utils/connection-state';
import { DEFAULT_CONNECTION } from './constants';
import { toReadable } from './message-parser';
import { TransportOptions, TransportOutcome, TransportTarget } from '../types';

const PHASE_FOR_OUTCOME: Record<TransportOutcome['kind'], TransportPhase> = {
  received: TransportPhase.RECEIVED,
  timedOut: TransportPhase.TIMED_OUT,
  closedByPeer: TransportPhase.CLOSED_BY_PEER,
  refused: TransportPhase.REFUSED,
  transportError: TransportPhase.TRANSPORT_ERROR
};

function getErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a socket error onto an outcome: an actively refused connection is
 * `refused`, everything else is a `transportError` carrying the errno code.
 */
export function classifySocketError(error: Error): TransportOutcome {
  const code = getErrorCode(error);
  if (code === 'ECONNREFUSED') {
    return { kind: 'refused' };
  }
  return { kind: 'transportError', code: code ?? 'UNKNOWN', detail: error.message };
}

export function describeOutcome(outcome: TransportOutcome): string {
  switch (outcome.kind) {
    case 'received':
      return `Received ${outcome.data.length} bytes`;
    case 'timedOut':
      return 'No response (timeout), message delivered';
    case 'closedByPeer':
      return 'Connection closed by server';
    case 'refused':
      return 'Connection refused';
    case 'transportError':
      return `${outcome.code}: ${outcome.detail}`;
  }
}

/**
 * Send one message and wait for at most one response buffer.
 *
 * Opens a fresh TCP connection, writes every byte of `message`, then reads a
 * single chunk of up to `maxResponseBytes`. The returned promise always
 * resolves; failures are reported as outcomes. The socket is destroyed
 * before the promise resolves, whatever the outcome. Nothing is retried.
 */
export function sendMessage(
  target: TransportTarget,
  message: Buffer,
  options: TransportOptions
): Promise<TransportOutcome> {
  const maxResponseBytes = options.maxResponseBytes ?? DEFAULT_CONNECTION.MAX_RESPONSE_BYTES;
  const label = `${target.host}:${target.port}`;
  const state = new ConnectionState(label);

  return new Promise((resolve) => {
    const socket = new net.Socket();
    let settled = false;
    // Bytes or FIN that arrive before our write has completed
    let early: Buffer | null = null;
    let peerEnded = false;

    const finish = (outcome: TransportOutcome): void => {
      if (settled) return;
      settled = true;
      socket.setTimeout(0);
      socket.destroy();

      state.transition(PHASE_FOR_OUTCOME[outcome.kind]);
      if (outcome.kind === 'refused' || outcome.kind === 'transportError') {
        logger.error(`[TRANSPORT] ${label}: ${describeOutcome(outcome)}`);
      } else {
        logger.info(`[TRANSPORT] ${label}: ${describeOutcome(outcome)}`);
      }
      state.reset();

      resolve(outcome);
    };

    const receive = (chunk: Buffer): void => {
      const data = chunk.subarray(0, maxResponseBytes);
      logger.debug(`[TRANSPORT] Received: ${toReadable(data, '|')}`);
      finish({ kind: 'received', data });
    };

    socket.setNoDelay(true);
    socket.setTimeout(options.connectTimeoutMs);

    socket.on('timeout', () => {
      if (state.getPhase() === TransportPhase.SENT) {
        finish({ kind: 'timedOut' });
      } else {
        finish({
          kind: 'transportError',
          code: 'ETIMEDOUT',
          detail: `Connection to ${label} timed out after ${options.connectTimeoutMs}ms`
        });
      }
    });

    socket.on('error', (error) => {
      finish(classifySocketError(error));
    });

    socket.on('data', (chunk: Buffer) => {
      if (settled) return;
      if (state.getPhase() === TransportPhase.SENT) {
        receive(chunk);
      } else {
        early = early ? Buffer.concat([early, chunk]) : chunk;
      }
    });

    socket.on('end', () => {
      if (state.getPhase() === TransportPhase.SENT) {
        finish({ kind: 'closedByPeer' });
      } else {
        peerEnded = true;
      }
    });

    socket.on('close', () => {
      if (state.getPhase() === TransportPhase.SENT) {
        finish({ kind: 'closedByPeer' });
      } else {
        finish({
          kind: 'transportError',
          code: 'ECLOSED',
          detail: `Connection to ${label} closed before the message was written`
        });
      }
    });

    socket.once('connect', () => {
      logger.info(`[TRANSPORT] Connected to ${label}`);
      socket.write(message, (error) => {
        if (settled) return;
        if (error) {
          finish(classifySocketError(error));
          return;
        }

        state.transition(TransportPhase.SENT);
        logger.debug(`[TRANSPORT] Sent ${message.length} bytes: ${toReadable(message, '|')}`);

        if (early) {
          receive(early);
        } else if (peerEnded) {
          finish({ kind: 'closedByPeer' });
        } else {
          socket.setTimeout(options.readTimeoutMs);
        }
      });
    });

    try {
      logger.info(`[TRANSPORT] Establishing TCP connection to ${label}...`);
      state.transition(TransportPhase.CONNECTING);
      socket.connect(target.port, target.host);
    } catch (error) {
      // Synchronous failures, e.g. an out-of-range port
      finish(classifySocketError(error instanceof Error ? error : new Error(String(error))));
    }
  });
}

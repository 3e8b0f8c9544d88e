import { DEFAULT_CONNECTION, Side } from '../fix/constants';
import { ValidationError } from '../errors';
import { OrderClientOptions, OrderRequest } from '../types';

export interface AppConfig {
  client: OrderClientOptions;
  order: OrderRequest;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw.trim());
  if (!Number.isFinite(value)) {
    throw new ValidationError(name, `Invalid number in ${name}: "${raw}"`);
  }
  return value;
}

function readInteger(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (!Number.isInteger(value)) {
    throw new ValidationError(name, `Invalid integer in ${name}: "${env[name]}"`);
  }
  return value;
}

function readSide(env: Env, name: string): Side {
  const raw = (env[name] ?? 'BUY').trim().toUpperCase();
  switch (raw) {
    case 'BUY':
    case Side.BUY:
      return Side.BUY;
    case 'SELL':
    case Side.SELL:
      return Side.SELL;
    default:
      throw new ValidationError(name, `Invalid side in ${name}: "${env[name]}" (expected BUY or SELL)`);
  }
}

/**
 * Build client and order settings from environment variables, falling back
 * to local defaults for anything unset
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    client: {
      host: env.FIX_HOST || DEFAULT_CONNECTION.HOST,
      port: readInteger(env, 'FIX_PORT', DEFAULT_CONNECTION.PORT),
      senderCompId: env.SENDER_COMP_ID || DEFAULT_CONNECTION.SENDER_COMP_ID,
      targetCompId: env.TARGET_COMP_ID || DEFAULT_CONNECTION.TARGET_COMP_ID,
      connectTimeoutMs: readNumber(env, 'CONNECT_TIMEOUT_MS', DEFAULT_CONNECTION.CONNECT_TIMEOUT_MS),
      readTimeoutMs: readNumber(env, 'READ_TIMEOUT_MS', DEFAULT_CONNECTION.READ_TIMEOUT_MS),
      maxResponseBytes: readInteger(env, 'MAX_RESPONSE_BYTES', DEFAULT_CONNECTION.MAX_RESPONSE_BYTES),
      initialSeqNum: readInteger(env, 'INITIAL_SEQ_NUM', DEFAULT_CONNECTION.INITIAL_SEQ_NUM)
    },
    order: {
      symbol: env.ORDER_SYMBOL ?? 'AAPL',
      side: readSide(env, 'ORDER_SIDE'),
      quantity: readNumber(env, 'ORDER_QTY', 100),
      price: readNumber(env, 'ORDER_PRICE', 150)
    }
  };
}

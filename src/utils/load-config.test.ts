import { describe, it, expect } from 'vitest';
import { loadConfig } from './load-config';
import { Side } from '../fix/constants';
import { ValidationError } from '../errors';

describe('loadConfig', () => {
  it('falls back to local defaults', () => {
    expect(loadConfig({})).toEqual({
      client: {
        host: '127.0.0.1',
        port: 9876,
        senderCompId: 'CLIENT1',
        targetCompId: 'SERVER1',
        connectTimeoutMs: 8000,
        readTimeoutMs: 8000,
        maxResponseBytes: 4096,
        initialSeqNum: 1
      },
      order: { symbol: 'AAPL', side: Side.BUY, quantity: 100, price: 150 }
    });
  });

  it('reads every setting from the environment', () => {
    const config = loadConfig({
      FIX_HOST: 'fix.example.test',
      FIX_PORT: '5001',
      SENDER_COMP_ID: 'DESK1',
      TARGET_COMP_ID: 'BROKER',
      CONNECT_TIMEOUT_MS: '1500',
      READ_TIMEOUT_MS: '2500',
      MAX_RESPONSE_BYTES: '1024',
      INITIAL_SEQ_NUM: '7',
      ORDER_SYMBOL: 'ibm',
      ORDER_SIDE: 'sell',
      ORDER_QTY: '12',
      ORDER_PRICE: '99.95'
    });

    expect(config.client).toEqual({
      host: 'fix.example.test',
      port: 5001,
      senderCompId: 'DESK1',
      targetCompId: 'BROKER',
      connectTimeoutMs: 1500,
      readTimeoutMs: 2500,
      maxResponseBytes: 1024,
      initialSeqNum: 7
    });
    expect(config.order).toEqual({ symbol: 'ibm', side: Side.SELL, quantity: 12, price: 99.95 });
  });

  it('accepts FIX side codes', () => {
    expect(loadConfig({ ORDER_SIDE: '2' }).order.side).toBe(Side.SELL);
    expect(loadConfig({ ORDER_SIDE: '1' }).order.side).toBe(Side.BUY);
  });

  it('names the variable holding a malformed number', () => {
    expect(() => loadConfig({ ORDER_QTY: 'ten' })).toThrow('Invalid number in ORDER_QTY: "ten"');
    expect(() => loadConfig({ FIX_PORT: '80.5' })).toThrow(ValidationError);
  });

  it('rejects an unknown side', () => {
    expect(() => loadConfig({ ORDER_SIDE: 'SHORT' })).toThrow('Invalid side in ORDER_SIDE: "SHORT" (expected BUY or SELL)');
  });
});

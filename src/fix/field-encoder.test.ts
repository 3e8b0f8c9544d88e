import { describe, it, expect } from 'vitest';
import { encodeField, formatPrice, formatQuantity, formatTimestamp, price, renderValue } from './field-encoder';
import { SOH } from './constants';

describe('encodeField', () => {
  it('renders tag, equals sign, value and a single SOH', () => {
    expect(encodeField(55, 'AAPL')).toBe(`55=AAPL${SOH}`);
  });

  it('renders integers in decimal without fraction', () => {
    expect(encodeField(38, 100)).toBe(`38=100${SOH}`);
    expect(encodeField(34, 7.9)).toBe(`34=7${SOH}`);
  });

  it('renders prices with four fractional digits', () => {
    expect(encodeField(44, price(150))).toBe(`44=150.0000${SOH}`);
    expect(encodeField(44, price(0.1 + 0.2))).toBe(`44=0.3000${SOH}`);
    expect(encodeField(44, price(12.34567))).toBe(`44=12.3457${SOH}`);
  });

  it('trims string values', () => {
    expect(encodeField(49, '  CLIENT1 ')).toBe(`49=CLIENT1${SOH}`);
  });

  it('ends with exactly one delimiter byte', () => {
    const field = encodeField(56, 'SERVER1');
    expect(field.split(SOH)).toEqual(['56=SERVER1', '']);
  });
});

describe('value formatting', () => {
  it('formats quantities as whole units', () => {
    expect(formatQuantity(250.75)).toBe('250');
  });

  it('formats prices at fixed precision', () => {
    expect(formatPrice(99.5)).toBe('99.5000');
  });

  it('distinguishes price values from integers', () => {
    expect(renderValue(42)).toBe('42');
    expect(renderValue(price(42))).toBe('42.0000');
  });
});

describe('formatTimestamp', () => {
  it('renders UTC as YYYYMMDD-HH:MM:SS', () => {
    expect(formatTimestamp(new Date(Date.UTC(2024, 0, 5, 3, 4, 5)))).toBe('20240105-03:04:05');
  });

  it('drops milliseconds', () => {
    expect(formatTimestamp(new Date('2024-12-31T23:59:59.999Z'))).toBe('20241231-23:59:59');
  });
});

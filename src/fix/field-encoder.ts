import { SOH, PRICE_PRECISION } from './constants';

/**
 * A price value, rendered with a fixed number of fractional digits
 */
export interface PriceValue {
  readonly kind: 'price';
  readonly value: number;
}

/**
 * Numbers render as integers, strings verbatim after trimming
 */
export type FieldValue = number | string | PriceValue;

export function price(value: number): PriceValue {
  return { kind: 'price', value };
}

export function formatInteger(value: number): string {
  return Math.trunc(value).toFixed(0);
}

export function formatPrice(value: number): string {
  return value.toFixed(PRICE_PRECISION);
}

export function formatQuantity(value: number): string {
  return formatInteger(value);
}

/**
 * Timestamp in FIX UTCTimestamp format without milliseconds (YYYYMMDD-HH:MM:SS)
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, '0');

  const year = date.getUTCFullYear();
  const month = pad(date.getUTCMonth() + 1);
  const day = pad(date.getUTCDate());
  const hours = pad(date.getUTCHours());
  const minutes = pad(date.getUTCMinutes());
  const seconds = pad(date.getUTCSeconds());

  return `${year}${month}${day}-${hours}:${minutes}:${seconds}`;
}

export function renderValue(value: FieldValue): string {
  if (typeof value === 'number') {
    return formatInteger(value);
  }
  if (typeof value === 'string') {
    return value.trim();
  }
  return formatPrice(value.value);
}

/**
 * Render a single `tag=value<SOH>` field. Values are not escaped, so they
 * must not contain SOH.
 */
export function encodeField(tag: number, value: FieldValue): string {
  return `${tag}=${renderValue(value)}${SOH}`;
}

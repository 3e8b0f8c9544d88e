import { SOH, MessageType, FieldTag, Side } from './constants';
import { computeChecksum } from './message-builder';

export interface FixField {
  tag: number;
  value: string;
}

/**
 * Parsed FIX message: fields in wire order plus a lookup by tag
 * (first occurrence wins)
 */
export interface ParsedFixMessage {
  fields: FixField[];
  get(tag: number): string | undefined;
}

export interface ExtractedOrder {
  msgSeqNum: number;
  clOrdId: string;
  symbol: string;
  side: Side;
  quantity: number;
  price: number;
}

const CHECKSUM_MARKER = `${SOH}${FieldTag.CHECK_SUM}=`;
const TAG_PATTERN = /^\d+$/;

function toText(message: string | Buffer): string {
  return typeof message === 'string' ? message : message.toString('latin1');
}

/**
 * Parse a raw FIX message into tag/value pairs. Segments without `=` or with
 * a non-numeric tag are skipped.
 */
export function parseFixMessage(message: string | Buffer): ParsedFixMessage {
  const fields: FixField[] = [];
  const byTag = new Map<number, string>();

  for (const segment of toText(message).split(SOH)) {
    if (!segment) continue;

    const separatorIndex = segment.indexOf('=');
    if (separatorIndex <= 0) continue;

    const rawTag = segment.substring(0, separatorIndex);
    if (!TAG_PATTERN.test(rawTag)) continue;

    const tag = parseInt(rawTag, 10);
    const value = segment.substring(separatorIndex + 1);
    fields.push({ tag, value });
    if (!byTag.has(tag)) {
      byTag.set(tag, value);
    }
  }

  return {
    fields,
    get: (tag: number) => byTag.get(tag)
  };
}

/**
 * Display form of a raw message, e.g. `8=FIX.4.2 | 9=... | 10=123 | `
 */
export function toReadable(message: string | Buffer, separator: string = ' | '): string {
  return toText(message).split(SOH).join(separator);
}

/**
 * Verify that the trailing 10= field matches the checksum of every byte
 * before it
 */
export function verifyChecksum(message: string | Buffer): boolean {
  const text = toText(message);
  const markerIndex = text.lastIndexOf(CHECKSUM_MARKER);
  if (markerIndex === -1) return false;

  const checksumMatch = /^(\d{3})\x01$/.exec(text.substring(markerIndex + CHECKSUM_MARKER.length));
  if (!checksumMatch) return false;

  return computeChecksum(text.substring(0, markerIndex + 1)) === checksumMatch[1];
}

/**
 * Verify that 9= equals the length of the region from 35= up to the SOH
 * preceding 10=
 */
export function verifyBodyLength(message: string | Buffer): boolean {
  const text = toText(message);
  const beginEnd = text.indexOf(SOH);
  if (beginEnd === -1) return false;
  const lengthEnd = text.indexOf(SOH, beginEnd + 1);
  if (lengthEnd === -1) return false;

  const lengthField = text.substring(beginEnd + 1, lengthEnd);
  const lengthPrefix = `${FieldTag.BODY_LENGTH}=`;
  if (!lengthField.startsWith(lengthPrefix)) return false;

  const declared = lengthField.substring(lengthPrefix.length);
  if (!TAG_PATTERN.test(declared)) return false;

  const markerIndex = text.lastIndexOf(CHECKSUM_MARKER);
  if (markerIndex < lengthEnd) return false;

  return markerIndex - lengthEnd === parseInt(declared, 10);
}

/**
 * Recover the order parameters from a NewOrderSingle. Returns null when the
 * message is not a NewOrderSingle or a required field is missing or malformed.
 */
export function extractOrderFields(message: string | Buffer): ExtractedOrder | null {
  const parsed = parseFixMessage(message);
  if (parsed.get(FieldTag.MSG_TYPE) !== MessageType.NEW_ORDER_SINGLE) {
    return null;
  }

  const symbol = parsed.get(FieldTag.SYMBOL);
  const clOrdId = parsed.get(FieldTag.CL_ORD_ID);
  const sideValue = parsed.get(FieldTag.SIDE);
  const msgSeqNum = Number(parsed.get(FieldTag.MSG_SEQ_NUM));
  const quantity = Number(parsed.get(FieldTag.ORDER_QTY));
  const price = Number(parsed.get(FieldTag.PRICE));

  let side: Side;
  if (sideValue === Side.BUY) {
    side = Side.BUY;
  } else if (sideValue === Side.SELL) {
    side = Side.SELL;
  } else {
    return null;
  }

  if (!symbol || !clOrdId || !Number.isInteger(msgSeqNum)
    || !Number.isFinite(quantity) || !Number.isFinite(price)) {
    return null;
  }

  return { msgSeqNum, clOrdId, symbol, side, quantity, price };
}

/**
 * Get human-readable name for a message type
 */
export function getMessageTypeName(msgType: string): string {
  for (const [name, value] of Object.entries(MessageType)) {
    if (value === msgType) {
      return name;
    }
  }
  return 'UNKNOWN';
}

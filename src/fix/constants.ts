/**
 * FIX 4.2 protocol constants
 */

// Standard FIX delimiter - SOH (Start of Header) character (ASCII 1)
export const SOH = String.fromCharCode(1);

export const BEGIN_STRING = 'FIX.4.2';

/**
 * FIX message types
 */
export enum MessageType {
  HEARTBEAT = '0',
  TEST_REQUEST = '1',
  RESEND_REQUEST = '2',
  REJECT = '3',
  SEQUENCE_RESET = '4',
  LOGOUT = '5',
  LOGON = 'A',
  NEW_ORDER_SINGLE = 'D',
  EXECUTION_REPORT = '8',
  ORDER_CANCEL_REJECT = '9',
  BUSINESS_MESSAGE_REJECT = 'j'
}

/**
 * FIX field tags
 */
export enum FieldTag {
  BEGIN_STRING = 8,
  BODY_LENGTH = 9,
  CHECK_SUM = 10,
  CL_ORD_ID = 11,
  HANDL_INST = 21,
  MSG_SEQ_NUM = 34,
  MSG_TYPE = 35,
  ORDER_QTY = 38,
  ORD_TYPE = 40,
  PRICE = 44,
  SENDER_COMP_ID = 49,
  SENDING_TIME = 52,
  SIDE = 54,
  SYMBOL = 55,
  TARGET_COMP_ID = 56,
  TRANSACT_TIME = 60
}

export enum Side {
  BUY = '1',
  SELL = '2'
}

// HandlInst 1 = automated execution, private, no broker intervention
export enum HandlInst {
  AUTOMATED_PRIVATE = '1',
  AUTOMATED_PUBLIC = '2',
  MANUAL = '3'
}

export enum OrdType {
  MARKET = '1',
  LIMIT = '2'
}

// Price (44) is always rendered with this many fractional digits
export const PRICE_PRECISION = 4;

export const DEFAULT_CONNECTION = {
  HOST: '127.0.0.1',
  PORT: 9876,
  SENDER_COMP_ID: 'CLIENT1',
  TARGET_COMP_ID: 'SERVER1',
  CONNECT_TIMEOUT_MS: 8000,
  READ_TIMEOUT_MS: 8000,
  MAX_RESPONSE_BYTES: 4096,
  INITIAL_SEQ_NUM: 1
};

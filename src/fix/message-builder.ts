import { v4 as uuidv4 } from 'uuid';
import {
  BEGIN_STRING,
  FieldTag,
  MessageType,
  HandlInst,
  OrdType
} from './constants';
import { encodeField, formatTimestamp, price, FieldValue } from './field-encoder';
import type { Session } from './session';
import { normalizeOrderRequest, validateClOrdId } from '../utils/validate-order';
import type { BuildDependencies, OrderRequest } from '../types';

/**
 * Core message builder interface
 */
export interface MessageBuilder {
  setMsgType(msgType: string): MessageBuilder;
  setSenderCompID(senderCompID: string): MessageBuilder;
  setTargetCompID(targetCompID: string): MessageBuilder;
  setMsgSeqNum(seqNum: number): MessageBuilder;
  setSendingTime(sendingTime: string): MessageBuilder;
  addField(tag: number, value: FieldValue): MessageBuilder;
  buildMessage(): string;
}

/**
 * Sum of all character codes modulo 256, as three zero-padded digits
 */
export function computeChecksum(data: string): string {
  let checksum = 0;
  for (let i = 0; i < data.length; i++) {
    checksum += data.charCodeAt(i);
  }
  return (checksum % 256).toString().padStart(3, '0');
}

export function defaultIdSource(): string {
  return `ORD-${Date.now()}-${uuidv4().slice(0, 8)}`;
}

/**
 * Creates a generic FIX 4.2 message builder.
 *
 * Standard header fields are emitted first (35, 49, 56, 34, 52), followed by
 * body fields in the order they were added. Values must be ASCII and must not
 * contain SOH; BodyLength and CheckSum are computed over characters.
 */
export function createMessageBuilder(): MessageBuilder {
  let msgType: string | undefined;
  let senderCompID: string | undefined;
  let targetCompID: string | undefined;
  let msgSeqNum: number | undefined;
  let sendingTime: string | undefined;
  const bodyFields: Array<[number, FieldValue]> = [];

  const setMsgType = (value: string) => {
    msgType = value;
    return messageBuilder;
  };

  const setSenderCompID = (value: string) => {
    senderCompID = value;
    return messageBuilder;
  };

  const setTargetCompID = (value: string) => {
    targetCompID = value;
    return messageBuilder;
  };

  const setMsgSeqNum = (value: number) => {
    msgSeqNum = value;
    return messageBuilder;
  };

  const setSendingTime = (value: string) => {
    sendingTime = value;
    return messageBuilder;
  };

  const addField = (tag: number, value: FieldValue) => {
    bodyFields.push([tag, value]);
    return messageBuilder;
  };

  const buildMessage = () => {
    if (!msgType) {
      throw new Error('Message type is required');
    }

    let bodyContent = encodeField(FieldTag.MSG_TYPE, msgType);
    if (senderCompID !== undefined) {
      bodyContent += encodeField(FieldTag.SENDER_COMP_ID, senderCompID);
    }
    if (targetCompID !== undefined) {
      bodyContent += encodeField(FieldTag.TARGET_COMP_ID, targetCompID);
    }
    if (msgSeqNum !== undefined) {
      bodyContent += encodeField(FieldTag.MSG_SEQ_NUM, msgSeqNum);
    }
    bodyContent += encodeField(FieldTag.SENDING_TIME, sendingTime ?? formatTimestamp(new Date()));

    for (const [tag, value] of bodyFields) {
      bodyContent += encodeField(tag, value);
    }

    // BodyLength counts from 35= up to and including the SOH before 10=
    let message = encodeField(FieldTag.BEGIN_STRING, BEGIN_STRING);
    message += encodeField(FieldTag.BODY_LENGTH, bodyContent.length);
    message += bodyContent;
    message += encodeField(FieldTag.CHECK_SUM, computeChecksum(message));

    return message;
  };

  const messageBuilder: MessageBuilder = {
    setMsgType,
    setSenderCompID,
    setTargetCompID,
    setMsgSeqNum,
    setSendingTime,
    addField,
    buildMessage,
  };

  return messageBuilder;
}

/**
 * Build a limit NewOrderSingle (35=D) for the given session.
 *
 * Advances the session's sequence counter once; a ValidationError (bad order
 * or bad ClOrdID) is thrown before the counter is touched. `deps.clock` and `deps.idSource` replace the
 * wall clock and the ClOrdID generator.
 */
export function buildNewOrderSingle(
  session: Session,
  order: OrderRequest,
  deps: BuildDependencies = {}
): Buffer {
  const normalized = normalizeOrderRequest(order);
  const clock = deps.clock ?? (() => new Date());
  const idSource = deps.idSource ?? defaultIdSource;

  const now = formatTimestamp(clock());
  const clOrdId = validateClOrdId(idSource());
  const seqNum = session.sequence.next();

  const message = createMessageBuilder()
    .setMsgType(MessageType.NEW_ORDER_SINGLE)
    .setSenderCompID(session.senderCompId)
    .setTargetCompID(session.targetCompId)
    .setMsgSeqNum(seqNum)
    .setSendingTime(now)
    .addField(FieldTag.CL_ORD_ID, clOrdId)
    .addField(FieldTag.HANDL_INST, HandlInst.AUTOMATED_PRIVATE)
    .addField(FieldTag.SYMBOL, normalized.symbol)
    .addField(FieldTag.SIDE, normalized.side)
    .addField(FieldTag.TRANSACT_TIME, now)
    .addField(FieldTag.ORDER_QTY, normalized.quantity)
    .addField(FieldTag.ORD_TYPE, OrdType.LIMIT)
    .addField(FieldTag.PRICE, price(normalized.price))
    .buildMessage();

  return Buffer.from(message, 'ascii');
}

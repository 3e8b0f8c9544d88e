import logger from '../utils/logger';

/**
 * Outgoing MsgSeqNum (34) counter for a single session.
 *
 * `next()` hands out the current value and then increments, so the first
 * message of a fresh or reset session carries `initialSeqNum`. Calls are
 * synchronous and therefore never interleave on the event loop.
 */
export class SequenceManager {
  private readonly initialSeqNum: number;
  private seqNum: number;

  constructor(initialSeqNum: number = 1) {
    if (!Number.isInteger(initialSeqNum) || initialSeqNum < 1) {
      throw new RangeError(`Initial sequence number must be a positive integer, got ${initialSeqNum}`);
    }
    this.initialSeqNum = initialSeqNum;
    this.seqNum = initialSeqNum;
    logger.debug(`[SEQUENCE] Initializing sequence manager at ${initialSeqNum}`);
  }

  /**
   * Get the next sequence number and increment
   */
  public next(): number {
    const current = this.seqNum;
    this.seqNum++;
    logger.debug(`[SEQUENCE] Sequence incremented to ${this.seqNum}`);
    return current;
  }

  /**
   * The value the next call to `next()` will return
   */
  public peek(): number {
    return this.seqNum;
  }

  public getInitialSeqNum(): number {
    return this.initialSeqNum;
  }

  /**
   * Restore the counter to its initial value
   */
  public reset(): void {
    logger.info(`[SEQUENCE] Resetting sequence number to ${this.initialSeqNum}`);
    this.seqNum = this.initialSeqNum;
  }
}

export default SequenceManager;

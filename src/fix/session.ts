import { SequenceManager } from './sequence-manager';
import { SessionOptions } from '../types';
import { validateSessionOptions } from '../utils/validate-order';

/**
 * Sender/target identity plus the outgoing sequence counter. Owned by the
 * caller and passed to the message builder; nothing here is process-global.
 */
export interface Session {
  readonly senderCompId: string;
  readonly targetCompId: string;
  readonly sequence: SequenceManager;
}

export function createSession(options: SessionOptions): Session {
  validateSessionOptions(options);
  return {
    senderCompId: options.senderCompId.trim(),
    targetCompId: options.targetCompId.trim(),
    sequence: new SequenceManager(options.initialSeqNum ?? 1)
  };
}

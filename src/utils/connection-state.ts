import { logger } from "./logger";

export enum TransportPhase {
  IDLE = 'IDLE',
  CONNECTING = 'CONNECTING',
  SENT = 'SENT',
  RECEIVED = 'RECEIVED',
  TIMED_OUT = 'TIMED_OUT',
  CLOSED_BY_PEER = 'CLOSED_BY_PEER',
  REFUSED = 'REFUSED',
  TRANSPORT_ERROR = 'TRANSPORT_ERROR'
}

const TERMINAL_PHASES: ReadonlySet<TransportPhase> = new Set([
  TransportPhase.RECEIVED,
  TransportPhase.TIMED_OUT,
  TransportPhase.CLOSED_BY_PEER,
  TransportPhase.REFUSED,
  TransportPhase.TRANSPORT_ERROR
]);

// Allowed moves: IDLE -> CONNECTING -> SENT -> terminal -> IDLE.
// A connect failure goes straight from CONNECTING to REFUSED or TRANSPORT_ERROR.
function isAllowed(from: TransportPhase, to: TransportPhase): boolean {
  switch (from) {
    case TransportPhase.IDLE:
      return to === TransportPhase.CONNECTING;
    case TransportPhase.CONNECTING:
      return to === TransportPhase.SENT
        || to === TransportPhase.REFUSED
        || to === TransportPhase.TRANSPORT_ERROR;
    case TransportPhase.SENT:
      return TERMINAL_PHASES.has(to);
    default:
      return to === TransportPhase.IDLE;
  }
}

export class ConnectionState {
    private phase: TransportPhase = TransportPhase.IDLE;
    private readonly label: string;

    constructor(label: string) {
      this.label = label;
    }

    transition(next: TransportPhase): void {
      if (!isAllowed(this.phase, next)) {
        throw new Error(`Invalid transport transition ${this.phase} -> ${next} for ${this.label}`);
      }
      logger.debug(`[STATE] ${this.label}: ${this.phase} -> ${next}`);
      this.phase = next;
    }

    getPhase(): TransportPhase {
      return this.phase;
    }

    isTerminal(): boolean {
      return TERMINAL_PHASES.has(this.phase);
    }

    reset(): void {
      if (this.phase !== TransportPhase.IDLE) {
        this.transition(TransportPhase.IDLE);
      }
    }
  }

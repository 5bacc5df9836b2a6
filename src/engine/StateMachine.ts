import type { Logger } from '../logging/Logger';
import { SipError, SipErrorCode, isSipError } from '../sip/SipError';

export type TransitionTable<S extends string> = Record<S, readonly S[]>;

/**
 * Table-driven state holder shared by registrations and calls. A move that
 * is not in the table throws `SipError(ILLEGAL_TRANSITION)` and leaves the
 * state unchanged.
 */
export abstract class StateMachine<S extends string> {
  private currentState: S;

  protected constructor(
    initial: S,
    private readonly table: TransitionTable<S>,
    protected readonly logger: Logger
  ) {
    this.currentState = initial;
  }

  public get state(): S {
    return this.currentState;
  }

  public canTransition(next: S): boolean {
    return this.table[this.currentState].includes(next);
  }

  protected assertTransition(next: S, event: string): void {
    if (!this.canTransition(next)) {
      throw new SipError(
        SipErrorCode.ILLEGAL_TRANSITION,
        `${this.describe()}: ${event} is not allowed in state ${this.currentState}`
      );
    }
  }

  protected transition(next: S, event: string, reason?: string): void {
    this.assertTransition(next, event);
    const previous = this.currentState;
    this.currentState = next;
    if (previous !== next) {
      this.logger.info(`${this.describe()}: ${previous} -> ${next} (${event})`);
      this.onTransition(previous, next, reason);
    }
  }

  /** Runs a network-driven step; an illegal transition is logged and dropped. */
  protected guard(event: string, step: () => void): void {
    try {
      step();
    } catch (error) {
      if (!isSipError(error, SipErrorCode.ILLEGAL_TRANSITION)) throw error;
      this.logger.warn(`Dropped ${event}: ${error.message}`);
    }
  }

  protected abstract describe(): string;

  protected abstract onTransition(previous: S, next: S, reason?: string): void;
}

import { MintError, MintErrorCode } from './errors';

export interface Transactional<S> {
  snapshot(): S;
  restore(snapshot: S): void;
}

export type Participant = Transactional<unknown>;

/**
 * Contract-wide execution scope. One unit runs at a time: entering while
 * another is in flight fails with REENTRANT. Every participant is snapshotted
 * on entry and restored if the work throws.
 */
export class UnitOfWork {
  private participants: Participant[];
  private active: boolean = false;

  constructor(participants: Participant[]) {
    this.participants = participants;
  }

  get inProgress(): boolean {
    return this.active;
  }

  run<T>(work: () => T): T {
    if (this.active) {
      throw new MintError(MintErrorCode.REENTRANT, 'reentrant call rejected');
    }

    this.active = true;
    // Full copies of every participant: each call is O(total state).
    const restorers = this.participants.map((participant) => {
      const snapshot = participant.snapshot();
      return () => participant.restore(snapshot);
    });

    try {
      return work();
    } catch (error) {
      for (let i = restorers.length - 1; i >= 0; i -= 1) {
        restorers[i]();
      }
      throw error;
    } finally {
      this.active = false;
    }
  }
}

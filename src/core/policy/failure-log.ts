/**
 * Ordered record of recoverable failures for one parse.
 */
import type { ArgMatchError, MatchFailure } from '../../utils/errors.js';
import type { FailureSink } from '../match/match.js';

export class FailureLog implements FailureSink {
  private readonly entries: MatchFailure[] = [];

  record(failure: MatchFailure): void {
    this.entries.push(failure);
  }

  get size(): number {
    return this.entries.length;
  }

  all(): MatchFailure[] {
    return [...this.entries];
  }

  /** Failures recorded after the log had `mark` entries. */
  since(mark: number): MatchFailure[] {
    return this.entries.slice(mark);
  }

  forUid(uid: number): MatchFailure[] {
    return this.entries.filter((failure) => failure.uid === uid);
  }

  /**
   * Chain `error` under its most specific proximate cause: the first failure
   * tied to the same uid, else the first recorded since `mark`, else the
   * first failure overall.
   */
  causeOf<E extends ArgMatchError>(error: E, mark?: number): E {
    const uid = error.uid;
    const cause =
      (uid === undefined ? undefined : this.forUid(uid)[0]) ??
      (mark === undefined ? undefined : this.since(mark)[0]) ??
      this.entries[0];

    return cause && cause !== error ? error.causedBy(cause) : error;
  }
}

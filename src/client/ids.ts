/**
 * Monotonic request ids for one client. Kept apart from the exchange lock so
 * taking an id never waits on network I/O.
 */
export class RequestIdSequence {
  private last = 0;

  next(): number {
    this.last += 1;
    return this.last;
  }

  /** Last id handed out, 0 before the first request. */
  get current(): number {
    return this.last;
  }
}

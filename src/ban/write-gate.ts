/**
 * In-process writer lease.
 *
 * better-sqlite3 is synchronous, so two writers can only interleave when one
 * of them holds a transaction open across an `await`. The gate makes every
 * writer wait its turn instead of hitting SQLITE_BUSY on the event loop.
 * Leases are granted in request order.
 */
export class WriteGate {
  private tail: Promise<void> = Promise.resolve();

  /** Resolves with a release function once every earlier lease has been released. */
  acquire(): Promise<() => void> {
    const previous = this.tail;
    let releaseNext: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      releaseNext = resolve;
    });
    this.tail = previous.then(() => next);

    return previous.then(() => {
      let released = false;
      return () => {
        if (released) return;
        released = true;
        releaseNext();
      };
    });
  }
}

/**
 * Serial dispatch queue.
 *
 * A promise-chain mutex: tasks run one at a time in submission order. The
 * executor runs every intent through one queue, which makes the
 * check-then-settle section of the pipeline a single critical section.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Run `task` after every previously queued task has settled. */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  /** Tasks queued or running. */
  get size(): number {
    return this.pending;
  }

  /** Resolves once everything queued so far has settled. */
  drain(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.pending--;
  }
}

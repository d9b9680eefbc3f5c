/**
 * FIFO mutual exclusion over async work. Tasks queue behind each other on a
 * promise chain; a failing task does not poison the ones queued after it.
 */
export class AsyncLock {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    const current = previous.catch(() => undefined).then(task);
    this.tail = current;

    return current.finally(() => {
      if (this.tail === current) {
        this.tail = Promise.resolve();
      }
    });
  }
}

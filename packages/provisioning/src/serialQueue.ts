/**
 * FIFO task runner: each task starts only after the previous one settled, and
 * a rejected task does not hold up the ones behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  public get size() {
    return this.pending;
  }

  public run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  public async drain(): Promise<void> {
    await this.tail;
  }
}

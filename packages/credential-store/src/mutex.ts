/** serialises async critical sections in the order they were requested */
export class AsyncMutex {
  #tail: Promise<void> = Promise.resolve();

  /**
   * runs a task once every previously queued task has settled
   * @param task critical section
   * @returns the task's result
   */
  public async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.#tail;
    let release: () => void = () => undefined;
    this.#tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;

      return await task();
    } finally {
      release();
    }
  }
}

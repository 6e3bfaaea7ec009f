/**
 * SerialQueue - Promise-chain-based FIFO runner
 *
 * Runs async tasks strictly one at a time, in the order they were submitted,
 * and hands each caller its own task's result.
 */

export class SerialQueue {
  private chain: Promise<void> = Promise.resolve();
  private pending = 0;
  private running = false;

  /**
   * Run a task after every previously submitted task has settled.
   * A rejected task does not stop the ones queued behind it.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;

    const result = this.chain.then(async () => {
      this.running = true;
      try {
        return await task();
      } finally {
        this.running = false;
        this.pending--;
      }
    });

    // Keep the chain alive past failures; the caller observes `result`.
    this.chain = result.then(
      () => undefined,
      () => undefined
    );

    return result;
  }

  /**
   * Returns the number of tasks waiting or running
   */
  size(): number {
    return this.pending;
  }

  /**
   * Returns true while a task is executing
   */
  isProcessing(): boolean {
    return this.running;
  }
}

// ═══════════════════════════════════════════════════════════════
// Scentify — Serial Queue
// apps/recommender/src/storage/serialQueue.ts
// ═══════════════════════════════════════════════════════════════

/**
 * Runs async tasks one at a time, in call order. A rejected task
 * rejects only its own caller; later tasks still run.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.catch(() => undefined);
    return result;
  }
}

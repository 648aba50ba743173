// apps/client/src/app/cache/asyncLock.ts

/**
 * Single critical section: tasks run one at a time in call order.
 * A failing task rejects its own caller only; the chain continues.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

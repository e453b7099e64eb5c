/**
 * Runs tasks one at a time, in call order.
 *
 * A sync is a read-deliver-write cycle on the watermark, so overlapping runs
 * would each deliver the same highlights and race on the save. A task that
 * fails does not block the ones queued after it.
 */
export class RunQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

/**
 * Runs tasks one at a time in submission order. A rejected task does not stall the queue;
 * its caller observes the rejection through the promise returned by `run`.
 */
export class SerialGate {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

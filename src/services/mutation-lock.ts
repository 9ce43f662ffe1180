/**
 * Serializes async critical sections.
 *
 * Tasks run one at a time in submission order. A failing task rejects its
 * own promise only; the next task still runs.
 */
export class MutationLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The caller observes the rejection through `result`; the chain only
    // needs to know the task settled.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

/**
 * Single-writer lock
 *
 * Serializes async critical sections within this process. Each section
 * starts after the previous one settles, whether it resolved or rejected.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(section: () => Promise<T>): Promise<T> {
    const result = this.tail.then(section);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * Holder for the transport's current Bearer credential.
 * @module auth/credential-slot
 */

/**
 * A single current value shared by concurrent requests. Reads never wait;
 * writes are chained so that installs land one at a time, in call order.
 * The chain covers the assignment only, never the network call that
 * produced the value.
 */
export class CredentialSlot<T> {
  private current: T | undefined;
  private writes: Promise<void> = Promise.resolve();
  private generation = 0;

  /**
   * Returns the current value, or undefined before the first install.
   */
  get(): T | undefined {
    return this.current;
  }

  /**
   * Number of installs so far.
   */
  getGeneration(): number {
    return this.generation;
  }

  /**
   * Replaces the current value once every earlier write has landed.
   */
  replace(value: T): Promise<void> {
    const write = this.writes.then(() => {
      this.current = value;
      this.generation += 1;
    });
    this.writes = write;
    return write;
  }
}

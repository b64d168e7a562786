/**
 * Per-session turn serialization
 *
 * Turns for the same session id run one after another in arrival order;
 * turns for different ids do not wait for each other.
 */

export class SessionLocks {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result.then(
      () => this.release(sessionId, tail),
      () => this.release(sessionId, tail),
    );
    this.tails.set(sessionId, tail);
    return result;
  }

  private release(sessionId: string, tail: Promise<void>): void {
    if (this.tails.get(sessionId) === tail) {
      this.tails.delete(sessionId);
    }
  }
}

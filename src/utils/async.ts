/**
 * Timeout guard for store calls, and an in-process lock that serializes
 * async critical sections (one queue per owner).
 */

export class StoreTimeoutError extends Error {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "StoreTimeoutError";
  }
}

export function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new StoreTimeoutError(operation, timeoutMs));
    }, timeoutMs);

    fn()
      .then(result => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch(err => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Run `fn` after every previously queued section has settled. */
  run<T>(fn: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => { this.pending--; },
      () => { this.pending--; },
    );
    return result;
  }

  get queued(): number {
    return this.pending;
  }
}

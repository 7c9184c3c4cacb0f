// Promise and timer helpers for flowline

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

/**
 * Create a promise together with its settle functions
 */
export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Race a promise against a timeout. The timer is cleared as soon as either
 * side settles, so nothing is left scheduled.
 * @param promise - Promise to race
 * @param timeoutMs - Timeout in milliseconds
 * @param onTimeout - Builds the rejection error
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error = () => new Error("Timeout"),
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    void promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

/**
 * Tracks elapsed wall-clock time
 */
export class Timer {
  private startTime?: number;
  private endTime?: number;

  start(): void {
    this.startTime = Date.now();
    this.endTime = undefined;
  }

  stop(): void {
    if (this.startTime === undefined) return;
    this.endTime = Date.now();
  }

  /**
   * Get elapsed time in milliseconds
   */
  elapsed(): number {
    if (this.startTime === undefined) return 0;
    return (this.endTime ?? Date.now()) - this.startTime;
  }
}

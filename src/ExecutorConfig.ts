import { Logger, rootLogger } from './Logger';

/** Configuration options for the executors */
export class ExecutorConfig {
  /** Opaque string to identify the executor in log lines and error messages */
  public executorName = 'Executor';

  /**
   * Number of worker loops a `PooledExecutor` runs. This is also the maximum number of async tasks in flight at
   * once. Must be a positive integer.
   */
  public maxWorkers = 4;

  /**
   * Parent logger. Executors log through a child of it bound to the executor name. Tests usually pass a logger
   * created with level `silent`.
   */
  public logger: Logger = rootLogger;
}

/**
 * Normalizes a timeout argument. A negative timeout means "don't wait" and an infinite one means "wait forever".
 * @param timeoutMs Timeout, in milliseconds
 * @returns The timeout, no lower than 0
 */
export function normalizeTimeout(timeoutMs: number): number {
  if (Number.isNaN(timeoutMs)) {
    throw new RangeError('Timeout must be a number of milliseconds, got NaN');
  }
  return Math.max(timeoutMs, 0);
}

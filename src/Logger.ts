import pino, { Logger } from 'pino';

export type { Logger };

/**
 * Library-wide root logger. Level comes from `LOG_LEVEL`, defaulting to info. Plain JSON output: a pretty-printing
 * transport would start a worker thread inside whatever process embeds the executors.
 */
export const rootLogger: Logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: null
});

/**
 * Creates the logger an executor writes through
 * @param executorName Opaque string identifying the executor in log lines
 * @param parent Logger to derive from
 */
export function createExecutorLogger(executorName: string, parent: Logger = rootLogger): Logger {
  return parent.child({ executor: executorName });
}

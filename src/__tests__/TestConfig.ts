import pino from 'pino';
import { ExecutorConfig } from '../ExecutorConfig';

/** Executor configuration for unit tests. Logging is silenced so expected task failures don't clutter the output. */
export function createTestConfig(executorName: string, maxWorkers = 4): ExecutorConfig {
  const config = new ExecutorConfig();
  config.executorName = executorName;
  config.maxWorkers = maxWorkers;
  config.logger = pino({ level: 'silent' });
  return config;
}

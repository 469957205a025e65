export { AsyncAutoResetEvent, AsyncEventWaitHandle, AsyncManualResetEvent, AsyncTimerEvent } from './coordination';
export { CounterService } from './CounterService';
export { ExecutorConfig } from './ExecutorConfig';
export { ExecutorError, RejectedExecutionError } from './ExecutorError';
export { ExecutorState } from './ITaskExecutor';
export type { AsyncTask, ITaskExecutor, Task } from './ITaskExecutor';
export { createExecutorLogger, rootLogger } from './Logger';
export type { Logger } from './Logger';
export { PooledExecutor } from './PooledExecutor';
export { Queue } from './Queue';
export { SynchronousExecutor } from './SynchronousExecutor';
export { TaskHandle, TaskStatus } from './TaskHandle';

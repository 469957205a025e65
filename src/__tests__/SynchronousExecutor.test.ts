import { RejectedExecutionError } from '../ExecutorError';
import { ExecutorState } from '../ITaskExecutor';
import { SynchronousExecutor } from '../SynchronousExecutor';
import { TaskStatus } from '../TaskHandle';
import { createTestConfig } from './TestConfig';

describe('SynchronousExecutor', () => {

  let executor: SynchronousExecutor;

  beforeEach(() => {
    executor = new SynchronousExecutor(createTestConfig('SyncExecutor'));
  });

  it('Runs the task before submit returns', () => {
    let ran = false;
    const handle = executor.submit(() => {
      ran = true;
    });

    expect(ran).toBeTruthy();
    expect(handle.getStatus()).toEqual(TaskStatus.Completed);
    expect(handle.isDone()).toBeTruthy();
  });

  it('Numbers tasks in submission order', () => {
    const first = executor.submit(() => undefined);
    const second = executor.submit(() => undefined);
    expect(first.taskNumber).toEqual(0);
    expect(second.taskNumber).toEqual(1);
  });

  it('Resolves waitAsync on a completed handle', async () => {
    const handle = executor.submit(() => undefined);
    await expect(handle.waitAsync()).resolves.toBeUndefined();
  });

  it('Propagates a task error to the caller of submit', () => {
    expect(() => executor.submit(() => {
      throw new Error('boom');
    })).toThrow('boom');

    // The executor keeps accepting work
    expect(executor.getState()).toEqual(ExecutorState.Running);
    let ran = false;
    executor.submit(() => {
      ran = true;
    });
    expect(ran).toBeTruthy();
  });

  it('Runs nested submits inline', () => {
    const order: string[] = [];
    executor.submit(() => {
      order.push('outer start');
      executor.submit(() => {
        order.push('inner');
      });
      order.push('outer end');
    });

    expect(order).toEqual(['outer start', 'inner', 'outer end']);
  });

  it('Starts in the Running state', () => {
    expect(executor.getState()).toEqual(ExecutorState.Running);
    expect(executor.isShutdown()).toBeFalsy();
    expect(executor.isTerminated()).toBeFalsy();
  });

  it('Terminates as soon as it is shut down', () => {
    executor.shutdown();
    expect(executor.isShutdown()).toBeTruthy();
    expect(executor.isTerminated()).toBeTruthy();
    expect(executor.getState()).toEqual(ExecutorState.Terminated);
  });

  it('Ignores repeated shutdown calls', () => {
    executor.shutdown();
    executor.shutdown();
    expect(executor.isShutdown()).toBeTruthy();
    expect(executor.isTerminated()).toBeTruthy();
  });

  it('Rejects tasks after shutdown without running them', () => {
    executor.shutdown();

    let ran = false;
    expect(() => executor.submit(() => {
      ran = true;
    })).toThrow(RejectedExecutionError);
    expect(ran).toBeFalsy();

    // Still shut down after the rejection
    expect(executor.isShutdown()).toBeTruthy();
  });

  it('Names the executor in the rejection', () => {
    executor.shutdown();

    let error: unknown;
    try {
      executor.submit(() => undefined);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(RejectedExecutionError);
    expect(error).toMatchObject({
      name: 'RejectedExecutionError',
      executorName: 'SyncExecutor',
      message: 'SyncExecutor is shut down and no longer accepts tasks'
    });
  });

  it('Finishes terminating once a task that called shutdown returns', () => {
    let stateInsideTask = ExecutorState.Running;
    executor.submit(() => {
      executor.shutdown();
      stateInsideTask = executor.getState();
    });

    expect(stateInsideTask).toEqual(ExecutorState.ShuttingDown);
    expect(executor.isTerminated()).toBeTruthy();
  });

  it('Rejects submits made by a task after it shut the executor down', () => {
    let rejected = false;
    executor.submit(() => {
      executor.shutdown();
      try {
        executor.submit(() => undefined);
      } catch (err) {
        rejected = err instanceof RejectedExecutionError;
      }
    });

    expect(rejected).toBeTruthy();
  });

  it('Answers awaitTermination without waiting', async () => {
    await expect(executor.awaitTermination(1000)).resolves.toBeFalsy();
    executor.shutdown();
    await expect(executor.awaitTermination(1000)).resolves.toBeTruthy();
  });

  it('Treats a negative timeout as zero', async () => {
    executor.shutdown();
    await expect(executor.awaitTermination(-5)).resolves.toBeTruthy();
  });

  it('Rejects a timeout that is not a number', async () => {
    await expect(executor.awaitTermination(NaN)).rejects.toThrow(RangeError);
  });

});

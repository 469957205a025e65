import { AsyncEventWaitHandle } from './AsyncEventWaitHandle';

/**
 * Async version of .NET's System.Threading.AutoResetEvent. Each `set()` releases exactly one waiter.
 */
export class AsyncAutoResetEvent extends AsyncEventWaitHandle {
  public constructor(initialState = false) {
    super(true, initialState);
  }
}

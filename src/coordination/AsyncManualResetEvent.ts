import { AsyncEventWaitHandle } from './AsyncEventWaitHandle';

/**
 * Async version of .NET's System.Threading.ManualResetEvent. Once set, every current and future waiter is released.
 */
export class AsyncManualResetEvent extends AsyncEventWaitHandle {
  public constructor(initialState = false) {
    super(false, initialState);
  }
}

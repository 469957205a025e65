/**
 * Async version of .NET's System.Threading.EventWaitHandle
 *
 * Waiters are released from a timer callback rather than inline, so code calling `set()` never runs a waiter's
 * continuation before `set()` returns.
 */
export abstract class AsyncEventWaitHandle {
  protected constructor(autoReset: boolean, initialState: boolean) {
    this._autoReset = autoReset;
    this._isSet = initialState;
    this._waiters = [];
  }

  public getIsSet(): boolean {
    return this._isSet;
  }

  public set(): void {
    let waiter = this._waiters.shift();
    while (waiter) {
      // For auto-reset, stop after the first waiter is released. For manual-reset, release all of them.
      if (waiter.trySetComplete() && this._autoReset) {
        return;
      }
      waiter = this._waiters.shift();
    }

    this._isSet = true;
  }

  /** Number of callers parked on this event */
  public getWaiterCount(): number {
    return this._waiters.length;
  }

  /**
   * Consumes the signal if the event is set. Otherwise registers the waiter, if one is given.
   * @returns A resolved promise if the event was set, or undefined if the caller must keep waiting
   */
  private _waitInternal(waiter?: Waiter): Promise<void> | undefined {
    if (this._isSet) {
      if (this._autoReset) {
        this._isSet = false;
      }

      if (waiter) {
        waiter.trySetComplete();
        return waiter.getPromise();
      }
      return Promise.resolve();
    }

    if (waiter) {
      this._waiters.push(waiter);
    }
    return undefined;
  }

  public waitAsync(): Promise<void> {
    const promise = this._waitInternal();
    if (promise) {
      return promise;
    }

    const waiter = new Waiter();
    this._waiters.push(waiter);
    return waiter.getPromise();
  }

  private _removeWaiter(waiter: Waiter): void {
    const index = this._waiters.indexOf(waiter);
    if (index >= 0) {
      this._waiters.splice(index, 1);
    }
  }

  /**
   * Waits until any one of the events is set. For auto-reset events, only the event that releases the caller is
   * reset. Once released, the caller is no longer parked on any of the other events.
   */
  public static whenAny(events: AsyncEventWaitHandle[]): Promise<void> {
    // Quick pass before allocating a waiter, in case one of the events is already set
    for (const e of events) {
      const promise = e._waitInternal();
      if (promise) {
        return promise;
      }
    }

    const waiter = new Waiter();
    for (const e of events) {
      if (e._waitInternal(waiter)) {
        break;
      }
    }

    return waiter.getPromise().then(() => {
      for (const e of events) {
        e._removeWaiter(waiter);
      }
    });
  }

  private readonly _autoReset: boolean;
  private _isSet: boolean;
  private readonly _waiters: Waiter[];
}

/**
 * Wraps a Promise waiting on one or more AsyncEventWaitHandles. A waiter completes only once, so the same waiter may
 * sit in several events' lists (see `whenAny`).
 */
class Waiter {
  public constructor() {
    this._isComplete = false;
    this._promise = new Promise<void>(resolve => {
      this._resolve = resolve;
    });
  }

  public getPromise(): Promise<void> {
    return this._promise;
  }

  public trySetComplete(): boolean {
    if (this._isComplete) {
      return false;
    }

    this._isComplete = true;
    setTimeout(() => this._resolve());
    return true;
  }

  private _isComplete: boolean;
  private _resolve: (value?: void) => void = () => undefined;
  private readonly _promise: Promise<void>;
}

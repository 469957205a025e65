import { AsyncEventWaitHandle } from './AsyncEventWaitHandle';

/** Longest delay setTimeout honours. Anything above it fires after 1 ms. */
const MAX_TIMER_DELAY = 2147483647;

/**
 * Timer that behaves like an EventWaitHandle. Useful for bounding a wait with `AsyncEventWaitHandle.whenAny()`.
 *
 * Delays longer than setTimeout supports are covered by re-arming the timer until the deadline passes. An infinite
 * delay never fires.
 */
export class AsyncTimerEvent extends AsyncEventWaitHandle {
  public constructor(millisecondsDelay: number) {
    super(false, false);
    this._deadline = Date.now() + millisecondsDelay;
    this._arm(millisecondsDelay);
  }

  /**
   * Clears the pending timer. The event will never be set, and nothing is left scheduled on the event loop.
   */
  public cancel(): void {
    clearTimeout(this._timer);
  }

  private _arm(remaining: number): void {
    this._timer = setTimeout(() => this._onTimer(), Math.min(remaining, MAX_TIMER_DELAY));
  }

  private _onTimer(): void {
    const remaining = this._deadline - Date.now();
    if (remaining > 0) {
      this._arm(remaining);
    } else {
      this.set();
    }
  }

  private readonly _deadline: number;
  private _timer: ReturnType<typeof setTimeout> | undefined;

  /**
   * Resolves after the specified number of milliseconds
   * @param millisecondsDelay Number of milliseconds to delay
   */
  public static delay(millisecondsDelay: number): Promise<void> {
    const event = new AsyncTimerEvent(millisecondsDelay);
    return event.waitAsync();
  }
}

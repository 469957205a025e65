/**
 * FIFO queue. Dequeued slots are reclaimed in bulk, so `dequeue()` does not shift the backing array on every call.
 */
export class Queue<T> {
  public enqueue(value: T): void {
    this._values.push(value);
  }

  public dequeue(): T | undefined {
    if (this._head >= this._values.length) {
      return undefined;
    }

    const value = this._values[this._head++];

    // Compact once the consumed prefix is at least half of the array
    if (this._head * 2 >= this._values.length) {
      this._values = this._values.slice(this._head);
      this._head = 0;
    }

    return value;
  }

  public getCount(): number {
    return this._values.length - this._head;
  }

  private _values: T[] = [];
  private _head = 0;
}

/**
 * Hand-off point between asynchronous producers and the task that owns the
 * state. Producers post; the owner drains at its own pace.
 */
export class Mailbox<T> {
  private items: T[] = [];
  private closed = false;

  post(item: T): boolean {
    if (this.closed) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  /** Most recent item, discarding everything older. */
  takeLatest(): T | undefined {
    const drained = this.drain();
    return drained[drained.length - 1];
  }

  close(): void {
    this.closed = true;
    this.items = [];
  }

  reopen(): void {
    this.closed = false;
  }
}

export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Array<(v: T | null) => void> = [];
  private closed = false;

  push(v: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter(v);
    else this.items.push(v);
  }

  /** Next item, or `null` once the queue is closed and drained. */
  async pop(): Promise<T | null> {
    const item = this.items.shift();
    if (item !== undefined) return item;
    if (this.closed) return null;
    return new Promise<T | null>((resolve) => this.waiters.push(resolve));
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(null);
  }

  size(): number {
    return this.items.length;
  }
}

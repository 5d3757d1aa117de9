/**
 * Unbounded FIFO between dispatch tasks and the coordinator. send() never
 * waits; receive() waits until a value is available.
 */
export class CompletionChannel<T> {
  private buffer: T[] = [];
  // Index of the oldest unread value in buffer
  private head = 0;
  private waiters: Array<(value: T) => void> = [];

  send(value: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
      return;
    }
    this.buffer.push(value);
  }

  receive(): Promise<T> {
    if (this.head < this.buffer.length) {
      const next = this.buffer[this.head++];
      if (this.head === this.buffer.length) {
        this.buffer = [];
        this.head = 0;
      }
      return Promise.resolve(next);
    }
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  get buffered(): number {
    return this.buffer.length - this.head;
  }
}

type Waiter<T> = (value: T) => void;

/**
 * In-memory FIFO with a fixed capacity. `put` suspends while the queue is full,
 * `take` suspends while it is empty.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Array<Waiter<T>> = [];
  private readonly putters: Array<{ value: T; resume: () => void }> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error("capacity must be an integer >= 1");
    }
  }

  size(): number {
    return this.items.length;
  }

  async put(value: T): Promise<void> {
    const taker = this.takers.shift();
    if (taker) {
      taker(value);
      return;
    }

    if (this.items.length < this.capacity) {
      this.items.push(value);
      return;
    }

    await new Promise<void>((resume) => {
      this.putters.push({ value, resume });
    });
  }

  async take(): Promise<T> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      this.admitWaitingPutter();
      return value;
    }

    const blocked = this.putters.shift();
    if (blocked) {
      blocked.resume();
      return blocked.value;
    }

    return new Promise<T>((resolve) => {
      this.takers.push(resolve);
    });
  }

  private admitWaitingPutter(): void {
    const blocked = this.putters.shift();
    if (!blocked) return;
    this.items.push(blocked.value);
    blocked.resume();
  }
}

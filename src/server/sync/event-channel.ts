/**
 * Event Channel
 *
 * Bounded in-process channel. Every subscriber gets its own queue; publish()
 * waits while any subscriber's queue is full, so a slow consumer applies
 * backpressure to the producer. With no subscribers, events are dropped.
 */

export type SyncEvent =
  | {
      type: 'transaction.upserted';
      transactionId: string;
      connectionId: string;
      companyId: string;
      isNew: boolean;
    }
  | {
      type: 'balance.changed';
      connectionId: string;
      companyId: string;
      previousMinor: number;
      currentMinor: number;
      currency: string;
    };

export class Subscription<T> implements AsyncIterable<T> {
  private readonly queue: T[] = [];
  private readonly receivers: ((value: T | undefined) => void)[] = [];
  private readonly senders: (() => void)[] = [];
  private closed = false;

  constructor(
    private readonly capacity: number,
    private readonly onClose: (subscription: Subscription<T>) => void
  ) {}

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async push(value: T): Promise<void> {
    while (!this.closed && this.queue.length >= this.capacity) {
      await new Promise<void>(resolve => this.senders.push(resolve));
    }
    if (this.closed) return;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
    } else {
      this.queue.push(value);
    }
  }

  /**
   * Next value, or undefined once the subscription is closed and drained.
   */
  receive(): Promise<T | undefined> {
    if (this.queue.length > 0) {
      const value = this.queue.shift();
      this.senders.shift()?.();
      return Promise.resolve(value);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise(resolve => this.receivers.push(resolve));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) receiver(undefined);
    for (const sender of this.senders.splice(0)) sender();
    this.onClose(this);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const value = await this.receive();
      if (value === undefined) return;
      yield value;
    }
  }
}

export class EventChannel<T> {
  private readonly subscriptions = new Set<Subscription<T>>();

  constructor(private readonly capacity: number) {
    if (capacity < 1) {
      throw new Error('Channel capacity must be at least 1');
    }
  }

  subscribe(): Subscription<T> {
    const subscription = new Subscription<T>(this.capacity, s => this.subscriptions.delete(s));
    this.subscriptions.add(subscription);
    return subscription;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  async publish(event: T): Promise<void> {
    for (const subscription of [...this.subscriptions]) {
      await subscription.push(event);
    }
  }

  close(): void {
    for (const subscription of [...this.subscriptions]) {
      subscription.close();
    }
  }
}

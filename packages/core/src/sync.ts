/** Serialises async work per key; different keys run concurrently. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  public async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

/** Caps how many tasks run at once; callers past the limit wait in arrival order. */
export class Semaphore {
  private readonly permits: number;
  private running = 0;
  private readonly waiting: Array<() => void> = [];

  public constructor(permits: number) {
    if (!Number.isInteger(permits) || permits <= 0) {
      throw new Error("Semaphore permits must be a positive integer");
    }
    this.permits = permits;
  }

  public get active(): number {
    return this.running;
  }

  public async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.running >= this.permits) {
      await new Promise<void>((resolve) => {
        this.waiting.push(resolve);
      });
    } else {
      this.running += 1;
    }
    try {
      return await task();
    } finally {
      const next = this.waiting.shift();
      if (next) {
        next();
      } else {
        this.running -= 1;
      }
    }
  }
}

export class ChannelClosedError extends Error {
  public constructor() {
    super("Channel is closed");
    this.name = "ChannelClosedError";
  }
}

/**
 * FIFO channel with a fixed capacity. `send` waits while the buffer is full,
 * `receive` waits while it is empty and resolves null once closed and drained.
 */
export class BoundedChannel<T> {
  private readonly capacity: number;
  private readonly buffer: T[] = [];
  private readonly receivers: Array<(value: T | null) => void> = [];
  private readonly senders: Array<{ item: T; resolve: () => void; reject: (error: Error) => void }> = [];
  private closed = false;

  public constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error("Channel capacity must be a positive integer");
    }
    this.capacity = capacity;
  }

  public get size(): number {
    return this.buffer.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public send(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return Promise.resolve();
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.senders.push({ item, resolve, reject });
    });
  }

  public receive(): Promise<T | null> {
    if (this.buffer.length > 0) {
      const item = this.buffer.shift();
      const waiting = this.senders.shift();
      if (waiting) {
        this.buffer.push(waiting.item);
        waiting.resolve();
      }
      return Promise.resolve(item === undefined ? null : item);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise<T | null>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver(null);
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }

  public async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    while (true) {
      const item = await this.receive();
      if (item === null) {
        return;
      }
      yield item;
    }
  }
}

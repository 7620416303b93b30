type LockMode = "read" | "write";

type Waiter = {
  mode: LockMode;
  resolve: () => void;
};

// FIFO reader/writer lock. A queued writer blocks readers that arrive after it.
export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly queue: Waiter[] = [];

  async read<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire("read");
    try {
      return await fn();
    } finally {
      this.release("read");
    }
  }

  async write<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire("write");
    try {
      return await fn();
    } finally {
      this.release("write");
    }
  }

  get readers() {
    return this.activeReaders;
  }

  get writing() {
    return this.writerActive;
  }

  get pending() {
    return this.queue.length;
  }

  private acquire(mode: LockMode) {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.grant(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ mode, resolve });
    });
  }

  private canGrant(mode: LockMode) {
    if (mode === "read") return !this.writerActive;
    return !this.writerActive && this.activeReaders === 0;
  }

  private grant(mode: LockMode) {
    if (mode === "read") {
      this.activeReaders += 1;
    } else {
      this.writerActive = true;
    }
  }

  private release(mode: LockMode) {
    if (mode === "read") {
      this.activeReaders = Math.max(0, this.activeReaders - 1);
    } else {
      this.writerActive = false;
    }
    this.drain();
  }

  private drain() {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!next || !this.canGrant(next.mode)) return;
      this.queue.shift();
      this.grant(next.mode);
      next.resolve();
      if (next.mode === "write") return;
    }
  }
}

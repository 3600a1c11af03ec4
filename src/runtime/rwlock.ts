/**
 * Writer-preferring read/write lock for in-process async code.
 *
 * Any number of readers may hold the lock at once; a writer holds it alone.
 * Once a writer is waiting, new readers queue behind it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private waitingWriters: (() => void)[] = [];
  private waitingReaders: (() => void)[] = [];

  async read<T>(fn: () => T): Promise<T> {
    await this.acquireRead();
    try {
      return fn();
    } finally {
      this.releaseRead();
    }
  }

  async write<T>(fn: () => T): Promise<T> {
    await this.acquireWrite();
    try {
      return fn();
    } finally {
      this.releaseWrite();
    }
  }

  private acquireRead(): Promise<void> {
    if (!this.writer && this.waitingWriters.length === 0) {
      this.readers++;
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.waitingReaders.push(() => {
        this.readers++;
        resolve();
      });
    });
  }

  private acquireWrite(): Promise<void> {
    if (!this.writer && this.readers === 0) {
      this.writer = true;
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.waitingWriters.push(() => {
        this.writer = true;
        resolve();
      });
    });
  }

  private releaseRead(): void {
    this.readers--;
    if (this.readers === 0) this.wake();
  }

  private releaseWrite(): void {
    this.writer = false;
    this.wake();
  }

  private wake(): void {
    const nextWriter = this.waitingWriters.shift();
    if (nextWriter) {
      nextWriter();
      return;
    }
    const readers = this.waitingReaders;
    this.waitingReaders = [];
    for (const grant of readers) grant();
  }
}

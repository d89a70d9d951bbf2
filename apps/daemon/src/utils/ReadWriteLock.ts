/**
 * FIFO-fair reader/writer lock for async sections.
 *
 * Readers share the lock, a writer holds it alone. Requests are granted in
 * arrival order, so a waiting writer is not starved by later readers.
 */

export type Release = () => void;

interface Waiter {
  readonly kind: 'read' | 'write';
  readonly grant: () => void;
}

export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];

  acquireRead(): Promise<Release> {
    return new Promise(resolve => {
      this.queue.push({ kind: 'read', grant: () => resolve(this.releaser('read')) });
      this.drain();
    });
  }

  acquireWrite(): Promise<Release> {
    return new Promise(resolve => {
      this.queue.push({ kind: 'write', grant: () => resolve(this.releaser('write')) });
      this.drain();
    });
  }

  async withRead<T>(section: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await section();
    } finally {
      release();
    }
  }

  async withWrite<T>(section: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await section();
    } finally {
      release();
    }
  }

  private releaser(kind: 'read' | 'write'): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      if (kind === 'read') {
        this.readers--;
      } else {
        this.writer = false;
      }
      this.drain();
    };
  }

  private drain(): void {
    while (this.queue.length > 0 && !this.writer) {
      const head = this.queue[0];
      if (head.kind === 'read') {
        this.readers++;
      } else if (this.readers === 0) {
        this.writer = true;
      } else {
        return;
      }
      this.queue.shift();
      head.grant();
    }
  }
}

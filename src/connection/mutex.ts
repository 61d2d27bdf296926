// src/connection/mutex.ts
// Non-reentrant async mutex. Acquiring hands out a lease; code that needs the
// lock held (but must not take it again) asks for the lease as a parameter.

export interface MutexLease {
  release(): void;
}

export class Mutex {
  private current: MutexLease | null = null;
  private waiters: Array<(lease: MutexLease) => void> = [];

  acquire(): Promise<MutexLease> {
    if (!this.current) {
      this.current = this.createLease();
      return Promise.resolve(this.current);
    }
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  async runExclusive<T>(fn: (lease: MutexLease) => Promise<T> | T): Promise<T> {
    const lease = await this.acquire();
    try {
      return await fn(lease);
    } finally {
      lease.release();
    }
  }

  isLocked(): boolean {
    return this.current !== null;
  }

  holds(lease: MutexLease): boolean {
    return this.current === lease;
  }

  /** Throws when `lease` is not the one currently holding the lock */
  assertHeld(lease: MutexLease): void {
    if (!this.holds(lease)) {
      throw new Error('Mutex lease is not held');
    }
  }

  get pending(): number {
    return this.waiters.length;
  }

  private createLease(): MutexLease {
    let released = false;
    const lease: MutexLease = {
      release: () => {
        if (released) return;
        released = true;
        this.handOff(lease);
      },
    };
    return lease;
  }

  private handOff(from: MutexLease): void {
    if (this.current !== from) return;
    const next = this.waiters.shift();
    if (next) {
      this.current = this.createLease();
      next(this.current);
    } else {
      this.current = null;
    }
  }
}

/** Returns the slot to the gate. Calling it more than once is a no-op. */
export type Release = () => void;

interface Waiter {
  readonly grant: (release: Release) => void;
  readonly signal: AbortSignal | undefined;
  readonly onAbort: () => void;
}

/**
 * Counting gate that bounds how many handlers run at once.
 *
 * Callers beyond `capacity` queue in FIFO order; a freed slot is handed
 * directly to the oldest waiter so late arrivals cannot overtake it.
 */
export class AdmissionGate {
  private readonly capacity: number;
  private running = 0;
  private readonly queue: Waiter[] = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Admission capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Waits for a free slot.
   *
   * Resolves to `null` instead of a release function when `signal`
   * aborts before the slot is granted; the waiter leaves the queue.
   */
  acquire(signal?: AbortSignal): Promise<Release | null> {
    if (signal?.aborted) return Promise.resolve(null);

    if (this.running < this.capacity) {
      this.running++;
      return Promise.resolve(this.releaser());
    }

    return new Promise<Release | null>((resolve) => {
      const waiter: Waiter = {
        signal,
        grant: (release) => resolve(release),
        onAbort: () => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) this.queue.splice(index, 1);
          resolve(null);
        },
      };
      signal?.addEventListener('abort', waiter.onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  /** Slots currently held. */
  get active(): number {
    return this.running;
  }

  /** Callers queued for a slot. */
  get waiting(): number {
    return this.queue.length;
  }

  get limit(): number {
    return this.capacity;
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  private handOff(): void {
    const next = this.queue.shift();
    if (next === undefined) {
      this.running--;
      return;
    }
    next.signal?.removeEventListener('abort', next.onAbort);
    next.grant(this.releaser());
  }
}

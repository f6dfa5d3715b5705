export type Job = () => Promise<void>;

/**
 * Fixed-size pool: at most `size` jobs run at once, the rest wait FIFO.
 * A job starts on a later turn of the event loop, never inside `submit`.
 * The queue is bounded by `size` as well; callers are expected to apply
 * admission control before submitting.
 */
export class WorkerPool {
  readonly size: number;
  private active = 0;
  private closed = false;
  private readonly queue: Job[] = [];
  private idleWaiters: Array<() => void> = [];
  private readonly onError: (err: unknown) => void;

  constructor(size: number, onError: (err: unknown) => void) {
    if (!Number.isInteger(size) || size < 1) throw new Error(`Pool size must be a positive integer, got ${size}`);
    this.size = size;
    this.onError = onError;
  }

  submit(job: Job) {
    if (this.closed) throw new Error("Worker pool is closed");
    if (this.active < this.size) {
      this.start(job);
      return;
    }
    if (this.queue.length >= this.size) {
      throw new Error(`Worker pool queue full (${this.size} waiting)`);
    }
    this.queue.push(job);
  }

  get pending(): number {
    return this.queue.length;
  }

  get running(): number {
    return this.active;
  }

  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  close() {
    this.closed = true;
  }

  private start(job: Job) {
    this.active++;
    setImmediate(() => {
      let run: Promise<void>;
      try {
        run = job();
      } catch (e) {
        run = Promise.reject(e);
      }
      void run.catch(this.onError).finally(() => this.release());
    });
  }

  private release() {
    this.active--;
    const next = this.queue.shift();
    if (next) {
      this.start(next);
      return;
    }
    if (this.active === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((w) => w());
    }
  }
}

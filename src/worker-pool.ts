/**
 * Bounded worker pool over async task handlers.
 *
 * A run owns an explicit task queue, a fixed set of worker loops pulling from it, and a
 * completion {@link Channel} the workers push results into. The caller is the only
 * consumer of the channel, so completion counting needs no further locking. There is no
 * module-level pool: each dispatcher owns its own instance.
 */

/** Unbounded single-consumer async queue. Iteration ends once closed and drained. */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: ((r: IteratorResult<T, undefined>) => void)[] = [];
  private closed = false;

  public push(value: T): void {
    if (this.closed) throw new Error("Channel is closed");
    const waiter = this.waiters.shift();
    if (waiter) waiter({ value, done: false });
    else this.buffer.push(value);
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter({ value: undefined, done: true });
  }

  public next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  public [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}

export type PoolResult<TTask, TResult> =
  | { readonly status: "done"; readonly task: TTask; readonly value: TResult }
  | { readonly status: "failed"; readonly task: TTask; readonly error: unknown }
  | { readonly status: "cancelled"; readonly task: TTask };

export type TaskHandler<TTask, TResult> = (task: TTask, signal: AbortSignal) => Promise<TResult>;

export interface PoolRun<TTask, TResult> {
  /** One entry per submitted task, in completion order. */
  readonly results: Channel<PoolResult<TTask, TResult>>;
  /** Settles after every worker exited and the channel is closed. Never rejects. */
  readonly done: Promise<void>;
}

export class WorkerPool<TTask, TResult> {
  private readonly size: number;
  private readonly handler: TaskHandler<TTask, TResult>;

  public constructor(size: number, handler: TaskHandler<TTask, TResult>) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.handler = handler;
  }

  /**
   * Submit every task at once. At most `size` handlers run concurrently. After `signal`
   * aborts, workers stop taking tasks and whatever is still queued is reported cancelled.
   */
  public run(tasks: readonly TTask[], signal?: AbortSignal): PoolRun<TTask, TResult> {
    const results = new Channel<PoolResult<TTask, TResult>>();
    const queue = [...tasks];
    const sig = signal ?? new AbortController().signal;

    const worker = async () => {
      while (queue.length > 0 && !sig.aborted) {
        const task = queue.shift();
        if (task === undefined) break;
        try {
          const value = await this.handler(task, sig);
          results.push({ status: "done", task, value });
        } catch (error) {
          results.push(
            sig.aborted ? { status: "cancelled", task } : { status: "failed", task, error },
          );
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.size, queue.length) }, () => worker());
    const done = Promise.all(workers).then(() => {
      for (const task of queue.splice(0)) results.push({ status: "cancelled", task });
      results.close();
    });
    return { results, done };
  }

  /** Run tasks to completion and collect every result, in completion order. */
  public async runAll(
    tasks: readonly TTask[],
    signal?: AbortSignal,
  ): Promise<PoolResult<TTask, TResult>[]> {
    const { results, done } = this.run(tasks, signal);
    const out: PoolResult<TTask, TResult>[] = [];
    for await (const r of results) out.push(r);
    await done;
    return out;
  }
}

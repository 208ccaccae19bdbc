import { CrawlError, createLogger, toCrawlError, type Logger } from "@threadloom/shared";

export type TaskOutcome<O> = { ok: true; value: O } | { ok: false; error: CrawlError };

export interface TaskResult<I, O> {
  input: I;
  /** Submission order, for callers that want input order back. */
  index: number;
  result: TaskOutcome<O>;
  durationMs: number;
}

export type TaskHandler<I, O> = (input: I, index: number) => Promise<O>;

export interface WorkerPoolOptions<I, O> {
  concurrency: number;
  /** Tasks waiting for a worker before submit() blocks. Defaults to 2 x concurrency. */
  queueCapacity?: number;
  /** Stops dispatch; queued and later submitted tasks resolve as Cancelled. */
  signal?: AbortSignal;
  /** Called once per result, one call at a time, in completion order. */
  onResult?: (result: TaskResult<I, O>) => void | Promise<void>;
  logger?: Logger;
}

interface QueuedTask<I> {
  input: I;
  index: number;
}

/**
 * Fixed number of workers over a bounded queue. A failing task never affects
 * its siblings; every submitted input yields exactly one result.
 */
export class WorkerPool<I, O> {
  private readonly queue: QueuedTask<I>[] = [];
  private readonly running = new Set<Promise<void>>();
  private readonly results: TaskResult<I, O>[] = [];
  private readonly capacity: number;
  private readonly log: Logger;
  private spaceWaiters: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];
  private emitChain: Promise<void> = Promise.resolve();
  private emitError: unknown = null;
  private submitted = 0;
  private closed = false;

  constructor(
    private readonly handler: TaskHandler<I, O>,
    private readonly options: WorkerPoolOptions<I, O>,
  ) {
    if (options.concurrency < 1) throw new CrawlError("ConfigError", "concurrency must be >= 1");
    this.capacity = Math.max(1, options.queueCapacity ?? options.concurrency * 2);
    this.log = options.logger ?? createLogger({ component: "worker_pool" });
    options.signal?.addEventListener("abort", this.onAbort, { once: true });
  }

  private readonly onAbort = (): void => this.cancelQueued();

  get activeCount(): number {
    return this.running.size;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  private get aborted(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  /**
   * Enqueue one input. Resolves once it is queued (or immediately recorded as
   * Cancelled after an abort); waits while the queue is full.
   */
  async submit(input: I): Promise<void> {
    if (this.closed) throw new Error("WorkerPool is closed");
    const index = this.submitted;
    this.submitted += 1;

    while (!this.aborted && this.queue.length >= this.capacity) {
      await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
    }
    if (this.aborted) {
      this.record({ input, index, result: { ok: false, error: cancelledError() }, durationMs: 0 });
      return;
    }
    this.queue.push({ input, index });
    this.pump();
  }

  /**
   * Stop accepting input and wait for every result. In-flight tasks always
   * finish; rethrows the first onResult failure.
   */
  async drain(): Promise<TaskResult<I, O>[]> {
    this.closed = true;
    try {
      while (this.running.size > 0 || this.queue.length > 0) {
        await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
      }
    } finally {
      this.options.signal?.removeEventListener("abort", this.onAbort);
    }
    await this.emitChain;
    if (this.emitError !== null) throw this.emitError;
    return [...this.results];
  }

  private pump(): void {
    while (!this.aborted && this.running.size < this.options.concurrency) {
      const task = this.queue.shift();
      if (!task) break;
      const run = this.execute(task);
      this.running.add(run);
      run.finally(() => {
        this.running.delete(run);
        this.pump();
        this.wake();
      }).catch((err: unknown) => {
        this.log.error({ err: err instanceof Error ? err.message : String(err) }, "Worker bookkeeping failed");
      });
      this.notifySpace();
    }
  }

  private async execute(task: QueuedTask<I>): Promise<void> {
    const startedAt = Date.now();
    let result: TaskOutcome<O>;
    try {
      result = { ok: true, value: await this.handler(task.input, task.index) };
    } catch (err) {
      result = { ok: false, error: toCrawlError(err) };
      this.log.debug({ index: task.index, kind: result.error.kind }, "Task failed");
    }
    this.record({ input: task.input, index: task.index, result, durationMs: Date.now() - startedAt });
  }

  private record(result: TaskResult<I, O>): void {
    this.results.push(result);
    const onResult = this.options.onResult;
    if (!onResult) return;
    this.emitChain = this.emitChain.then(async () => {
      if (this.emitError !== null) return;
      try {
        await onResult(result);
      } catch (err) {
        this.emitError = err;
      }
    });
  }

  private cancelQueued(): void {
    const pending = this.queue.splice(0);
    if (pending.length > 0) this.log.info({ cancelled: pending.length }, "Abort requested; cancelling queued tasks");
    for (const task of pending) {
      this.record({ input: task.input, index: task.index, result: { ok: false, error: cancelledError() }, durationMs: 0 });
    }
    this.notifySpace();
    this.wake();
  }

  private notifySpace(): void {
    const waiters = this.spaceWaiters;
    this.spaceWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private wake(): void {
    if (this.running.size > 0 || this.queue.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}

function cancelledError(): CrawlError {
  return new CrawlError("Cancelled", "Run aborted before the task started");
}

/**
 * Counting semaphore for work spread over several pools that must stay within
 * one concurrency limit, e.g. crawls of several users sharing one session.
 */
export class ConcurrencyGate {
  private active = 0;
  private waiters: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (limit < 1) throw new CrawlError("ConfigError", "concurrency must be >= 1");
  }

  get inFlight(): number {
    return this.active;
  }

  /** Runs `task` once a slot is free; Cancelled if `signal` aborted while waiting. */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    while (this.active >= this.limit) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    this.active += 1;
    try {
      if (signal?.aborted) throw cancelledError();
      return await task();
    } finally {
      this.active -= 1;
      this.waiters.shift()?.();
    }
  }
}

/**
 * Run `handler` over every input with bounded concurrency. Inputs may be an
 * async source; it is pulled only as fast as the queue drains.
 */
export async function runBatch<I, O>(
  inputs: Iterable<I> | AsyncIterable<I>,
  handler: TaskHandler<I, O>,
  options: WorkerPoolOptions<I, O>,
): Promise<TaskResult<I, O>[]> {
  const pool = new WorkerPool(handler, options);
  for await (const input of inputs) await pool.submit(input);
  return pool.drain();
}

/**
 * Task pool that runs the reader/writer loops and inbound handlers.
 *
 * Loops are long-lived and never count against the handler limit, so a
 * burst of inbound requests cannot starve them.
 */

export type Task = () => Promise<void>;

export interface WorkerPoolOptions {
  /** Maximum number of handler tasks running at once */
  maxConcurrency: number;
  /** Receives the failure of any task */
  onError: (error: unknown, name: string) => void;
}

interface QueuedTask {
  name: string;
  task: Task;
}

export class WorkerPool {
  private readonly running = new Set<Promise<void>>();
  private readonly backlog: QueuedTask[] = [];
  private activeHandlers = 0;
  private activeLoops = 0;

  constructor(private readonly options: WorkerPoolOptions) {
    if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
      throw new RangeError(
        `maxConcurrency must be a positive integer, got ${options.maxConcurrency}`
      );
    }
  }

  /** Handler tasks currently running */
  get active(): number {
    return this.activeHandlers;
  }

  /** Handler tasks waiting for a free slot */
  get queued(): number {
    return this.backlog.length;
  }

  /** Long-lived loop tasks currently running */
  get loops(): number {
    return this.activeLoops;
  }

  /**
   * Run a long-lived task outside the handler limit.
   */
  spawnLoop(name: string, task: Task): void {
    this.activeLoops++;
    this.track(name, task, () => {
      this.activeLoops--;
    });
  }

  /**
   * Run a handler task now, or once a slot frees up.
   */
  spawn(name: string, task: Task): void {
    if (this.activeHandlers >= this.options.maxConcurrency) {
      this.backlog.push({ name, task });
      return;
    }
    this.runHandler({ name, task });
  }

  /**
   * Resolve once every loop and handler task, queued ones included, has
   * finished.
   */
  async join(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running);
    }
  }

  private runHandler(queued: QueuedTask): void {
    this.activeHandlers++;
    this.track(queued.name, queued.task, () => {
      this.activeHandlers--;
      const next = this.backlog.shift();
      if (next) {
        this.runHandler(next);
      }
    });
  }

  private track(name: string, task: Task, onSettled: () => void): void {
    const run = Promise.resolve()
      .then(task)
      .catch((err: unknown) => {
        this.options.onError(err, name);
      })
      .finally(() => {
        this.running.delete(run);
        onSettled();
      });
    this.running.add(run);
  }
}

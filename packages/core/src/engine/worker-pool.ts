import { Context, Logger } from "agentry-kernel";
import type { ExecutionQueue } from "./queue";

export type RunProcessor = (runId: string, workerId: string) => Promise<void>;

export interface WorkerPoolOptions {
  concurrency: number;
  /** Worker ids are `${prefix}-${n}` */
  prefix: string;
}

/**
 * Fixed set of async worker loops draining an ExecutionQueue. Each loop
 * handles one run at a time; loops exit once the queue is closed and empty.
 */
export class WorkerPool {
  private readonly log = Logger.for(this);
  private loops: Promise<void>[] = [];
  private readonly busy = new Set<string>();

  constructor(
    private readonly queue: ExecutionQueue,
    private readonly process: RunProcessor,
    private readonly options: WorkerPoolOptions,
  ) {}

  get running(): boolean {
    return this.loops.length > 0;
  }

  /** Workers currently processing a run */
  get activeWorkers(): number {
    return this.busy.size;
  }

  start(): void {
    if (this.running) return;
    for (let n = 1; n <= this.options.concurrency; n++) {
      const workerId = `${this.options.prefix}-${n}`;
      this.loops.push(Context.run({ workerId }, () => this.loop(workerId)));
    }
    this.log.info({ concurrency: this.options.concurrency }, "Worker pool started");
  }

  /**
   * Resolve once every loop has exited. The queue must be closed first.
   */
  async join(): Promise<void> {
    await Promise.all(this.loops);
    this.loops = [];
    this.log.info("Worker pool stopped");
  }

  private async loop(workerId: string): Promise<void> {
    for (;;) {
      const runId = await this.queue.take();
      if (runId === null) {
        return;
      }
      this.busy.add(workerId);
      try {
        await this.process(runId, workerId);
      } catch (error) {
        this.log.error({ err: error, runId }, "Run processing failed");
      } finally {
        this.busy.delete(workerId);
      }
    }
  }
}

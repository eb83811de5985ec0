import { MailError } from "../shared/errors.js";
import { ZodError } from "zod";
import { BullMQJobQueue } from "./queue/bullmq.js";
import type { JobQueue } from "./queue/interface.js";
import type { JobHandlers } from "./handlers/index.js";
import type { Job } from "./types.js";

export interface WorkerPoolOptions {
  workers: number;
  /** Sleep between polls of an empty queue */
  idleDelayMs?: number;
}

/**
 * Errors that cannot succeed on a later attempt: non-retryable mail errors and
 * payloads that fail validation.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof MailError) return error.retryable;
  return !(error instanceof ZodError);
}

export class WorkerPool {
  private workers: Worker[] = [];
  private running = false;

  constructor(
    private queue: JobQueue,
    private handlers: JobHandlers,
    private options: WorkerPoolOptions
  ) {}

  async start() {
    if (this.running) {
      console.warn("Worker pool already running");
      return;
    }

    this.running = true;
    const workerCount = this.options.workers;

    if (this.queue instanceof BullMQJobQueue) {
      console.log(`Starting BullMQ worker with concurrency ${workerCount}`);
      this.queue.startWorker(workerCount, (job) => this.dispatch(job), isRetryable);
      return;
    }

    console.log(`Starting worker pool with ${workerCount} workers`);

    for (let i = 0; i < workerCount; i++) {
      const worker = new Worker(i, this, this.options.idleDelayMs ?? 1000);
      this.workers.push(worker);
      worker.start();
    }
  }

  async stop() {
    if (!this.running) {
      return;
    }

    console.log("Stopping worker pool");
    this.running = false;

    await Promise.all(this.workers.map((worker) => worker.stop()));
    this.workers = [];
  }

  /**
   * Claim and process one job. Returns false when the queue is empty.
   */
  async runOnce(workerId = 0): Promise<boolean> {
    const job = await this.queue.claim();
    if (!job) {
      return false;
    }

    console.log(`[Worker ${workerId}] Processing job ${job.id} (${job.jobType})`);
    await this.processJob(workerId, job);
    return true;
  }

  private async dispatch(job: Job): Promise<void> {
    const handler = this.handlers[job.jobType];
    await handler.handle(job);
  }

  private async processJob(workerId: number, job: Job) {
    try {
      await this.dispatch(job);

      // Job succeeded
      await this.queue.complete(job.id);
      console.log(`[Worker ${workerId}] Job ${job.id} completed successfully`);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`[Worker ${workerId}] Job ${job.id} failed:`, errorMessage);

      if (isRetryable(error) && job.attempts + 1 < job.maxAttempts) {
        await this.queue.retry(job.id, errorMessage);
        console.log(`[Worker ${workerId}] Job ${job.id} will retry (attempt ${job.attempts + 1}/${job.maxAttempts})`);
      } else {
        await this.queue.fail(job.id, errorMessage);
        console.error(`[Worker ${workerId}] Job ${job.id} failed permanently after ${job.attempts + 1} attempts`);
      }
    }
  }
}

class Worker {
  private running = false;
  private loopDone: Promise<void> = Promise.resolve();

  constructor(
    private id: number,
    private pool: WorkerPool,
    private idleDelayMs: number
  ) {}

  start() {
    this.running = true;
    this.loopDone = this.loop();
  }

  async stop() {
    this.running = false;
    await this.loopDone;
  }

  private async loop() {
    while (this.running) {
      try {
        const processed = await this.pool.runOnce(this.id);

        if (!processed) {
          // Queue empty
          await new Promise((resolve) => setTimeout(resolve, this.idleDelayMs));
        }
      } catch (error) {
        console.error(`[Worker ${this.id}] Error in worker loop:`, error);
        await new Promise((resolve) => setTimeout(resolve, this.idleDelayMs));
      }
    }
  }
}

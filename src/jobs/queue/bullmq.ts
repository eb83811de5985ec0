import { Queue, Worker, UnrecoverableError, type ConnectionOptions, type Job as BullJob } from "bullmq";
import { z } from "zod";
import type { Config } from "../../config/index.js";
import type { JobQueue } from "./interface.js";
import type { Job, JobType, JobPayload } from "../types.js";

const QUEUE_NAME = "mailbox-mirror";

const JobDataSchema = z.object({
  jobType: z.enum(["sync", "push_flags"]),
  principalId: z.number().int(),
  payload: z.unknown(),
});

type JobData = z.infer<typeof JobDataSchema>;

/**
 * Redis-backed queue. Claiming, completion and retries are BullMQ's own;
 * jobs are consumed through `startWorker`, not `claim`.
 */
export class BullMQJobQueue implements JobQueue {
  private queue: Queue<JobData>;
  private connection: ConnectionOptions;
  private workers: Worker<JobData>[] = [];

  constructor(redis: NonNullable<Config["queue"]["redis"]>) {
    this.connection = {
      host: redis.host,
      port: redis.port,
    };

    this.queue = new Queue<JobData>(QUEUE_NAME, {
      connection: this.connection,
    });
  }

  async enqueue(
    jobType: JobType,
    principalId: number,
    payload: JobPayload,
    maxAttempts: number = 3
  ): Promise<number> {
    const job = await this.queue.add(
      jobType,
      { jobType, principalId, payload },
      {
        attempts: maxAttempts,
        backoff: {
          type: "exponential",
          delay: 1000,
        },
      }
    );

    return parseInt(job.id ?? "0", 10);
  }

  async claim(): Promise<Job | null> {
    throw new Error("claim() not supported with BullMQ - use startWorker() instead");
  }

  // Completion, failure and retry are recorded by the BullMQ worker itself
  async complete(): Promise<void> {}

  async fail(): Promise<void> {}

  async retry(): Promise<void> {}

  async cleanup(daysOld: number): Promise<number> {
    const graceMs = daysOld * 24 * 60 * 60 * 1000;
    const completed = await this.queue.clean(graceMs, 0, "completed");
    const failed = await this.queue.clean(graceMs, 0, "failed");
    return completed.length + failed.length;
  }

  async hasPendingJob(principalId: number, jobType: JobType): Promise<boolean> {
    const waitingJobs = await this.queue.getJobs(["waiting", "active", "delayed"]);

    return waitingJobs.some(
      (job) => job.data.principalId === principalId && job.data.jobType === jobType
    );
  }

  /**
   * Consume jobs with the given concurrency. A handler error marked non-retryable
   * skips the remaining attempts.
   */
  startWorker(
    concurrency: number,
    handle: (job: Job) => Promise<void>,
    isRetryable: (error: unknown) => boolean
  ): Worker<JobData> {
    const worker = new Worker<JobData>(
      QUEUE_NAME,
      async (bullJob: BullJob<JobData>) => {
        const data = JobDataSchema.parse(bullJob.data);
        try {
          await handle(toJob(bullJob, data));
        } catch (error) {
          if (!isRetryable(error)) {
            throw new UnrecoverableError(error instanceof Error ? error.message : String(error));
          }
          throw error;
        }
      },
      { connection: this.connection, concurrency }
    );

    worker.on("failed", (job, error) => {
      console.error(`[BullMQ] Job ${job?.id ?? "?"} failed: ${error.message}`);
    });

    this.workers.push(worker);
    return worker;
  }

  async close(): Promise<void> {
    await Promise.all(this.workers.map((worker) => worker.close()));
    this.workers = [];
    await this.queue.close();
  }
}

function toJob(bullJob: BullJob<JobData>, data: JobData): Job {
  return {
    id: parseInt(bullJob.id ?? "0", 10),
    jobType: data.jobType,
    principalId: data.principalId,
    payload: data.payload,
    status: "running",
    attempts: bullJob.attemptsMade,
    maxAttempts: bullJob.opts.attempts ?? 1,
    errorMessage: bullJob.failedReason ?? null,
    createdAt: new Date(bullJob.timestamp).toISOString(),
    startedAt: bullJob.processedOn ? new Date(bullJob.processedOn).toISOString() : null,
    completedAt: null,
  };
}

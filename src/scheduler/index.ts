import type { Config } from "../config/index.js";
import type { JobQueue } from "../jobs/queue/interface.js";
import type { PrincipalRepository } from "../shared/types/api.js";

export class Scheduler {
  private intervals: NodeJS.Timeout[] = [];
  private running = false;

  constructor(
    private queue: JobQueue,
    private principals: PrincipalRepository,
    private config: Config["scheduler"]
  ) {}

  async start() {
    if (this.running) {
      console.warn("Scheduler already running");
      return;
    }

    this.running = true;
    console.log("Starting scheduler");

    // Periodic sync - every 15 minutes by default
    const syncInterval = setInterval(() => {
      void this.periodicSync();
    }, this.config.syncIntervalMs);
    this.intervals.push(syncInterval);

    // Job cleanup - daily by default
    const cleanupInterval = setInterval(() => {
      void this.cleanupJobs();
    }, this.config.cleanupIntervalMs);
    this.intervals.push(cleanupInterval);

    console.log("Scheduler started with 2 periodic tasks");
  }

  async stop() {
    if (!this.running) {
      return;
    }

    console.log("Stopping scheduler");
    this.running = false;

    for (const interval of this.intervals) {
      clearInterval(interval);
    }

    this.intervals = [];
  }

  /**
   * Enqueue a sync for every principal that can still be synced, unless one is already queued.
   * Returns the number of jobs enqueued.
   */
  async periodicSync(): Promise<number> {
    console.log("[Scheduler] Running periodic sync");

    try {
      const syncable = await this.principals.listSyncable();
      let enqueued = 0;

      for (const principal of syncable) {
        const hasPending = await this.queue.hasPendingJob(principal.id, "sync");
        if (!hasPending) {
          await this.queue.enqueue("sync", principal.id, {});
          enqueued++;
        }
      }

      console.log(`[Scheduler] Enqueued sync for ${enqueued} of ${syncable.length} principals`);
      return enqueued;
    } catch (error) {
      console.error("[Scheduler] Periodic sync failed:", error);
      return 0;
    }
  }

  async cleanupJobs(): Promise<number> {
    console.log("[Scheduler] Running job cleanup");

    try {
      const deleted = await this.queue.cleanup(this.config.jobRetentionDays);
      console.log(`[Scheduler] Deleted ${deleted} old jobs`);
      return deleted;
    } catch (error) {
      console.error("[Scheduler] Job cleanup failed:", error);
      return 0;
    }
  }
}

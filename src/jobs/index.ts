export { createJobQueue } from "./queue/index.js";
export { WorkerPool, isRetryable } from "./worker-pool.js";
export { createHandlers, type JobHandlers } from "./handlers/index.js";
export type {
  Job,
  JobType,
  JobStatus,
  JobPayload,
  SyncPayload,
  PushFlagsPayload,
} from "./types.js";
export type { JobQueue } from "./queue/interface.js";

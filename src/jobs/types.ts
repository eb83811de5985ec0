import { z } from "zod";

// Job type enum
export type JobType = "sync" | "push_flags";

// Job status enum
export type JobStatus = "pending" | "running" | "completed" | "failed";

// Job payloads for each job type
export const SyncPayloadSchema = z.object({
  max_messages: z.number().int().positive().optional(),
  reconcile_flags: z.boolean().optional(),
});

export const PushFlagsPayloadSchema = z.object({
  provider_message_id: z.string().min(1),
  add: z.array(z.string()),
  remove: z.array(z.string()),
});

export type SyncPayload = z.infer<typeof SyncPayloadSchema>;
export type PushFlagsPayload = z.infer<typeof PushFlagsPayloadSchema>;

export type JobPayload = SyncPayload | PushFlagsPayload;

// Job interface
export interface Job {
  id: number;
  jobType: JobType;
  principalId: number;
  /** Decoded JSON; each handler validates it against its own schema */
  payload: unknown;
  status: JobStatus;
  attempts: number;
  maxAttempts: number;
  errorMessage: string | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
}

// Job handler interface
export interface JobHandler {
  handle(job: Job): Promise<void>;
}

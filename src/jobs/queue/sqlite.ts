import { eq, and, sql, lt, inArray } from "drizzle-orm";
import { schema, type Db } from "../../db/index.js";
import type { JobQueue } from "./interface.js";
import type { Job, JobType, JobPayload } from "../types.js";
import type { JobRow } from "../../db/schema.js";

function toJob(row: JobRow): Job {
  let payload: unknown;
  try {
    payload = JSON.parse(row.payload);
  } catch {
    // Left undefined; the handler's schema check rejects it
    payload = undefined;
  }

  return {
    id: row.id,
    jobType: row.jobType,
    principalId: row.principalId,
    payload,
    status: row.status,
    attempts: row.attempts,
    maxAttempts: row.maxAttempts,
    errorMessage: row.errorMessage,
    createdAt: row.createdAt,
    startedAt: row.startedAt,
    completedAt: row.completedAt,
  };
}

export class SQLiteJobQueue implements JobQueue {
  constructor(private db: Db) {}

  async enqueue(
    jobType: JobType,
    principalId: number,
    payload: JobPayload,
    maxAttempts: number = 3
  ): Promise<number> {
    const result = await this.db
      .insert(schema.jobs)
      .values({
        jobType,
        principalId,
        payload: JSON.stringify(payload),
        maxAttempts,
      })
      .returning({ id: schema.jobs.id });

    return result[0].id;
  }

  async claim(): Promise<Job | null> {
    // Single UPDATE ... RETURNING statement, so two workers never claim the same row
    const next = this.db
      .select({ id: schema.jobs.id })
      .from(schema.jobs)
      .where(
        and(
          eq(schema.jobs.status, "pending"),
          lt(schema.jobs.attempts, schema.jobs.maxAttempts)
        )
      )
      .orderBy(schema.jobs.id)
      .limit(1);

    const result = await this.db
      .update(schema.jobs)
      .set({
        status: "running",
        startedAt: new Date().toISOString(),
      })
      .where(and(inArray(schema.jobs.id, next), eq(schema.jobs.status, "pending")))
      .returning();

    if (result.length === 0) {
      return null;
    }

    return toJob(result[0]);
  }

  async complete(jobId: number): Promise<void> {
    await this.db
      .update(schema.jobs)
      .set({
        status: "completed",
        completedAt: new Date().toISOString(),
      })
      .where(eq(schema.jobs.id, jobId));
  }

  async fail(jobId: number, errorMessage: string): Promise<void> {
    await this.db
      .update(schema.jobs)
      .set({
        status: "failed",
        attempts: sql`${schema.jobs.attempts} + 1`,
        errorMessage,
        completedAt: new Date().toISOString(),
      })
      .where(eq(schema.jobs.id, jobId));
  }

  async retry(jobId: number, errorMessage: string): Promise<void> {
    await this.db
      .update(schema.jobs)
      .set({
        status: "pending",
        attempts: sql`${schema.jobs.attempts} + 1`,
        errorMessage,
      })
      .where(eq(schema.jobs.id, jobId));
  }

  async cleanup(daysOld: number): Promise<number> {
    const cutoffDate = new Date();
    cutoffDate.setDate(cutoffDate.getDate() - daysOld);
    const cutoff = cutoffDate.toISOString();

    const result = await this.db
      .delete(schema.jobs)
      .where(
        and(
          inArray(schema.jobs.status, ["completed", "failed"]),
          lt(schema.jobs.completedAt, cutoff)
        )
      )
      .returning({ id: schema.jobs.id });

    return result.length;
  }

  async hasPendingJob(principalId: number, jobType: JobType): Promise<boolean> {
    const result = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(schema.jobs)
      .where(
        and(
          eq(schema.jobs.principalId, principalId),
          eq(schema.jobs.jobType, jobType),
          inArray(schema.jobs.status, ["pending", "running"])
        )
      );

    return result[0].count > 0;
  }

  async close(): Promise<void> {
    // The database handle is owned and closed by the app context
  }
}

import {
  sqliteTable,
  text,
  integer,
  index,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// Principals table (registered users)
export const principals = sqliteTable("principals", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  email: text("email").notNull().unique(),
  displayName: text("display_name"),
  isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
  createdAt: text("created_at")
    .notNull()
    .default(sql`(datetime('now'))`),
});

// Credentials table (one OAuth credential per principal)
export const credentials = sqliteTable(
  "credentials",
  {
    principalId: integer("principal_id")
      .primaryKey()
      .notNull()
      .references(() => principals.id),
    provider: text("provider").notNull().default("gmail"),
    accessToken: text("access_token").notNull(),
    refreshToken: text("refresh_token"),
    expiresAt: text("expires_at").notNull(),
    status: text("status", {
      enum: ["ACTIVE", "REFRESHING", "NEEDS_REAUTH"],
    })
      .notNull()
      .default("ACTIVE"),
    version: integer("version").notNull().default(0),
    refreshStartedAt: text("refresh_started_at"),
    scope: text("scope"),
    updatedAt: text("updated_at")
      .notNull()
      .default(sql`(datetime('now'))`),
  },
  (table) => ({
    statusIdx: index("credentials_status_idx").on(table.status),
  })
);

// Messages table (local mirror)
export const messages = sqliteTable(
  "messages",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    principalId: integer("principal_id")
      .notNull()
      .references(() => principals.id),
    providerMessageId: text("provider_message_id").notNull(),
    threadId: text("thread_id").notNull(),
    subject: text("subject").notNull(),
    sender: text("sender").notNull(),
    recipients: text("recipients").notNull().default(""),
    snippet: text("snippet").notNull().default(""),
    body: text("body").notNull().default(""),
    receivedAt: text("received_at").notNull(),
    isRead: integer("is_read", { mode: "boolean" }).notNull().default(false),
    isStarred: integer("is_starred", { mode: "boolean" }).notNull().default(false),
    folder: text("folder", {
      enum: ["inbox", "archive", "sent", "drafts", "spam", "trash"],
    })
      .notNull()
      .default("inbox"),
    labels: text("labels").notNull().default("[]"),
    direction: text("direction", { enum: ["inbound", "outbound"] })
      .notNull()
      .default("inbound"),
    category: text("category"),
    summary: text("summary"),
    sentiment: text("sentiment"),
    ingestedAt: text("ingested_at").notNull(),
    updatedAt: text("updated_at")
      .notNull()
      .default(sql`(datetime('now'))`),
  },
  (table) => ({
    principalProviderIdx: uniqueIndex("messages_principal_provider_idx").on(
      table.principalId,
      table.providerMessageId
    ),
    principalFolderIdx: index("messages_principal_folder_idx").on(
      table.principalId,
      table.folder
    ),
    threadIdx: index("messages_thread_idx").on(table.threadId),
  })
);

// Sync cursors table
export const syncCursors = sqliteTable("sync_cursors", {
  principalId: integer("principal_id")
    .primaryKey()
    .notNull()
    .references(() => principals.id),
  headMessageId: text("head_message_id"),
  lastMessageId: text("last_message_id"),
  backfill: text("backfill").notNull().default("[]"),
  updatedAt: text("updated_at").notNull(),
});

// Jobs table
export const jobs = sqliteTable(
  "jobs",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    jobType: text("job_type", {
      enum: ["sync", "push_flags"],
    }).notNull(),
    principalId: integer("principal_id")
      .notNull()
      .references(() => principals.id),
    payload: text("payload").notNull().default("{}"),
    status: text("status", {
      enum: ["pending", "running", "completed", "failed"],
    })
      .notNull()
      .default("pending"),
    attempts: integer("attempts").notNull().default(0),
    maxAttempts: integer("max_attempts").notNull().default(3),
    errorMessage: text("error_message"),
    createdAt: text("created_at")
      .notNull()
      .default(sql`(datetime('now'))`),
    startedAt: text("started_at"),
    completedAt: text("completed_at"),
  },
  (table) => ({
    statusCreatedIdx: index("jobs_status_created_idx").on(
      table.status,
      table.createdAt
    ),
    principalJobTypeIdx: index("jobs_principal_job_type_idx").on(
      table.principalId,
      table.jobType
    ),
  })
);

// Type exports for application use
export type PrincipalRow = typeof principals.$inferSelect;
export type NewPrincipalRow = typeof principals.$inferInsert;

export type CredentialRow = typeof credentials.$inferSelect;
export type NewCredentialRow = typeof credentials.$inferInsert;

export type MessageRow = typeof messages.$inferSelect;
export type NewMessageRow = typeof messages.$inferInsert;

export type SyncCursorRow = typeof syncCursors.$inferSelect;

export type JobRow = typeof jobs.$inferSelect;
export type NewJobRow = typeof jobs.$inferInsert;

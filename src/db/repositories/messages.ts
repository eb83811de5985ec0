import { and, count, desc, eq, sql } from "drizzle-orm";
import { z } from "zod";
import type { Db } from "../index.js";
import { messages, syncCursors, type MessageRow, type NewMessageRow } from "../schema.js";
import { guard } from "./guard.js";
import type {
  MailboxStats,
  MessageFilter,
  MessageFlags,
  MessageListing,
  MessageRecord,
  MessageRepository,
  SyncCursor,
} from "../../shared/types/api.js";

const LabelsSchema = z.array(z.string());

const BackfillSchema = z.array(
  z.object({
    pageCursor: z.string().nullable(),
    stopAtId: z.string().nullable(),
  })
);

function parseJsonColumn<T>(column: string, raw: string, schema: z.ZodType<T>, fallback: T): T {
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : fallback;
  } catch (error) {
    console.warn(`[Messages] Ignoring unreadable ${column} column: ${String(error)}`);
    return fallback;
  }
}

function parseLabels(raw: string): string[] {
  return parseJsonColumn("labels", raw, LabelsSchema, []);
}

/**
 * Local mirror of provider messages plus the per-principal sync cursor.
 */
export class SqliteMessageRepository implements MessageRepository {
  constructor(private db: Db) {}

  async existsByProviderId(principalId: number, providerMessageId: string): Promise<boolean> {
    return guard("messages.existsByProviderId", async () => {
      const row = await this.db
        .select({ id: messages.id })
        .from(messages)
        .where(this.byProviderId(principalId, providerMessageId))
        .limit(1);
      return row.length > 0;
    });
  }

  async findByProviderId(
    principalId: number,
    providerMessageId: string
  ): Promise<MessageRecord | null> {
    return guard("messages.findByProviderId", async () => {
      const row = await this.db.query.messages.findFirst({
        where: this.byProviderId(principalId, providerMessageId),
      });
      return row ? toRecord(row) : null;
    });
  }

  async upsert(message: MessageRecord): Promise<{ created: boolean }> {
    return guard("messages.upsert", async () => {
      const inserted = await this.db
        .insert(messages)
        .values(toRow(message))
        .onConflictDoNothing({ target: [messages.principalId, messages.providerMessageId] })
        .returning({ id: messages.id });

      if (inserted.length > 0) {
        return { created: true };
      }

      await this.db
        .update(messages)
        .set(flagColumns(message))
        .where(this.byProviderId(message.principalId, message.providerMessageId));

      return { created: false };
    });
  }

  async updateFlags(
    principalId: number,
    providerMessageId: string,
    flags: MessageFlags
  ): Promise<boolean> {
    return guard("messages.updateFlags", async () => {
      const updated = await this.db
        .update(messages)
        .set(flagColumns(flags))
        .where(this.byProviderId(principalId, providerMessageId))
        .returning({ id: messages.id });
      return updated.length > 0;
    });
  }

  async list(principalId: number, filter: MessageFilter): Promise<MessageListing> {
    return guard("messages.list", async () => {
      const where = and(
        eq(messages.principalId, principalId),
        filter.folder === undefined ? undefined : eq(messages.folder, filter.folder),
        filter.isRead === undefined ? undefined : eq(messages.isRead, filter.isRead),
        filter.isStarred === undefined ? undefined : eq(messages.isStarred, filter.isStarred)
      );

      const rows = await this.db
        .select()
        .from(messages)
        .where(where)
        .orderBy(desc(messages.receivedAt), desc(messages.id))
        .limit(filter.limit)
        .offset(filter.offset);
      const counted = await this.db.select({ total: count() }).from(messages).where(where);

      return { messages: rows.map(toRecord), total: counted[0]?.total ?? 0 };
    });
  }

  async stats(principalId: number): Promise<MailboxStats> {
    return guard("messages.stats", async () => {
      const rows = await this.db
        .select({
          folder: messages.folder,
          total: count(),
          unread: sql<number>`sum(case when ${messages.isRead} = 0 then 1 else 0 end)`,
          starred: sql<number>`sum(case when ${messages.isStarred} = 1 then 1 else 0 end)`,
        })
        .from(messages)
        .where(eq(messages.principalId, principalId))
        .groupBy(messages.folder);

      const stats: MailboxStats = {
        total: 0,
        unread: 0,
        starred: 0,
        folders: { inbox: 0, archive: 0, sent: 0, drafts: 0, spam: 0, trash: 0 },
      };
      for (const row of rows) {
        stats.total += row.total;
        stats.unread += Number(row.unread);
        stats.starred += Number(row.starred);
        stats.folders[row.folder] = row.total;
      }
      return stats;
    });
  }

  async getCursor(principalId: number): Promise<SyncCursor | null> {
    return guard("messages.getCursor", async () => {
      const row = await this.db.query.syncCursors.findFirst({
        where: eq(syncCursors.principalId, principalId),
      });
      if (!row) return null;

      return {
        principalId: row.principalId,
        headMessageId: row.headMessageId,
        lastMessageId: row.lastMessageId,
        backfill: parseJsonColumn("backfill", row.backfill, BackfillSchema, []),
        updatedAt: new Date(row.updatedAt),
      };
    });
  }

  async setCursor(cursor: SyncCursor): Promise<void> {
    await guard("messages.setCursor", async () => {
      const values = {
        headMessageId: cursor.headMessageId,
        lastMessageId: cursor.lastMessageId,
        backfill: JSON.stringify(cursor.backfill),
        updatedAt: cursor.updatedAt.toISOString(),
      };

      await this.db
        .insert(syncCursors)
        .values({ principalId: cursor.principalId, ...values })
        .onConflictDoUpdate({ target: syncCursors.principalId, set: values });
    });
  }

  private byProviderId(principalId: number, providerMessageId: string) {
    return and(
      eq(messages.principalId, principalId),
      eq(messages.providerMessageId, providerMessageId)
    );
  }
}

function flagColumns(flags: MessageFlags) {
  return {
    isRead: flags.isRead,
    isStarred: flags.isStarred,
    folder: flags.folder,
    labels: JSON.stringify(flags.labels),
    updatedAt: new Date().toISOString(),
  };
}

function toRow(message: MessageRecord): NewMessageRow {
  return {
    principalId: message.principalId,
    providerMessageId: message.providerMessageId,
    threadId: message.threadId,
    subject: message.subject,
    sender: message.sender,
    recipients: message.recipients,
    snippet: message.snippet,
    body: message.body,
    receivedAt: message.receivedAt.toISOString(),
    direction: message.direction,
    category: message.category,
    summary: message.summary,
    sentiment: message.sentiment,
    ingestedAt: message.ingestedAt.toISOString(),
    ...flagColumns(message),
  };
}

function toRecord(row: MessageRow): MessageRecord {
  return {
    principalId: row.principalId,
    providerMessageId: row.providerMessageId,
    threadId: row.threadId,
    subject: row.subject,
    sender: row.sender,
    recipients: row.recipients,
    snippet: row.snippet,
    body: row.body,
    receivedAt: new Date(row.receivedAt),
    isRead: row.isRead,
    isStarred: row.isStarred,
    folder: row.folder,
    labels: parseLabels(row.labels),
    direction: row.direction,
    category: row.category,
    summary: row.summary,
    sentiment: row.sentiment,
    ingestedAt: new Date(row.ingestedAt),
  };
}

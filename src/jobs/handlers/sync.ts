import type { JobHandler, Job } from "../types.js";
import { SyncPayloadSchema } from "../types.js";
import type { MailboxSyncEngine } from "../../services/gmail/sync.js";

export class SyncHandler implements JobHandler {
  constructor(private engine: Pick<MailboxSyncEngine, "syncPrincipal">) {}

  async handle(job: Job): Promise<void> {
    const payload = SyncPayloadSchema.parse(job.payload);

    const result = await this.engine.syncPrincipal(job.principalId, {
      maxMessages: payload.max_messages,
      reconcileFlags: payload.reconcile_flags,
    });

    if (result.reauthRequired) {
      // Nothing to retry until the principal authorizes again
      console.warn(`Sync skipped for principal ${job.principalId}: re-authorization required`);
      return;
    }

    if (result.cancelled) {
      throw new Error(`Sync cancelled for principal ${job.principalId}`);
    }

    if (result.aborted) {
      const codes = result.errors.map((e) => e.code).join(", ");
      throw new Error(`Sync aborted for principal ${job.principalId} (${codes})`);
    }

    console.log(
      `✓ Sync complete for principal ${job.principalId}: ${result.fetched} fetched, ${result.ingested} ingested, ${result.errors.length} errors`
    );
  }
}

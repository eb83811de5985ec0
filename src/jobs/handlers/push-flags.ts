import type { JobHandler, Job } from "../types.js";
import { PushFlagsPayloadSchema } from "../types.js";
import type { FlagService } from "../../services/gmail/flags.js";

/**
 * Pushes a queued label edit to Gmail. Non-ok outcomes are thrown so the
 * worker pool decides between retry and permanent failure.
 */
export class PushFlagsHandler implements JobHandler {
  constructor(private flags: Pick<FlagService, "push">) {}

  async handle(job: Job): Promise<void> {
    const payload = PushFlagsPayloadSchema.parse(job.payload);

    const outcome = await this.flags.push(job.principalId, payload.provider_message_id, {
      add: payload.add,
      remove: payload.remove,
    });

    if (outcome.status !== "ok") {
      throw outcome.error;
    }

    console.log(`✓ Flags pushed for message ${payload.provider_message_id} (principal ${job.principalId})`);
  }
}

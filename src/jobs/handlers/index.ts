import { SyncHandler } from "./sync.js";
import { PushFlagsHandler } from "./push-flags.js";
import type { JobHandler, JobType } from "../types.js";
import type { MailboxSyncEngine } from "../../services/gmail/sync.js";
import type { FlagService } from "../../services/gmail/flags.js";

export type JobHandlers = Record<JobType, JobHandler>;

export function createHandlers(services: {
  syncEngine: Pick<MailboxSyncEngine, "syncPrincipal">;
  flags: Pick<FlagService, "push">;
}): JobHandlers {
  return {
    sync: new SyncHandler(services.syncEngine),
    push_flags: new PushFlagsHandler(services.flags),
  };
}

export { SyncHandler, PushFlagsHandler };

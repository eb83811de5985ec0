import type { Config } from "../../config/index.js";
import type { Db } from "../../db/index.js";
import { SQLiteJobQueue } from "./sqlite.js";
import { BullMQJobQueue } from "./bullmq.js";
import type { JobQueue } from "./interface.js";

export function createJobQueue(queueConfig: Config["queue"], db: Db): JobQueue {
  if (queueConfig.type === "bullmq") {
    if (!queueConfig.redis) {
      throw new Error("Redis config required for BullMQ");
    }
    return new BullMQJobQueue(queueConfig.redis);
  }

  return new SQLiteJobQueue(db);
}

export { SQLiteJobQueue, BullMQJobQueue };
export type { JobQueue } from "./interface.js";

import type { Env } from "../config/env.js";
import { MemoryRecordStore } from "./memoryRecordStore.js";
import { PgRecordStore } from "./pgRecordStore.js";
import type { RecordStore } from "./recordStore.js";

export function createRecordStore(config: Pick<Env, "RECORD_STORE" | "DATABASE_URL">): RecordStore {
  return config.RECORD_STORE === "memory" ? new MemoryRecordStore() : new PgRecordStore(config.DATABASE_URL);
}

/**
 * Transport Module - Dead-Letter Store
 *
 * Keyed by event id (message id for unparseable bodies), so a record is
 * written at most once however often a message is redelivered.
 */
import type { DeadLetterRecord } from "./schema.js";

export type DeadLetterStore = Readonly<{
  /** Returns false if a record with the same key already exists */
  add: (record: DeadLetterRecord) => boolean;
  get: (key: string) => DeadLetterRecord | null;
  list: () => ReadonlyArray<DeadLetterRecord>;
  size: () => number;
}>;

export function createDeadLetterStore(): DeadLetterStore {
  const records = new Map<string, DeadLetterRecord>();

  return {
    add: (record) => {
      if (records.has(record.key)) return false;
      records.set(record.key, record);
      return true;
    },
    get: (key) => records.get(key) ?? null,
    list: () => [...records.values()],
    size: () => records.size,
  };
}

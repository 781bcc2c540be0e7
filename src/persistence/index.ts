export type { RecordChanges, RecordStore } from "./record-store.js";
export { MemoryRecordStore } from "./memory-record-store.js";

import type { PlayerRecord } from "../types/player_record";
import type { RecordStore } from "./record_store";

// In-process store for tests and local experiments; nothing touches the disk.
export class MemoryRecordStore implements RecordStore {
  private records: PlayerRecord[];
  writes = 0;

  constructor(records: PlayerRecord[] = []) {
    this.records = records.map((r) => ({ ...r }));
  }

  async readAll(): Promise<PlayerRecord[]> {
    return this.records.map((r) => ({ ...r }));
  }

  async writeAll(records: PlayerRecord[]): Promise<void> {
    this.records = records.map((r) => ({ ...r }));
    this.writes++;
  }
}

/**
 * In-memory storage adapter.
 * Records are copied on the way in and out, so callers never share them.
 */

import type { CharacterGuid } from '../engine/types';
import type { CharacterRecord, DepotStorageAdapter } from './types';

export class MemoryDepotStorage implements DepotStorageAdapter {
  private readonly records = new Map<CharacterGuid, CharacterRecord>();

  isAvailable(): boolean {
    return true;
  }

  async getRecord(guid: CharacterGuid): Promise<CharacterRecord | null> {
    const record = this.records.get(guid);
    return record ? structuredClone(record) : null;
  }

  async saveRecord(record: CharacterRecord): Promise<void> {
    this.records.set(record.guid, structuredClone(record));
  }

  async deleteRecord(guid: CharacterGuid): Promise<void> {
    this.records.delete(guid);
  }

  get size(): number {
    return this.records.size;
  }
}

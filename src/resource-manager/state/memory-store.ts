import { BaseStateStore, cloneRecord, StateRecord } from '.';

export class MemoryStateStore extends BaseStateStore {
  private records = new Map<string, StateRecord>();

  constructor(records: StateRecord[] = []) {
    super();
    for (const record of records) {
      this.records.set(record.resource_id, cloneRecord(record));
    }
  }

  async get(resource_id: string): Promise<StateRecord | undefined> {
    const record = this.records.get(resource_id);
    return record ? cloneRecord(record) : undefined;
  }

  async list(): Promise<StateRecord[]> {
    return [...this.records.values()].map(cloneRecord);
  }

  async put(record: StateRecord): Promise<void> {
    this.records.set(record.resource_id, cloneRecord(record));
  }

  async delete(resource_id: string): Promise<void> {
    this.records.delete(resource_id);
  }
}

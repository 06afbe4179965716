import { type JsonValue, type RecordStore, cloneJson } from '@helix/core';

/** Keeps records in a Map. Values are cloned on the way in and out. */
export class MemoryRecordStore implements RecordStore {
    private readonly records = new Map<string, JsonValue>();

    public async start(): Promise<void> { }
    public async close(): Promise<void> { }

    public async get(key: string): Promise<JsonValue | null> {
        const record = this.records.get(key);
        return record === undefined ? null : cloneJson(record);
    }

    public async put(key: string, record: JsonValue): Promise<void> {
        this.records.set(key, cloneJson(record));
    }

    public async delete(key: string): Promise<void> {
        this.records.delete(key);
    }

    public async list(): Promise<string[]> {
        return [...this.records.keys()];
    }

    public get size(): number {
        return this.records.size;
    }
}

import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { type JsonValue, type RecordStore, jsonValueSchema } from '@helix/core';

const EXTENSION = '.json';

function isMissing(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file per record under `directory`. Writes go to a temporary file
 * that is renamed into place, so readers never see a partial record.
 */
export class FileRecordStore implements RecordStore {
    public constructor(private readonly directory: string) { }

    public async start(): Promise<void> {
        await mkdir(this.directory, { recursive: true });
    }

    public async close(): Promise<void> { }

    private pathFor(key: string): string {
        return join(this.directory, `${encodeURIComponent(key)}${EXTENSION}`);
    }

    public async get(key: string): Promise<JsonValue | null> {
        let raw: string;
        try {
            raw = await readFile(this.pathFor(key), 'utf8');
        } catch (error) {
            if (isMissing(error)) return null;
            throw error;
        }
        const parsed: unknown = JSON.parse(raw);
        return jsonValueSchema.parse(parsed);
    }

    public async put(key: string, record: JsonValue): Promise<void> {
        const target = this.pathFor(key);
        const temporary = `${target}.${randomUUID()}.tmp`;
        await writeFile(temporary, JSON.stringify(record), 'utf8');
        await rename(temporary, target);
    }

    public async delete(key: string): Promise<void> {
        await rm(this.pathFor(key), { force: true });
    }

    public async list(): Promise<string[]> {
        let entries: string[];
        try {
            entries = await readdir(this.directory);
        } catch (error) {
            if (isMissing(error)) return [];
            throw error;
        }
        return entries
            .filter((name) => name.endsWith(EXTENSION))
            .map((name) => decodeURIComponent(name.slice(0, -EXTENSION.length)));
    }
}

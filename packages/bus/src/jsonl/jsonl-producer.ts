import { appendFile, mkdir, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { RecordProducer } from '../types';

/** Appends one JSON document per line. */
export class JsonlProducer<T> implements RecordProducer<T> {
    private dirReady = false;

    constructor(readonly path: string) { }

    async produce(record: T): Promise<void> {
        if (!this.dirReady) {
            await mkdir(dirname(this.path), { recursive: true });
            this.dirReady = true;
        }
        await appendFile(this.path, `${JSON.stringify(record)}\n`, 'utf8');
    }

    async close(): Promise<void> {
        // appendFile opens and closes the file per record
    }
}

/** Delete a log so a fresh run starts empty. A missing file is fine. */
export async function removeLog(path: string): Promise<void> {
    await rm(path, { force: true });
}

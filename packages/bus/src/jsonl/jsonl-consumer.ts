import { RecordDecodeError } from '../errors';
import { BusLogger, ConsumeOptions, Delivery, RecordConsumer, RecordDecoder } from '../types';
import { wait } from '../wait';
import { JsonlTail, TailChunk } from './jsonl-tail';

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export interface JsonlConsumerOptions<T> {
    decode: RecordDecoder<T>;
    pollIntervalMs?: number;
    /** Bytes read from the file at a time. */
    chunkSize?: number;
    logger?: BusLogger;
    /** Called when the file was truncated or replaced and reading restarts from the top. */
    onTruncate?: () => void;
}

export class JsonlConsumer<T> implements RecordConsumer<T> {
    private readonly tail: JsonlTail;
    private readonly decode: RecordDecoder<T>;
    private readonly pollIntervalMs: number;
    private readonly logger: BusLogger;
    private readonly onTruncate?: () => void;
    private seq = 0;

    constructor(readonly path: string, options: JsonlConsumerOptions<T>) {
        this.tail = new JsonlTail(path, { chunkSize: options.chunkSize });
        this.decode = options.decode;
        this.pollIntervalMs = options.pollIntervalMs ?? 500;
        this.logger = options.logger ?? console;
        this.onTruncate = options.onTruncate;
    }

    async *consume({ follow = true, signal }: ConsumeOptions = {}): AsyncGenerator<Delivery<T>> {
        let waitingForFile = false;
        let readFailing = false;

        while (!signal?.aborted) {
            let chunk: TailChunk | null;
            try {
                chunk = await this.tail.read(!follow);
            } catch (e) {
                // Drain mode has no later poll to recover on
                if (!follow) throw e;
                if (!readFailing) {
                    this.logger.warn(`[bus] path=${this.path} status=read_failed error="${errorMessage(e)}" retry_in_ms=${this.pollIntervalMs}`);
                    readFailing = true;
                }
                await wait(this.pollIntervalMs, signal);
                continue;
            }
            if (readFailing) {
                this.logger.info(`[bus] path=${this.path} status=read_recovered`);
                readFailing = false;
            }

            if (chunk === null) {
                if (!follow) return;
                if (!waitingForFile) {
                    this.logger.info(`[bus] path=${this.path} status=waiting_for_file`);
                    waitingForFile = true;
                }
                await wait(this.pollIntervalMs, signal);
                continue;
            }
            waitingForFile = false;

            if (chunk.truncated) {
                this.logger.warn(`[bus] path=${this.path} status=truncated restarting_at=0`);
                this.onTruncate?.();
            }

            for (const line of chunk.lines) {
                if (signal?.aborted) return;
                yield this.decodeLine(line);
            }

            if (chunk.more) continue;
            if (!follow) return;
            if (chunk.lines.length === 0) {
                await wait(this.pollIntervalMs, signal);
            }
        }
    }

    async close(): Promise<void> {
        // Nothing held open between reads
    }

    private decodeLine(line: string): Delivery<T> {
        const seq = ++this.seq;
        try {
            const value: unknown = JSON.parse(line);
            return { kind: 'record', seq, record: this.decode(value) };
        } catch (e) {
            return { kind: 'rejected', seq, error: new RecordDecodeError(seq, line, e) };
        }
    }
}

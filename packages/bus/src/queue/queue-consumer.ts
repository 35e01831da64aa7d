import { Worker } from 'bullmq';
import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { RecordDecodeError } from '../errors';
import { ConsumeOptions, Delivery, RecordConsumer, RecordDecoder } from '../types';
import { createRedisConnection } from './connection';

export interface QueueConsumerOptions<T> {
    redisUrl: string;
    decode: RecordDecoder<T>;
}

/**
 * Pulls jobs one at a time through a processor-less BullMQ worker.
 *
 * A job is completed when the caller asks for the next delivery, i.e. after
 * it has finished handling the current one. Jobs whose data does not decode
 * are failed straight away and surfaced as rejected deliveries.
 */
export class QueueConsumer<T> implements RecordConsumer<T> {
    private readonly connection: Redis;
    private readonly worker: Worker<unknown>;
    private readonly decode: RecordDecoder<T>;
    private readonly token = uuidv4();
    private seq = 0;

    constructor(readonly queueName: string, options: QueueConsumerOptions<T>) {
        this.connection = createRedisConnection(options.redisUrl);
        this.worker = new Worker<unknown>(queueName, null, {
            connection: this.connection,
            autorun: false
        });
        this.decode = options.decode;
    }

    async *consume({ follow = true, signal }: ConsumeOptions = {}): AsyncGenerator<Delivery<T>> {
        while (!signal?.aborted) {
            const job = await this.worker.getNextJob(this.token, { block: follow });
            if (!job) {
                if (!follow) return;
                continue;
            }

            const seq = ++this.seq;
            let record: T;
            try {
                record = this.decode(job.data);
            } catch (e) {
                const error = new RecordDecodeError(seq, String(JSON.stringify(job.data)), e);
                await job.moveToFailed(error, this.token, false);
                yield { kind: 'rejected', seq, error };
                continue;
            }

            yield { kind: 'record', seq, record };
            await job.moveToCompleted('done', this.token, false);
        }
    }

    async close(): Promise<void> {
        await this.worker.close();
        this.connection.disconnect();
    }
}

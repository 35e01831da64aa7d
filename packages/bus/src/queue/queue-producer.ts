import { Queue } from 'bullmq';
import Redis from 'ioredis';
import { RecordProducer } from '../types';
import { createRedisConnection } from './connection';

export interface QueueProducerOptions<T> {
    redisUrl: string;
    jobName?: string;
    /** Deduplicates on the broker side when the record carries a stable id. */
    jobId?: (record: T) => string | undefined;
}

export class QueueProducer<T> implements RecordProducer<T> {
    private readonly connection: Redis;
    private readonly queue: Queue;
    private readonly jobName: string;
    private readonly jobId?: (record: T) => string | undefined;

    constructor(readonly queueName: string, options: QueueProducerOptions<T>) {
        this.connection = createRedisConnection(options.redisUrl);
        this.queue = new Queue(queueName, {
            connection: this.connection,
            defaultJobOptions: {
                removeOnComplete: 100,
                removeOnFail: 500
            }
        });
        this.jobName = options.jobName ?? 'record';
        this.jobId = options.jobId;
    }

    async produce(record: T): Promise<void> {
        await this.queue.add(this.jobName, record, { jobId: this.jobId?.(record) });
    }

    async close(): Promise<void> {
        await this.queue.close();
        this.connection.disconnect();
    }
}

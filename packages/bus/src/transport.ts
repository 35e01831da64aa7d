import { JsonlConsumer } from './jsonl/jsonl-consumer';
import { JsonlProducer } from './jsonl/jsonl-producer';
import { QueueConsumer } from './queue/queue-consumer';
import { QueueProducer } from './queue/queue-producer';
import { BusLogger, RecordConsumer, RecordDecoder, RecordProducer } from './types';

export type TransportConfig =
    | { kind: 'file'; path: string; pollIntervalMs: number }
    | { kind: 'queue'; redisUrl: string; queueName: string };

/** Which leg of the pipeline: generator → readings → classifier → enriched → viewer. */
export type TransportSide = 'readings' | 'enriched';

const DEFAULT_LOGS: Record<TransportSide, string> = {
    readings: 'data/sensor_data.jsonl',
    enriched: 'data/processed_data.jsonl'
};

const DEFAULT_QUEUES: Record<TransportSide, string> = {
    readings: 'readings_v1',
    enriched: 'enriched_readings_v1'
};

export function readTransportConfig(
    env: NodeJS.ProcessEnv,
    side: TransportSide,
    pollIntervalMs: number
): TransportConfig {
    const bus = env.BUS || 'file';

    if (bus === 'queue') {
        const queueName = side === 'readings' ? env.READINGS_QUEUE : env.ENRICHED_QUEUE;
        return {
            kind: 'queue',
            redisUrl: env.REDIS_URL || 'redis://localhost:6379',
            queueName: queueName || DEFAULT_QUEUES[side]
        };
    }

    if (bus !== 'file') {
        throw new Error(`Unknown BUS "${bus}", expected "file" or "queue"`);
    }

    const path = side === 'readings' ? env.READINGS_LOG : env.ENRICHED_LOG;
    return { kind: 'file', path: path || DEFAULT_LOGS[side], pollIntervalMs };
}

export function describeTransport(config: TransportConfig): string {
    return config.kind === 'file' ? `file:${config.path}` : `queue:${config.queueName}`;
}

export interface ProducerOptions<T> {
    jobId?: (record: T) => string | undefined;
}

export function createProducer<T>(config: TransportConfig, options: ProducerOptions<T> = {}): RecordProducer<T> {
    if (config.kind === 'queue') {
        return new QueueProducer<T>(config.queueName, { redisUrl: config.redisUrl, jobId: options.jobId });
    }
    return new JsonlProducer<T>(config.path);
}

export interface ConsumerOptions<T> {
    decode: RecordDecoder<T>;
    logger?: BusLogger;
    /** File transport only: a queue has no notion of being truncated. */
    onTruncate?: () => void;
}

export function createConsumer<T>(config: TransportConfig, options: ConsumerOptions<T>): RecordConsumer<T> {
    if (config.kind === 'queue') {
        return new QueueConsumer<T>(config.queueName, { redisUrl: config.redisUrl, decode: options.decode });
    }
    return new JsonlConsumer<T>(config.path, {
        decode: options.decode,
        pollIntervalMs: config.pollIntervalMs,
        logger: options.logger,
        onTruncate: options.onTruncate
    });
}

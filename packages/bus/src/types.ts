import { RecordDecodeError } from './errors';

/** Turns an untrusted payload into a typed record, or throws. */
export type RecordDecoder<T> = (value: unknown) => T;

export type Delivery<T> =
    | { kind: 'record'; seq: number; record: T }
    | { kind: 'rejected'; seq: number; error: RecordDecodeError };

export interface ConsumeOptions {
    /**
     * Keep waiting for new records (default). When false the consumer drains
     * what is currently available and the sequence ends.
     */
    follow?: boolean;
    signal?: AbortSignal;
}

export interface RecordProducer<T> {
    produce(record: T): Promise<void>;
    close(): Promise<void>;
}

export interface RecordConsumer<T> {
    consume(options?: ConsumeOptions): AsyncIterable<Delivery<T>>;
    close(): Promise<void>;
}

export interface BusLogger {
    info(msg: string): void;
    warn(msg: string): void;
}

import { BusLogger, RecordConsumer } from '@airwatch/bus';
import { EnrichedReadingV1 } from '@airwatch/contracts';
import { SnapshotStore } from '../store/snapshot-store';

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export interface FeedLogger extends BusLogger {
    error(msg: string): void;
}

export interface FeedStats {
    running: boolean;
    accepted: number;
    rejected: number;
    resets: number;
    last_accepted_at: string | null;
}

/**
 * Follows the enriched feed in the background and keeps the snapshot store
 * current. Reading never touches the classifier: it only re-reads the log
 * (or pulls from the queue) at the consumer's own pace.
 */
export class FeedPoller {
    private consumer: RecordConsumer<EnrichedReadingV1> | null = null;
    private controller: AbortController | null = null;
    private loop: Promise<void> | null = null;
    private running = false;
    private accepted = 0;
    private rejected = 0;
    private resets = 0;
    private lastAcceptedAt: Date | null = null;

    constructor(private readonly store: SnapshotStore, private readonly logger: FeedLogger) { }

    start(consumer: RecordConsumer<EnrichedReadingV1>): void {
        if (this.loop) {
            throw new Error('Feed poller is already running');
        }
        const controller = new AbortController();
        this.consumer = consumer;
        this.controller = controller;
        this.running = true;
        this.loop = this.follow(consumer, controller.signal)
            .catch((err: unknown) => {
                this.logger.error(`[viewer] status=feed_failed error="${errorMessage(err)}"`);
            })
            .finally(() => {
                this.running = false;
            });
    }

    async stop(): Promise<void> {
        this.controller?.abort();
        await this.loop;
        await this.consumer?.close();
        this.loop = null;
        this.consumer = null;
        this.controller = null;
    }

    /** The log was truncated or replaced: forget everything derived from the old one. */
    reset(): void {
        this.store.clear();
        this.resets++;
    }

    stats(): FeedStats {
        return {
            running: this.running,
            accepted: this.accepted,
            rejected: this.rejected,
            resets: this.resets,
            last_accepted_at: this.lastAcceptedAt ? this.lastAcceptedAt.toISOString() : null
        };
    }

    private async follow(consumer: RecordConsumer<EnrichedReadingV1>, signal: AbortSignal): Promise<void> {
        for await (const delivery of consumer.consume({ signal })) {
            if (delivery.kind === 'rejected') {
                this.rejected++;
                this.logger.warn(`[viewer] seq=${delivery.seq} status=rejected reason="${errorMessage(delivery.error.cause)}"`);
                continue;
            }
            this.store.ingest(delivery.record);
            this.accepted++;
            this.lastAcceptedAt = new Date();
        }
    }
}

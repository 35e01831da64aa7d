import 'dotenv/config';
import { createConsumer, describeTransport, installCrashLoggers } from '@airwatch/bus';
import { CONTRACT_VERSION, EnrichedReadingV1, parseEnrichedReading } from '@airwatch/contracts';
import { buildApp } from './app';
import { loadConfig } from './config';
import { SnapshotStore } from './store/snapshot-store';

installCrashLoggers();

const start = async () => {
    const config = loadConfig();
    const store = new SnapshotStore({ trendWindow: config.trendWindow, recentWindow: config.recentWindow });
    const fastify = await buildApp({ store });

    try {
        fastify.log.info(`Starting viewer API... contracts version: ${CONTRACT_VERSION}`);

        const consumer = createConsumer<EnrichedReadingV1>(config.feed, {
            decode: parseEnrichedReading,
            logger: fastify.log,
            onTruncate: () => fastify.feed.reset()
        });
        fastify.feed.start(consumer);
        fastify.log.info(`[viewer] feed=${describeTransport(config.feed)}`);

        const address = await fastify.listen({ port: config.port, host: config.host });
        fastify.log.info(`Server listening on ${address}`);

        // Graceful Shutdown
        const shutdown = async (signal: string) => {
            fastify.log.info(`[${signal}] Shutting down viewer API...`);
            await fastify.close();
            console.log('Viewer API closed');
            process.exit(0);
        };
        const onSignal = (signal: string) => {
            shutdown(signal).catch((err: unknown) => {
                console.error('[FATAL] Viewer shutdown failed:', err);
                process.exit(1);
            });
        };

        process.on('SIGTERM', () => onSignal('SIGTERM'));
        process.on('SIGINT', () => onSignal('SIGINT'));
    } catch (err) {
        fastify.log.error(err);
        process.exit(1);
    }
};

start().catch((err) => {
    console.error('[FATAL] Viewer failed to start:', err);
    process.exit(1);
});

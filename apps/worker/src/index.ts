import 'dotenv/config';
import { createConsumer, createProducer, describeTransport, installCrashLoggers, removeLog } from '@airwatch/bus';
import { CONTRACT_VERSION, EnrichedReadingV1, ReadingV1, parseReading } from '@airwatch/contracts';
import { loadConfig } from './config';
import { createStats, runClassifier } from './pipeline';

console.log(`Classifier started. Contracts version: ${CONTRACT_VERSION}`);

installCrashLoggers();

const start = async () => {
    const config = loadConfig();

    // A fresh run starts from an empty output log
    if (config.resetOnStart && config.output.kind === 'file') {
        await removeLog(config.output.path);
    }

    const source = createConsumer<ReadingV1>(config.input, { decode: parseReading });
    const sink = createProducer<EnrichedReadingV1>(config.output, { jobId: record => record.reading_id });

    const controller = new AbortController();
    const shutdown = (signal: string) => {
        console.log(`[${signal}] Shutting down classifier...`);
        controller.abort();
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));

    console.log(`[classifier] input=${describeTransport(config.input)} output=${describeTransport(config.output)}`);

    const stats = createStats();
    await runClassifier({ source, sink, signal: controller.signal, stats });

    await Promise.all([source.close(), sink.close()]);
    console.log(
        `[classifier] stopped accepted=${stats.accepted} rejected=${stats.rejected} ` +
        `written=${stats.written} write_failed=${stats.write_failed}`
    );
};

start().catch((err) => {
    console.error('[FATAL] Classifier failed:', err);
    process.exit(1);
});

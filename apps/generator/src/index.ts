import 'dotenv/config';
import { createProducer, describeTransport, installCrashLoggers, removeLog } from '@airwatch/bus';
import { CONTRACT_VERSION, ReadingV1 } from '@airwatch/contracts';
import { loadConfig } from './config';
import { runGenerator } from './generator';

installCrashLoggers();

const start = async () => {
    const config = loadConfig();
    console.log(`Generator started. Contracts version: ${CONTRACT_VERSION}`);

    if (config.resetOnStart && config.output.kind === 'file') {
        await removeLog(config.output.path);
    }

    const sink = createProducer<ReadingV1>(config.output, { jobId: reading => reading.reading_id });

    const controller = new AbortController();
    const shutdown = (signal: string) => {
        console.log(`[${signal}] Shutting down generator...`);
        controller.abort();
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));

    console.log(
        `[generator] output=${describeTransport(config.output)} sensors=${config.sensorIds.join(',')} ` +
        `tick_ms=${config.tickMs} max_ticks=${config.maxTicks || 'unlimited'}`
    );

    const written = await runGenerator({
        sink,
        sensorIds: config.sensorIds,
        tickMs: config.tickMs,
        maxTicks: config.maxTicks,
        signal: controller.signal
    });

    await sink.close();
    console.log(`[generator] stopped written=${written}`);
};

start().catch((err) => {
    console.error('[FATAL] Generator failed:', err);
    process.exit(1);
});

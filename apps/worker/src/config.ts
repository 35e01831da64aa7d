import { readFlag, readInt, readTransportConfig, TransportConfig } from '@airwatch/bus';

export interface WorkerConfig {
    input: TransportConfig;
    output: TransportConfig;
    resetOnStart: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
    const pollIntervalMs = readInt(env, 'CLASSIFIER_POLL_MS', 500, 1);
    return {
        input: readTransportConfig(env, 'readings', pollIntervalMs),
        output: readTransportConfig(env, 'enriched', pollIntervalMs),
        resetOnStart: readFlag(env, 'RESET_LOGS_ON_START', true)
    };
}

import { readFlag, readInt, readList, readTransportConfig, TransportConfig } from '@airwatch/bus';

export const DEFAULT_SENSOR_IDS = ['SENSOR_A', 'SENSOR_B', 'SENSOR_C'];

export interface GeneratorConfig {
    output: TransportConfig;
    sensorIds: string[];
    tickMs: number;
    maxTicks: number;
    resetOnStart: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GeneratorConfig {
    const tickMs = readInt(env, 'GENERATOR_TICK_MS', 2000, 1);
    return {
        output: readTransportConfig(env, 'readings', tickMs),
        sensorIds: readList(env, 'SENSOR_IDS', DEFAULT_SENSOR_IDS),
        tickMs,
        maxTicks: readInt(env, 'GENERATOR_MAX_TICKS', 0),
        resetOnStart: readFlag(env, 'RESET_LOGS_ON_START', true)
    };
}

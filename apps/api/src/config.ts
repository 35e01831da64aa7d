import { readInt, readTransportConfig, TransportConfig } from '@airwatch/bus';

export interface ApiConfig {
    port: number;
    host: string;
    feed: TransportConfig;
    trendWindow: number;
    recentWindow: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
    return {
        port: readInt(env, 'PORT', 3000),
        host: env.HOST || '0.0.0.0',
        feed: readTransportConfig(env, 'enriched', readInt(env, 'VIEWER_POLL_MS', 3000, 1)),
        trendWindow: readInt(env, 'TREND_WINDOW', 60, 1),
        recentWindow: readInt(env, 'RECENT_WINDOW', 60, 1)
    };
}

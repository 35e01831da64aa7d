import { EnrichedReadingV1 } from '@airwatch/contracts';

const GOOD: Pick<EnrichedReadingV1,
    'aqi_level' | 'aqi_advisory' | 'temperature_level' | 'temperature_advisory' | 'humidity_level' | 'humidity_advisory' | 'overall_status'> = {
    aqi_level: 'good',
    aqi_advisory: 'Good - air quality is safe',
    temperature_level: 'good',
    temperature_advisory: 'Normal - temperature is comfortable',
    humidity_level: 'good',
    humidity_advisory: 'Normal - humidity is comfortable',
    overall_status: 'good'
};

/** An all-good classified reading; override levels to build the scenario under test. */
export function enriched(overrides: Partial<EnrichedReadingV1> = {}): EnrichedReadingV1 {
    return {
        sensor_id: 'SENSOR_A',
        timestamp: '2026-05-01T10:00:00.000Z',
        aqi: 40,
        temperature_c: 22,
        humidity_pct: 45,
        ...GOOD,
        ...overrides
    };
}

export const UNSAFE_EVERYTHING: Partial<EnrichedReadingV1> = {
    aqi: 180,
    temperature_c: 41.5,
    humidity_pct: 85,
    aqi_level: 'unsafe',
    aqi_advisory: 'Unsafe air - avoid outdoor activity',
    temperature_level: 'heat_risk',
    temperature_advisory: 'Heat risk - stay hydrated, avoid direct sun',
    humidity_level: 'high_moisture',
    humidity_advisory: 'High moisture - risk of mold and heat stress',
    overall_status: 'unsafe'
};

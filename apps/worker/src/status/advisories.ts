import { MetricLevels, ReadingMetric } from '@airwatch/contracts';

export type AdvisoryTable = { [M in ReadingMetric]: Record<MetricLevels[M], string> };

// Fixed text per (metric, level); never computed from the value.
export const ADVISORIES: AdvisoryTable = {
    aqi: {
        good: 'Good - air quality is safe',
        moderate: 'Moderate - sensitive groups should be cautious',
        unsafe: 'Unsafe air - avoid outdoor activity'
    },
    temperature_c: {
        good: 'Normal - temperature is comfortable',
        warm: 'Warm - drink water regularly',
        heat_risk: 'Heat risk - stay hydrated, avoid direct sun'
    },
    humidity_pct: {
        good: 'Normal - humidity is comfortable',
        elevated: 'Elevated - monitor for discomfort',
        high_moisture: 'High moisture - risk of mold and heat stress'
    }
};

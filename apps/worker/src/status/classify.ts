import {
    AQI_LEVELS,
    HUMIDITY_LEVELS,
    TEMPERATURE_LEVELS,
    SEVERITIES,
    AqiLevel,
    compareSeverity,
    EnrichedReadingV1,
    HumidityLevel,
    InvalidReadingError,
    ReadingMetric,
    ReadingV1,
    Severity,
    TemperatureLevel
} from '@airwatch/contracts';
import { ADVISORIES } from './advisories';

export interface Thresholds {
    moderateAbove: number;
    unsafeAbove: number;
}

export const THRESHOLDS: Record<ReadingMetric, Thresholds> = {
    aqi: { moderateAbove: 100, unsafeAbove: 150 },
    temperature_c: { moderateAbove: 35, unsafeAbove: 40 },
    humidity_pct: { moderateAbove: 60, unsafeAbove: 80 }
};

export interface MetricClassification<L extends string = string> {
    metric: ReadingMetric;
    value: number;
    level: L;
    severity: Severity;
    advisory: string;
}

type Tier = 0 | 1 | 2;

// Strictly greater than: a value sitting on a threshold stays in the lower tier
function tierOf(metric: ReadingMetric, value: number): Tier {
    if (!Number.isFinite(value)) {
        throw new InvalidReadingError([`${metric}: expected a finite number, received ${value}`]);
    }
    const { moderateAbove, unsafeAbove } = THRESHOLDS[metric];
    if (value > unsafeAbove) return 2;
    if (value > moderateAbove) return 1;
    return 0;
}

export function classifyAqi(aqi: number): MetricClassification<AqiLevel> {
    const tier = tierOf('aqi', aqi);
    const level = AQI_LEVELS[tier];
    return { metric: 'aqi', value: aqi, level, severity: SEVERITIES[tier], advisory: ADVISORIES.aqi[level] };
}

export function classifyTemperature(celsius: number): MetricClassification<TemperatureLevel> {
    const tier = tierOf('temperature_c', celsius);
    const level = TEMPERATURE_LEVELS[tier];
    return {
        metric: 'temperature_c',
        value: celsius,
        level,
        severity: SEVERITIES[tier],
        advisory: ADVISORIES.temperature_c[level]
    };
}

export function classifyHumidity(percent: number): MetricClassification<HumidityLevel> {
    const tier = tierOf('humidity_pct', percent);
    const level = HUMIDITY_LEVELS[tier];
    return {
        metric: 'humidity_pct',
        value: percent,
        level,
        severity: SEVERITIES[tier],
        advisory: ADVISORIES.humidity_pct[level]
    };
}

export function aggregateStatus(results: ReadonlyArray<Pick<MetricClassification, 'severity'>>): Severity {
    // unsafe > moderate > good; which metric got there, or how many, does not matter
    let worst: Severity = 'good';
    for (const result of results) {
        if (compareSeverity(result.severity, worst) > 0) {
            worst = result.severity;
        }
    }
    return worst;
}

/** Pure: the same reading always yields an identical enriched record. */
export function enrichReading(reading: ReadingV1): EnrichedReadingV1 {
    const aqi = classifyAqi(reading.aqi);
    const temperature = classifyTemperature(reading.temperature_c);
    const humidity = classifyHumidity(reading.humidity_pct);

    return {
        ...reading,
        aqi_level: aqi.level,
        aqi_advisory: aqi.advisory,
        temperature_level: temperature.level,
        temperature_advisory: temperature.advisory,
        humidity_level: humidity.level,
        humidity_advisory: humidity.advisory,
        overall_status: aggregateStatus([aqi, temperature, humidity])
    };
}

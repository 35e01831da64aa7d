import { z } from 'zod';
import { InvalidReadingError } from './errors';

// ─── Metrics & levels ────────────────────────────────────────────────────────

export const READING_METRICS = ['aqi', 'temperature_c', 'humidity_pct'] as const;
export type ReadingMetric = typeof READING_METRICS[number];

/** Common scale every metric level maps onto, least severe first. */
export const SEVERITIES = ['good', 'moderate', 'unsafe'] as const;
export type Severity = typeof SEVERITIES[number];

// Position in each tuple is the severity tier (0 = good, 1 = moderate, 2 = unsafe).
export const AQI_LEVELS = ['good', 'moderate', 'unsafe'] as const;
export const TEMPERATURE_LEVELS = ['good', 'warm', 'heat_risk'] as const;
export const HUMIDITY_LEVELS = ['good', 'elevated', 'high_moisture'] as const;

export type AqiLevel = typeof AQI_LEVELS[number];
export type TemperatureLevel = typeof TEMPERATURE_LEVELS[number];
export type HumidityLevel = typeof HUMIDITY_LEVELS[number];

export function isReadingMetric(value: string): value is ReadingMetric {
    return READING_METRICS.some(metric => metric === value);
}

/** Negative when `a` is less severe than `b`, 0 when equal. */
export function compareSeverity(a: Severity, b: Severity): number {
    return SEVERITIES.indexOf(a) - SEVERITIES.indexOf(b);
}

export interface MetricLevels {
    aqi: AqiLevel;
    temperature_c: TemperatureLevel;
    humidity_pct: HumidityLevel;
}

// ─── Schemas ─────────────────────────────────────────────────────────────────

export const ReadingV1Schema = z.object({
    sensor_id: z.string().min(1),
    timestamp: z.union([z.string().min(1), z.number().finite()]), // ISO 8601 from the generator
    aqi: z.number().finite().nonnegative(),
    temperature_c: z.number().finite().min(-100).max(100),
    humidity_pct: z.number().finite().min(0).max(100),
    reading_id: z.string().min(1).optional()
});

export type ReadingV1 = z.infer<typeof ReadingV1Schema>;

export const EnrichedReadingV1Schema = ReadingV1Schema.extend({
    aqi_level: z.enum(AQI_LEVELS),
    aqi_advisory: z.string(),
    temperature_level: z.enum(TEMPERATURE_LEVELS),
    temperature_advisory: z.string(),
    humidity_level: z.enum(HUMIDITY_LEVELS),
    humidity_advisory: z.string(),
    overall_status: z.enum(SEVERITIES)
});

export type EnrichedReadingV1 = z.infer<typeof EnrichedReadingV1Schema>;

// ─── Parsing ─────────────────────────────────────────────────────────────────

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
}

/**
 * Validate an untrusted value as a reading. Nothing is defaulted: a missing,
 * non-numeric or out-of-range field throws InvalidReadingError.
 */
export function parseReading(value: unknown): ReadingV1 {
    const result = ReadingV1Schema.safeParse(value);
    if (!result.success) {
        throw new InvalidReadingError(formatIssues(result.error));
    }
    return result.data;
}

export function parseEnrichedReading(value: unknown): EnrichedReadingV1 {
    const result = EnrichedReadingV1Schema.safeParse(value);
    if (!result.success) {
        throw new InvalidReadingError(formatIssues(result.error));
    }
    return result.data;
}

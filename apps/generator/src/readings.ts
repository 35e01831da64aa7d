import { v4 as uuidv4 } from 'uuid';
import { ReadingV1 } from '@airwatch/contracts';

export interface GenerateOptions {
    random?: () => number;
    now?: () => Date;
    newId?: () => string;
}

// Inclusive on both ends
function randomInt(random: () => number, min: number, max: number): number {
    return min + Math.floor(random() * (max - min + 1));
}

/**
 * One synthetic reading. Ranges deliberately straddle every threshold so all
 * levels show up in a short run: AQI 20–250, 15.0–50.0 °C, 20–99 %.
 */
export function generateReading(sensorId: string, options: GenerateOptions = {}): ReadingV1 {
    const random = options.random ?? Math.random;
    const now = options.now ?? (() => new Date());
    const newId = options.newId ?? uuidv4;

    return {
        sensor_id: sensorId,
        timestamp: now().toISOString(),
        aqi: randomInt(random, 20, 250),
        temperature_c: Math.round((15 + random() * 35) * 10) / 10,
        humidity_pct: randomInt(random, 20, 99),
        reading_id: newId()
    };
}

export function generateTick(sensorIds: readonly string[], options: GenerateOptions = {}): ReadingV1[] {
    return sensorIds.map(sensorId => generateReading(sensorId, options));
}

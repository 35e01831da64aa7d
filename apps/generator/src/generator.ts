import { RecordProducer, wait } from '@airwatch/bus';
import { ReadingV1 } from '@airwatch/contracts';
import { GenerateOptions, generateTick } from './readings';

export interface RunGeneratorOptions {
    sink: RecordProducer<ReadingV1>;
    sensorIds: readonly string[];
    tickMs: number;
    /** 0 runs until aborted. */
    maxTicks?: number;
    signal?: AbortSignal;
    generate?: GenerateOptions;
}

/** Produces one reading per sensor per tick. Returns how many readings were written. */
export async function runGenerator({
    sink,
    sensorIds,
    tickMs,
    maxTicks = 0,
    signal,
    generate
}: RunGeneratorOptions): Promise<number> {
    let tick = 0;
    let written = 0;

    while (!signal?.aborted) {
        tick++;
        const label = String(tick).padStart(4, '0');

        for (const reading of generateTick(sensorIds, generate)) {
            try {
                await sink.produce(reading);
                written++;
                console.log(
                    `[generator] tick=${label} sensor=${reading.sensor_id} ` +
                    `aqi=${reading.aqi} temp=${reading.temperature_c} humidity=${reading.humidity_pct}`
                );
            } catch (e) {
                console.error(`[generator] tick=${label} sensor=${reading.sensor_id} status=write_failed error="${e instanceof Error ? e.message : String(e)}"`);
            }
        }

        if (maxTicks > 0 && tick >= maxTicks) break;
        await wait(tickMs, signal);
    }

    return written;
}

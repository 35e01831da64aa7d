import { EnrichedReadingV1, ReadingMetric, Severity } from '@airwatch/contracts';

export interface Alert {
    /** null for the all-clear entry */
    metric: ReadingMetric | null;
    severity: Severity;
    title: string;
    advice: string;
}

export interface StatusBanner {
    label: string;
    subtitle: string;
}

/**
 * Active alerts for one classified reading, driven by the levels the
 * classifier assigned. A reading with nothing above `good` gets a single
 * all-clear entry.
 */
export function buildAlerts(record: EnrichedReadingV1): Alert[] {
    const alerts: Alert[] = [];

    if (record.aqi_level === 'unsafe') {
        alerts.push({
            metric: 'aqi',
            severity: 'unsafe',
            title: `UNSAFE AIR QUALITY - AQI ${record.aqi}`,
            advice: 'Avoid all outdoor activity. Wear an N95 mask if you must go outside. Close windows and use air purifiers indoors.'
        });
    } else if (record.aqi_level === 'moderate') {
        alerts.push({
            metric: 'aqi',
            severity: 'moderate',
            title: `MODERATE AIR QUALITY - AQI ${record.aqi}`,
            advice: 'Sensitive groups (elderly, children, asthma patients) should limit outdoor exposure.'
        });
    }

    const celsius = record.temperature_c.toFixed(1);
    if (record.temperature_level === 'heat_risk') {
        alerts.push({
            metric: 'temperature_c',
            severity: 'unsafe',
            title: `EXTREME HEAT RISK - ${celsius}°C`,
            advice: 'Drink water every 20 minutes. Stay in shade or air-conditioned spaces. Avoid strenuous activity outdoors.'
        });
    } else if (record.temperature_level === 'warm') {
        alerts.push({
            metric: 'temperature_c',
            severity: 'moderate',
            title: `ELEVATED TEMPERATURE - ${celsius}°C`,
            advice: 'Stay hydrated. Wear light clothing. Check on vulnerable individuals.'
        });
    }

    if (record.humidity_level === 'high_moisture') {
        alerts.push({
            metric: 'humidity_pct',
            severity: 'unsafe',
            title: `HIGH MOISTURE ALERT - ${record.humidity_pct}%`,
            advice: 'Risk of mold growth and heat stress. Use dehumidifiers. Ensure adequate ventilation.'
        });
    } else if (record.humidity_level === 'elevated') {
        alerts.push({
            metric: 'humidity_pct',
            severity: 'moderate',
            title: `ELEVATED HUMIDITY - ${record.humidity_pct}%`,
            advice: 'Monitor for discomfort. Ensure good airflow. Stay hydrated.'
        });
    }

    if (alerts.length === 0) {
        alerts.push({
            metric: null,
            severity: 'good',
            title: 'ALL CLEAR - No active risks detected',
            advice: 'All readings are within safe thresholds. Continue routine monitoring.'
        });
    }

    return alerts;
}

const BANNERS: Record<Severity, StatusBanner> = {
    good: {
        label: 'ALL SYSTEMS SAFE',
        subtitle: 'All environmental conditions within normal thresholds'
    },
    moderate: {
        label: 'CAUTION ADVISORY',
        subtitle: 'One or more conditions approaching unsafe thresholds'
    },
    unsafe: {
        label: 'RISK DETECTED',
        subtitle: 'Immediate attention required, unsafe conditions active'
    }
};

export function statusBanner(status: Severity | null): StatusBanner {
    if (status === null) {
        return { label: 'WAITING FOR DATA', subtitle: 'No classified readings received yet' };
    }
    return BANNERS[status];
}

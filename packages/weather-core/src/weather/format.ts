/**
 * Plain-text rendering of snapshots and history entries in the chosen unit
 */

import type { HistoryRecord } from '../history/types';
import type { TemperatureUnit, WeatherSnapshot } from './types';
import { toDisplay } from './units';

export function formatTemperature(celsius: number, unit: TemperatureUnit, digits: number = 1): string {
    if (Number.isNaN(celsius)) return 'n/a';
    const { value, symbol } = toDisplay(celsius, unit);
    return `${value.toFixed(digits)}${symbol}`;
}

export function formatSnapshot(snapshot: WeatherSnapshot, unit: TemperatureUnit): string {
    const { current, days } = snapshot;
    const lines = [
        `Weather for ${snapshot.location}`,
        `Temperature: ${formatTemperature(current.temperatureCelsius, unit)}`,
        `Wind Speed: ${current.windSpeedKmh} km/h`,
        `Time: ${current.observedAt}`,
        '',
        `${days.length}-Day Forecast:`,
    ];

    for (const day of days) {
        lines.push(
            `${day.date}: ${day.conditionSummary}, ` +
            `Max ${formatTemperature(day.maxTempCelsius, unit)}, ` +
            `Min ${formatTemperature(day.minTempCelsius, unit)}`
        );
    }

    return lines.join('\n');
}

export function formatHistoryRecord(record: HistoryRecord, unit: TemperatureUnit): string {
    return `${record.city}: ${formatTemperature(record.temperatureCelsius, unit)} (observed ${record.observedAt})`;
}

/**
 * Weather Types
 *
 * All temperatures are Celsius. Conversion to another unit happens only when
 * rendering (see units.ts).
 */

export interface Coordinate {
    readonly latitude: number;
    readonly longitude: number;
}

export interface PlaceSuggestion {
    displayName: string;
    country?: string;
    region?: string;       // admin1 from the provider
}

export interface CurrentConditions {
    temperatureCelsius: number;
    windSpeedKmh: number;
    observedAt: string;    // provider timestamp, opaque
}

export interface DailyForecast {
    date: string;          // ISO date
    maxTempCelsius: number;
    minTempCelsius: number;
    conditionCode: number; // WMO weather code
    conditionSummary: string;
}

export interface WeatherSnapshot {
    location: string;
    current: CurrentConditions;
    days: DailyForecast[];
}

export const TemperatureUnit = {
    Celsius: 'celsius',
    Fahrenheit: 'fahrenheit',
} as const;

export type TemperatureUnit = typeof TemperatureUnit[keyof typeof TemperatureUnit];

export interface DisplayTemperature {
    value: number;
    symbol: '°C' | '°F';
}

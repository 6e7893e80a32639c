import { TemperatureUnit, type DisplayTemperature } from './types';

export function toDisplay(celsius: number, unit: TemperatureUnit): DisplayTemperature {
    switch (unit) {
        case TemperatureUnit.Fahrenheit:
            return { value: celsius * 9 / 5 + 32, symbol: '°F' };
        case TemperatureUnit.Celsius:
        default:
            return { value: celsius, symbol: '°C' };
    }
}

const UNIT_ALIASES: Record<string, TemperatureUnit> = {
    'c': TemperatureUnit.Celsius,
    '°c': TemperatureUnit.Celsius,
    'celsius': TemperatureUnit.Celsius,
    'f': TemperatureUnit.Fahrenheit,
    '°f': TemperatureUnit.Fahrenheit,
    'fahrenheit': TemperatureUnit.Fahrenheit,
};

/**
 * Map a user-facing unit label ("C", "°F", "Fahrenheit", ...) to a unit
 */
export function parseTemperatureUnit(text: string): TemperatureUnit | undefined {
    const key = text.trim().toLowerCase();
    return Object.prototype.hasOwnProperty.call(UNIT_ALIASES, key) ? UNIT_ALIASES[key] : undefined;
}

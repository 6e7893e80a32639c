/**
 * Weather Data Parser
 *
 * Turns a raw Open-Meteo forecast body into a WeatherSnapshot. Structural
 * problems (missing blocks, wrong types, parallel arrays of different length)
 * are rejected with MalformedDataError. A single bad number inside a daily
 * array becomes NaN.
 */

import { z } from 'zod';
import { config } from '../config';
import { MalformedDataError } from '../errors';
import { describeCondition } from './conditions';
import type { DailyForecast, WeatherSnapshot } from './types';

export const MAX_FORECAST_DAYS = 5;

function toNumberOrNaN(value: unknown): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') return Number(value);
    return NaN;
}

const numericSeries = z.array(z.unknown()).transform((values) => values.map(toNumberOrNaN));

const currentWeatherSchema = z.object({
    temperature: z.number(),
    windspeed: z.number(),
    time: z.string().min(1, 'timestamp must not be empty'),
});

const dailySchema = z.object({
    time: z.array(z.string()),
    temperature_2m_max: numericSeries,
    temperature_2m_min: numericSeries,
    weathercode: numericSeries,
});

const forecastPayloadSchema = z.object({
    current_weather: currentWeatherSchema,
    daily: dailySchema,
});

function describeIssue(issue: z.ZodIssue): string {
    if (issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined) {
        return 'missing';
    }
    return issue.message;
}

export interface WeatherDataParserOptions {
    maxDays?: number;
}

export class WeatherDataParser {
    private readonly maxDays: number;

    constructor(options: WeatherDataParserOptions = {}) {
        const requested = options.maxDays ?? config.forecast.displayDays;
        this.maxDays = Math.max(0, Math.min(MAX_FORECAST_DAYS, Math.floor(requested)));
    }

    parse(payload: string, location: string): WeatherSnapshot {
        let json: unknown;
        try {
            json = JSON.parse(payload);
        } catch (error) {
            throw new MalformedDataError('payload', error instanceof Error ? error.message : 'not valid JSON');
        }
        if (typeof json !== 'object' || json === null || Array.isArray(json)) {
            throw new MalformedDataError('payload', 'expected a JSON object');
        }

        const result = forecastPayloadSchema.safeParse(json);
        if (!result.success) {
            const issue = result.error.issues[0];
            const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'payload';
            throw new MalformedDataError(field, issue ? describeIssue(issue) : 'invalid forecast payload');
        }

        const { current_weather: current, daily } = result.data;
        const lengths = {
            time: daily.time.length,
            temperature_2m_max: daily.temperature_2m_max.length,
            temperature_2m_min: daily.temperature_2m_min.length,
            weathercode: daily.weathercode.length,
        };
        if (new Set(Object.values(lengths)).size > 1) {
            const summary = Object.entries(lengths).map(([key, n]) => `${key}=${n}`).join(', ');
            throw new MalformedDataError('daily', `array lengths differ (${summary})`);
        }

        const days: DailyForecast[] = daily.time.slice(0, this.maxDays).map((date, i) => {
            const conditionCode = daily.weathercode[i];
            return {
                date,
                maxTempCelsius: daily.temperature_2m_max[i],
                minTempCelsius: daily.temperature_2m_min[i],
                conditionCode,
                conditionSummary: describeCondition(conditionCode),
            };
        });

        return {
            location,
            current: {
                temperatureCelsius: current.temperature,
                windSpeedKmh: current.windspeed,
                observedAt: current.time,
            },
            days,
        };
    }
}

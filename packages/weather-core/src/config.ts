/**
 * Shared Configuration
 */

import 'dotenv/config';

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

export const config = {
  // Open-Meteo endpoints (no API key required)
  api: {
    geocoding: process.env.GEOCODING_API_URL || 'https://geocoding-api.open-meteo.com/v1',
    forecast: process.env.FORECAST_API_URL || 'https://api.open-meteo.com/v1',
  },

  http: {
    // Applied to both connect and read; there is no retry
    timeoutMs: readInt('HTTP_TIMEOUT_MS', 10_000),
  },

  geocoding: {
    suggestionLimit: readInt('SUGGESTION_LIMIT', 5),
    language: process.env.GEOCODING_LANGUAGE || 'en',
  },

  forecast: {
    displayDays: readInt('FORECAST_DISPLAY_DAYS', 5),
  },

  history: {
    dbPath: process.env.HISTORY_DB_PATH || 'weather.db',
    limit: readInt('HISTORY_LIMIT', 50),
  },
};

const POSITIVE_INT_VARS = [
  'HTTP_TIMEOUT_MS',
  'SUGGESTION_LIMIT',
  'FORECAST_DISPLAY_DAYS',
  'HISTORY_LIMIT',
] as const;

/**
 * Validate numeric environment overrides
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const name of POSITIVE_INT_VARS) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
      errors.push(`${name} must be a positive integer, got "${raw}"`);
    }
  }

  for (const name of ['GEOCODING_API_URL', 'FORECAST_API_URL'] as const) {
    const raw = env[name];
    if (raw && !/^https?:\/\//.test(raw)) {
      errors.push(`${name} must be an http(s) URL, got "${raw}"`);
    }
  }

  return { valid: errors.length === 0, errors };
}
